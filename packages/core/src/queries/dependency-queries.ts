/**
 * Dependency Edge Store plus the operations that mutate it.
 */

import { and, asc, eq } from 'drizzle-orm';
import type { WiresDb } from '../db.js';
import { readTransaction, writeTransaction } from '../db.js';
import { CircularDependencyError, WireNotFoundError, withStoreErrors } from '../errors.js';
import { getLogger } from '../logger.js';
import { wires } from '../schema/wires.js';
import { dependencies } from '../schema/dependencies.js';
import { Status } from '../types/status.js';
import type { DependencyEdge, DependencyInfo, WireId } from '../types/wire.js';
import type { DependencyChange, IncompleteDependencyWarning } from '../types/results.js';
import { wouldCreateCycle } from '../graph/cycle-guard.js';
import { toDependencyInfo } from './row-mappers.js';

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

export function wireExists(db: WiresDb, wireId: WireId): boolean {
  const row = withStoreErrors(() => db.select({ id: wires.id }).from(wires).where(eq(wires.id, wireId)).get());
  return row !== undefined;
}

export function edgeExists(db: WiresDb, wireId: WireId, dependsOn: WireId): boolean {
  const row = withStoreErrors(() => db.select({ wireId: dependencies.wireId }).from(dependencies)
    .where(and(eq(dependencies.wireId, wireId), eq(dependencies.dependsOn, dependsOn)))
    .get());
  return row !== undefined;
}

/** Wires that `wireId` waits on, with their current status */
export function getDependsOn(db: WiresDb, wireId: WireId): DependencyInfo[] {
  const rows = withStoreErrors(() => db.select({ id: wires.id, title: wires.title, status: wires.status })
    .from(dependencies)
    .innerJoin(wires, eq(dependencies.dependsOn, wires.id))
    .where(eq(dependencies.wireId, wireId))
    .orderBy(asc(wires.id))
    .all());
  return rows.map(toDependencyInfo);
}

/** Wires waiting on `wireId`, with their current status */
export function getBlocks(db: WiresDb, wireId: WireId): DependencyInfo[] {
  const rows = withStoreErrors(() => db.select({ id: wires.id, title: wires.title, status: wires.status })
    .from(dependencies)
    .innerJoin(wires, eq(dependencies.wireId, wires.id))
    .where(eq(dependencies.dependsOn, wireId))
    .orderBy(asc(wires.id))
    .all());
  return rows.map(toDependencyInfo);
}

/** Direct dependencies of `wireId` that are not DONE, as warnings */
export function getIncompleteDependencies(db: WiresDb, wireId: WireId): IncompleteDependencyWarning[] {
  return getDependsOn(db, wireId)
    .filter(dep => dep.status !== Status.Done)
    .map((dep): IncompleteDependencyWarning => ({ type: 'incomplete_dependency', wireId: dep.id, title: dep.title, status: dep.status }));
}

/** Every edge, ordered for stable output */
export function getAllEdges(db: WiresDb): DependencyEdge[] {
  return withStoreErrors(() => db.select().from(dependencies)
    .orderBy(asc(dependencies.wireId), asc(dependencies.dependsOn))
    .all());
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/**
 * Add edge (wireId -> dependsOn). Existence checks, the cycle scan and the
 * insert share one immediate transaction, so two writers cannot each add half
 * of a cycle. Adding an edge that already exists is a no-op.
 */
export function addDependency(db: WiresDb, wireId: WireId, dependsOn: WireId): DependencyChange {
  const log = getLogger('dependencies');
  return writeTransaction(db, () => {
    if (!wireExists(db, wireId)) throw new WireNotFoundError(wireId);
    if (!wireExists(db, dependsOn)) throw new WireNotFoundError(dependsOn);

    const cycle = wouldCreateCycle(db, wireId, dependsOn);
    if (cycle) {
      log.info({ wireId, dependsOn, cycle }, 'rejected dependency: would create a cycle');
      throw new CircularDependencyError(cycle);
    }

    const result = db.insert(dependencies).values({ wireId, dependsOn }).onConflictDoNothing().run();
    if (result.changes === 0) return { type: 'unchanged', wireId, dependsOn };

    log.debug({ wireId, dependsOn }, 'added dependency');
    return { type: 'added', wireId, dependsOn };
  });
}

/** Remove edge (wireId -> dependsOn). Both wires must exist; a missing edge is a no-op. */
export function removeDependency(db: WiresDb, wireId: WireId, dependsOn: WireId): DependencyChange {
  return writeTransaction(db, () => {
    if (!wireExists(db, wireId)) throw new WireNotFoundError(wireId);
    if (!wireExists(db, dependsOn)) throw new WireNotFoundError(dependsOn);

    const result = db.delete(dependencies)
      .where(and(eq(dependencies.wireId, wireId), eq(dependencies.dependsOn, dependsOn)))
      .run();
    if (result.changes === 0) return { type: 'unchanged', wireId, dependsOn };

    getLogger('dependencies').debug({ wireId, dependsOn }, 'removed dependency');
    return { type: 'removed', wireId, dependsOn };
  });
}

/** Both neighbour lists of a wire, read from one snapshot */
export function getNeighbours(db: WiresDb, wireId: WireId): { dependsOn: DependencyInfo[]; blocks: DependencyInfo[] } {
  return readTransaction(db, () => ({ dependsOn: getDependsOn(db, wireId), blocks: getBlocks(db, wireId) }));
}
