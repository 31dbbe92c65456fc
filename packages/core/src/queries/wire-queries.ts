/**
 * Task Record Store and the wire-level operations built on it.
 */

import { asc, desc, eq } from 'drizzle-orm';
import type { WiresDb } from '../db.js';
import { readTransaction, writeTransaction } from '../db.js';
import { IdCollisionError, WireNotFoundError, withStoreErrors } from '../errors.js';
import { getLogger } from '../logger.js';
import { wires } from '../schema/wires.js';
import { Status, StatusLabel } from '../types/status.js';
import type { Wire, WireId, WireWithDeps } from '../types/wire.js';
import type { MutationResult } from '../types/results.js';
import { hasWarnings } from '../types/results.js';
import {
  generateId as defaultGenerateId, buildWire, nowSeconds, nextUpdatedAt,
  normalizeTitle, normalizeDescription, validatePriority,
} from './wire-helpers.js';
import type { NewWireInput } from './wire-helpers.js';
import { getIncompleteDependencies, getNeighbours } from './dependency-queries.js';
import { toWire } from './row-mappers.js';

/** Attempts at finding an unused id before giving up */
export const MAX_ID_ATTEMPTS = 8;

export interface CreateWireOptions {
  generateId?: (title: string) => WireId;
  now?: Date;
}

export interface ListWiresOptions {
  status?: Status;
}

export interface UpdateWireInput {
  title?: string;
  /** '' or null clears the description; undefined leaves it alone */
  description?: string | null;
  status?: Status;
  priority?: number;
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

export function findWire(db: WiresDb, wireId: WireId): Wire | null {
  const row = withStoreErrors(() => db.select().from(wires).where(eq(wires.id, wireId)).get());
  return row ? toWire(row) : null;
}

export function getWire(db: WiresDb, wireId: WireId): Wire {
  const wire = findWire(db, wireId);
  if (!wire) throw new WireNotFoundError(wireId);
  return wire;
}

/** All wires, newest first, optionally filtered by status */
export function listWires(db: WiresDb, opts: ListWiresOptions = {}): Wire[] {
  const rows = withStoreErrors(() => db.select().from(wires)
    .where(opts.status === undefined ? undefined : eq(wires.status, StatusLabel[opts.status]))
    .orderBy(desc(wires.createdAt), asc(wires.id))
    .all());
  return rows.map(toWire);
}

/** A wire with both neighbour lists (detail view) */
export function getWireWithDeps(db: WiresDb, wireId: WireId): WireWithDeps {
  return readTransaction(db, () => {
    const wire = getWire(db, wireId);
    return { ...wire, ...getNeighbours(db, wireId) };
  });
}

export function listWiresWithDeps(db: WiresDb, opts: ListWiresOptions = {}): WireWithDeps[] {
  return readTransaction(db, () =>
    listWires(db, opts).map(wire => ({ ...wire, ...getNeighbours(db, wire.id) })),
  );
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Create a TODO wire. A taken id is regenerated, up to MAX_ID_ATTEMPTS times. */
export function createWire(db: WiresDb, input: NewWireInput, opts: CreateWireOptions = {}): Wire {
  const generate = opts.generateId ?? defaultGenerateId;
  const now = nowSeconds(opts.now);

  const wire = writeTransaction(db, () => {
    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const candidate = buildWire(generate(input.title), input, now);
      if (findWire(db, candidate.id)) {
        getLogger('wires').debug({ id: candidate.id, attempt }, 'id already taken, regenerating');
        continue;
      }
      db.insert(wires).values({ ...candidate, status: StatusLabel[candidate.status] }).run();
      return candidate;
    }
    throw new IdCollisionError(MAX_ID_ATTEMPTS);
  });

  getLogger('wires').debug({ id: wire.id }, 'created wire');
  return wire;
}

/**
 * Apply any of title, description, status and priority in one transaction.
 * Marking DONE reports the wire's unfinished dependencies as warnings but
 * goes ahead regardless. An empty update still fails for an unknown id.
 */
export function updateWire(db: WiresDb, wireId: WireId, input: UpdateWireInput, now: Date = new Date()): MutationResult {
  const patch: Partial<typeof wires.$inferInsert> = {};
  if (input.title !== undefined) patch.title = normalizeTitle(input.title);
  if (input.description !== undefined) patch.description = normalizeDescription(input.description);
  if (input.status !== undefined) patch.status = StatusLabel[input.status];
  if (input.priority !== undefined) patch.priority = validatePriority(input.priority);

  const result = writeTransaction(db, (): MutationResult => {
    const current = getWire(db, wireId);
    if (Object.keys(patch).length === 0) return { wire: current, warnings: [] };

    const warnings = input.status === Status.Done ? getIncompleteDependencies(db, wireId) : [];
    patch.updatedAt = nextUpdatedAt(current.updatedAt, nowSeconds(now));
    db.update(wires).set(patch).where(eq(wires.id, wireId)).run();

    return { wire: getWire(db, wireId), warnings };
  });

  if (hasWarnings(result)) {
    getLogger('wires').info(
      { wireId, incomplete: result.warnings.map(w => w.wireId) },
      'marked done with incomplete dependencies',
    );
  }
  return result;
}

export function setStatus(db: WiresDb, wireId: WireId, status: Status, now?: Date): MutationResult {
  return updateWire(db, wireId, { status }, now);
}

export function startWire(db: WiresDb, wireId: WireId, now?: Date): MutationResult {
  return setStatus(db, wireId, Status.InProgress, now);
}

/** Mark DONE; unfinished dependencies come back as warnings */
export function completeWire(db: WiresDb, wireId: WireId, now?: Date): MutationResult {
  return setStatus(db, wireId, Status.Done, now);
}

export function cancelWire(db: WiresDb, wireId: WireId, now?: Date): MutationResult {
  return setStatus(db, wireId, Status.Cancelled, now);
}

/** Delete a wire permanently; its edges in both directions go with it (FK cascade) */
export function deleteWire(db: WiresDb, wireId: WireId): Wire {
  const wire = writeTransaction(db, () => {
    const existing = getWire(db, wireId);
    db.delete(wires).where(eq(wires.id, wireId)).run();
    return existing;
  });
  getLogger('wires').debug({ wireId }, 'deleted wire');
  return wire;
}
