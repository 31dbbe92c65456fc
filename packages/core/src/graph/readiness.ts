/**
 * Readiness Resolver. A wire is ready when it is TODO or IN_PROGRESS and every
 * direct dependency is DONE. A CANCELLED prerequisite still holds it back.
 *
 * Recomputed from the stored edges on every call; there is no cached ready set.
 */

import { and, asc, desc, eq, inArray, ne, notExists, sql } from 'drizzle-orm';
import { alias } from 'drizzle-orm/sqlite-core';
import type { WiresDb } from '../db.js';
import { withStoreErrors } from '../errors.js';
import { wires } from '../schema/wires.js';
import { dependencies } from '../schema/dependencies.js';
import { Status, StatusLabel, isActive, statusRank } from '../types/status.js';
import type { Wire, WireId } from '../types/wire.js';
import { toWire } from '../queries/row-mappers.js';

const prerequisite = alias(wires, 'prerequisite');

/** Ready wires: IN_PROGRESS first, then priority (high first), then oldest, then id */
export function getReadyWires(db: WiresDb): Wire[] {
  const unfinishedPrerequisite = db.select({ one: sql`1` })
    .from(dependencies)
    .innerJoin(prerequisite, eq(dependencies.dependsOn, prerequisite.id))
    .where(and(
      eq(dependencies.wireId, wires.id),
      ne(prerequisite.status, StatusLabel[Status.Done]),
    ));

  const rows = withStoreErrors(() => db.select().from(wires)
    .where(and(
      inArray(wires.status, [StatusLabel[Status.Todo], StatusLabel[Status.InProgress]]),
      notExists(unfinishedPrerequisite),
    ))
    .orderBy(
      sql`CASE ${wires.status} WHEN ${StatusLabel[Status.InProgress]} THEN 0 ELSE 1 END`,
      desc(wires.priority),
      asc(wires.createdAt),
      asc(wires.id),
    )
    .all());

  return rows.map(toWire);
}

/** Comparator matching the ready-queue order, for in-memory lists */
export function compareReadiness(a: Wire, b: Wire): number {
  return statusRank(a.status) - statusRank(b.status)
    || b.priority - a.priority
    || a.createdAt - b.createdAt
    || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * The same rule evaluated in memory over a snapshot of wires and edges.
 * Used where the graph is already loaded (graph export) and as a reference
 * for the SQL version in tests.
 */
export function resolveReady(
  allWires: readonly Wire[],
  edges: Iterable<{ wireId: WireId; dependsOn: WireId }>,
): Wire[] {
  const statusById = new Map(allWires.map(w => [w.id, w.status]));
  const prerequisitesById = new Map<WireId, WireId[]>();
  for (const { wireId, dependsOn } of edges) {
    const list = prerequisitesById.get(wireId);
    if (list) list.push(dependsOn);
    else prerequisitesById.set(wireId, [dependsOn]);
  }

  return allWires
    .filter(w => isActive(w.status))
    .filter(w => (prerequisitesById.get(w.id) ?? []).every(dep => statusById.get(dep) === Status.Done))
    .sort(compareReadiness);
}
