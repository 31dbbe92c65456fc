/**
 * Cycle Guard: would adding edge (wireId -> dependsOn) close a loop?
 *
 * Iterative DFS from `dependsOn` along existing prerequisite edges, looking
 * for `wireId`. The visited set keeps it O(V+E) per proposed edge, and means
 * diamonds (two paths meeting at a shared prerequisite) are walked once and
 * never reported.
 */

import { eq, sql } from 'drizzle-orm';
import type { WiresDb } from '../db.js';
import { dependencies } from '../schema/dependencies.js';
import type { WireId } from '../types/wire.js';

/** Direct prerequisites of a wire */
export type PrerequisiteLookup = (wireId: WireId) => readonly WireId[];

/**
 * Returns null when the edge is safe, otherwise one concrete cycle that
 * starts and ends at `wireId`, e.g. [C, A, B, C] for A->B, B->C plus C->A.
 */
export function findCycle(
  wireId: WireId,
  dependsOn: WireId,
  prerequisitesOf: PrerequisiteLookup,
): WireId[] | null {
  if (wireId === dependsOn) return [wireId, wireId];

  const visited = new Set<WireId>();
  // parent.get(x) = the node whose prerequisite list led to x
  const parent = new Map<WireId, WireId>();
  const stack: WireId[] = [dependsOn];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);

    if (current === wireId) return buildCyclePath(wireId, dependsOn, parent);

    for (const prerequisite of prerequisitesOf(current)) {
      if (visited.has(prerequisite)) continue;
      parent.set(prerequisite, current);
      stack.push(prerequisite);
    }
  }

  return null;
}

/**
 * Follow parent pointers from `wireId` back to the DFS root `dependsOn`.
 * Parents are always visited before their children, so the chain cannot loop,
 * but it is bounded by the map size regardless.
 */
function buildCyclePath(wireId: WireId, dependsOn: WireId, parent: ReadonlyMap<WireId, WireId>): WireId[] {
  const chain: WireId[] = [];
  let node = parent.get(wireId);
  while (node !== undefined && chain.length <= parent.size) {
    chain.push(node);
    if (node === dependsOn) break;
    node = parent.get(node);
  }

  if (chain[chain.length - 1] !== dependsOn) return [wireId, dependsOn, wireId];
  return [wireId, ...chain.reverse(), wireId];
}

/** Prerequisite lookup backed by the dependencies table, one prepared statement per search */
export function storePrerequisiteLookup(db: WiresDb): PrerequisiteLookup {
  const stmt = db.select({ dependsOn: dependencies.dependsOn })
    .from(dependencies)
    .where(eq(dependencies.wireId, sql.placeholder('wireId')))
    .prepare();
  return (wireId) => stmt.all({ wireId }).map(r => r.dependsOn);
}

/**
 * Check a proposed edge against the stored graph. Callers run this inside
 * the same write transaction as the insert.
 */
export function wouldCreateCycle(db: WiresDb, wireId: WireId, dependsOn: WireId): WireId[] | null {
  return findCycle(wireId, dependsOn, storePrerequisiteLookup(db));
}

/**
 * Full-graph check used by tests and diagnostics: returns one cycle in the
 * given edge set, or null if it is acyclic.
 */
export function detectAnyCycle(edges: Iterable<{ wireId: WireId; dependsOn: WireId }>): WireId[] | null {
  const adjacency = new Map<WireId, WireId[]>();
  for (const { wireId, dependsOn } of edges) {
    const list = adjacency.get(wireId);
    if (list) list.push(dependsOn);
    else adjacency.set(wireId, [dependsOn]);
  }

  // Colour marking: 1 = on the current path, 2 = finished
  const state = new Map<WireId, 1 | 2>();
  for (const start of adjacency.keys()) {
    if (state.has(start)) continue;
    const path: WireId[] = [start];
    const iterators: Iterator<WireId>[] = [(adjacency.get(start) ?? [])[Symbol.iterator]()];
    state.set(start, 1);

    while (iterators.length > 0) {
      const top = iterators[iterators.length - 1];
      const next = top?.next();
      if (!next || next.done) {
        const finished = path.pop();
        if (finished !== undefined) state.set(finished, 2);
        iterators.pop();
        continue;
      }
      const node = next.value;
      const mark = state.get(node);
      if (mark === 1) return [...path.slice(path.indexOf(node)), node];
      if (mark === 2) continue;
      state.set(node, 1);
      path.push(node);
      iterators.push((adjacency.get(node) ?? [])[Symbol.iterator]());
    }
  }
  return null;
}
