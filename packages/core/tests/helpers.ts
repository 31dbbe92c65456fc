import { createWire } from '../src/queries/wire-queries.js';
import type { WiresDb } from '../src/db.js';
import type { Wire } from '../src/types/wire.js';

export const T0 = new Date('2026-01-01T00:00:00Z');

/** Insert a wire under a fixed id so tests can refer to it by name */
export function addWire(
  db: WiresDb,
  id: string,
  opts: { title?: string; description?: string; priority?: number; now?: Date } = {},
): Wire {
  return createWire(
    db,
    { title: opts.title ?? `Wire ${id}`, description: opts.description, priority: opts.priority },
    { generateId: () => id, now: opts.now ?? T0 },
  );
}
