import type { wires } from '../schema/wires.js';
import type { Wire, DependencyInfo } from '../types/wire.js';
import { statusFromLabel } from '../types/status.js';

/** Map a Drizzle row to a Wire; the status label is validated here and '' reads as no description */
export function toWire(row: typeof wires.$inferSelect): Wire {
  return {
    id: row.id,
    title: row.title,
    description: row.description === '' ? null : row.description,
    status: statusFromLabel(row.status),
    priority: row.priority,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toDependencyInfo(row: { id: string; title: string; status: string }): DependencyInfo {
  return { id: row.id, title: row.title, status: statusFromLabel(row.status) };
}
