import { createHash, randomBytes } from 'node:crypto';
import type { DependencyInfo, Wire, WireId, WireWithDeps } from '../types/wire.js';
import { Status, isBlocking } from '../types/status.js';
import { InvalidWireError } from '../errors.js';

export const ID_LENGTH = 7;

/** sha256(title + high-resolution time + salt), first 7 hex chars */
export function generateId(title: string): WireId {
  const input = `${title}${process.hrtime.bigint()}${randomBytes(4).toString('hex')}`;
  return createHash('sha256').update(input).digest('hex').slice(0, ID_LENGTH);
}

/** Current time in whole seconds since the epoch */
export function nowSeconds(now: Date = new Date()): number {
  return Math.floor(now.getTime() / 1000);
}

/** Next updated_at: never earlier than the previous value, even if the clock steps back */
export function nextUpdatedAt(previous: number, now: number): number {
  return Math.max(previous, now);
}

export function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new InvalidWireError('Title must not be empty');
  return trimmed;
}

/** Empty (or whitespace-only) descriptions are stored as "no description" */
export function normalizeDescription(description: string | null | undefined): string | null {
  if (description == null) return null;
  return description.trim() === '' ? null : description;
}

export function validatePriority(priority: number): number {
  if (!Number.isSafeInteger(priority)) throw new InvalidWireError(`Priority must be an integer, got ${priority}`);
  return priority;
}

export interface NewWireInput {
  title: string;
  description?: string | null;
  priority?: number;
}

/** Build a new Todo wire (not yet persisted) */
export function buildWire(id: WireId, input: NewWireInput, now: number): Wire {
  return {
    id,
    title: normalizeTitle(input.title),
    description: normalizeDescription(input.description),
    status: Status.Todo,
    priority: validatePriority(input.priority ?? 0),
    createdAt: now,
    updatedAt: now,
  };
}

/** Dependencies still holding this wire up (neither DONE nor CANCELLED) */
export function getBlockers(wire: Pick<WireWithDeps, 'dependsOn'>): DependencyInfo[] {
  return wire.dependsOn.filter(dep => isBlocking(dep.status));
}

export function isBlocked(wire: Pick<WireWithDeps, 'dependsOn'>): boolean {
  return getBlockers(wire).length > 0;
}
