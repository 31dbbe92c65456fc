/**
 * Typed failures raised by the engine. Every mutation runs in a transaction,
 * so by the time one of these reaches the caller nothing has been committed.
 */

import type { WireId } from './types/wire.js';

export type WireErrorCode =
  | 'REPOSITORY_NOT_FOUND'
  | 'ALREADY_INITIALIZED'
  | 'WIRE_NOT_FOUND'
  | 'INVALID_STATUS'
  | 'CIRCULAR_DEPENDENCY'
  | 'INVALID_WIRE'
  | 'ID_COLLISION'
  | 'STORE_FAILURE'
  | 'INVALID_CONFIG';

export abstract class WireError extends Error {
  abstract readonly code: WireErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RepositoryNotFoundError extends WireError {
  readonly code = 'REPOSITORY_NOT_FOUND';

  constructor(readonly searchedFrom: string) {
    super(`Not a wires repository (or any parent up to /): ${searchedFrom}. Run 'wr init' first.`);
  }
}

export class AlreadyInitializedError extends WireError {
  readonly code = 'ALREADY_INITIALIZED';

  constructor(readonly path: string) {
    super(`Wires repository already initialized at ${path}`);
  }
}

export class WireNotFoundError extends WireError {
  readonly code = 'WIRE_NOT_FOUND';

  constructor(readonly wireId: WireId) {
    super(`Wire not found: ${wireId}`);
  }
}

export class InvalidStatusError extends WireError {
  readonly code = 'INVALID_STATUS';

  constructor(readonly value: string) {
    super(`Invalid status: ${value}. Use one of TODO, IN_PROGRESS, DONE, CANCELLED`);
  }
}

export class CircularDependencyError extends WireError {
  readonly code = 'CIRCULAR_DEPENDENCY';

  constructor(readonly path: readonly WireId[]) {
    super(`Circular dependency detected: ${path.join(' -> ')}`);
  }
}

export class InvalidWireError extends WireError {
  readonly code = 'INVALID_WIRE';
}

export class IdCollisionError extends WireError {
  readonly code = 'ID_COLLISION';

  constructor(readonly attempts: number) {
    super(`Could not generate a free wire id after ${attempts} attempts`);
  }
}

export class StoreError extends WireError {
  readonly code = 'STORE_FAILURE';

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

export class InvalidConfigError extends WireError {
  readonly code = 'INVALID_CONFIG';
}

export function isWireError(err: unknown): err is WireError {
  return err instanceof WireError;
}

/**
 * Run a store operation, passing engine errors through and wrapping anything
 * the driver throws (I/O, constraint violations, SQLITE_BUSY) as a StoreError.
 */
export function withStoreErrors<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err: unknown) {
    if (err instanceof WireError) throw err;
    throw new StoreError(err);
  }
}
