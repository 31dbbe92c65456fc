/**
 * Locating, creating and opening the `.wires/wires.db` store.
 * Nothing here looks at process state: callers pass the directory to start from.
 */

import { existsSync, mkdirSync, rmSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { eq } from 'drizzle-orm';
import type { WiresConfig } from '../config.js';
import { createDb, closeDb, SCHEMA_VERSION } from '../db.js';
import type { WiresDb } from '../db.js';
import { meta } from '../schema/meta.js';
import { AlreadyInitializedError, RepositoryNotFoundError, StoreError, withStoreErrors } from '../errors.js';
import { getLogger } from '../logger.js';

export const WIRES_DIR = '.wires';
export const DB_NAME = 'wires.db';

export interface Repository {
  /** Directory containing `.wires/` */
  readonly root: string;
  readonly dbPath: string;
  readonly db: WiresDb;
}

export function repositoryDbPath(root: string): string {
  return join(root, WIRES_DIR, DB_NAME);
}

/** Create `.wires/wires.db` under `dir` with a fresh schema */
export function initRepository(dir: string, config: Pick<WiresConfig, 'busyTimeoutMs'>): Repository {
  const root = resolve(dir);
  const wiresDir = join(root, WIRES_DIR);
  if (existsSync(wiresDir)) throw new AlreadyInitializedError(wiresDir);

  withStoreErrors(() => mkdirSync(wiresDir));
  const dbPath = repositoryDbPath(root);
  let db: WiresDb;
  try {
    db = createDb(dbPath, { busyTimeoutMs: config.busyTimeoutMs });
  } catch (err: unknown) {
    // No `.wires/` without a store in it
    rmSync(wiresDir, { recursive: true, force: true });
    throw err;
  }

  getLogger('repository').debug({ dbPath }, 'initialized repository');
  return { root, dbPath, db };
}

/** Walk up from `startDir` to the filesystem root looking for `.wires/wires.db` */
export function findRepository(startDir: string): string {
  let current = resolve(startDir);
  for (;;) {
    if (existsSync(repositoryDbPath(current))) return current;
    const parent = dirname(current);
    if (parent === current) throw new RepositoryNotFoundError(resolve(startDir));
    current = parent;
  }
}

/**
 * Open the repository named by `config.repositoryRoot`, or the nearest one
 * at or above `cwd` when that is unset.
 */
export function openRepository(config: WiresConfig, cwd: string): Repository {
  let root: string;
  if (config.repositoryRoot) {
    root = resolve(cwd, config.repositoryRoot);
    if (!existsSync(repositoryDbPath(root))) throw new RepositoryNotFoundError(root);
  } else {
    root = findRepository(cwd);
  }

  const dbPath = repositoryDbPath(root);
  const db = createDb(dbPath, { busyTimeoutMs: config.busyTimeoutMs });
  try {
    checkSchemaVersion(db);
  } catch (err: unknown) {
    closeDb(db);
    throw err;
  }

  getLogger('repository').debug({ dbPath }, 'opened repository');
  return { root, dbPath, db };
}

export function closeRepository(repo: Repository): void {
  closeDb(repo.db);
}

/** Refuse stores written by a newer schema than this build understands */
function checkSchemaVersion(db: WiresDb): void {
  const row = withStoreErrors(() =>
    db.select({ value: meta.value }).from(meta).where(eq(meta.key, 'schema_version')).get(),
  );
  const version = Number(row?.value ?? SCHEMA_VERSION);
  if (!Number.isInteger(version) || version > SCHEMA_VERSION) {
    throw new StoreError(`Unsupported schema version ${row?.value ?? '?'} (this build supports up to ${SCHEMA_VERSION})`);
  }
}
