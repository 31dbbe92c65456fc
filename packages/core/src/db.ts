import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { withStoreErrors } from './errors.js';

export type WiresDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

export const SCHEMA_VERSION = 1;

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS wires (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT,
    status TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    priority INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_status ON wires(status);
CREATE INDEX IF NOT EXISTS idx_priority ON wires(priority);

CREATE TABLE IF NOT EXISTS dependencies (
    wire_id TEXT NOT NULL REFERENCES wires(id) ON DELETE CASCADE,
    depends_on TEXT NOT NULL REFERENCES wires(id) ON DELETE CASCADE,
    PRIMARY KEY (wire_id, depends_on),
    CONSTRAINT no_self_dependency CHECK (wire_id != depends_on)
);

CREATE INDEX IF NOT EXISTS idx_deps_wire ON dependencies(wire_id);
CREATE INDEX IF NOT EXISTS idx_deps_on ON dependencies(depends_on);

CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

export interface CreateDbOptions {
  busyTimeoutMs?: number;
}

/**
 * Open a Drizzle connection with the pragmas every connection needs.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string, opts: CreateDbOptions = {}): WiresDb {
  return withStoreErrors(() => {
    const sqlite = new Database(path);

    // Pragmas are per-connection
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.pragma(`busy_timeout = ${opts.busyTimeoutMs ?? 5000}`);

    // Idempotent, every statement uses IF NOT EXISTS
    sqlite.exec(CREATE_SCHEMA_SQL);
    sqlite.prepare('INSERT OR IGNORE INTO meta (key, value) VALUES (?, ?)').run('schema_version', String(SCHEMA_VERSION));

    return drizzle(sqlite, { schema });
  });
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): WiresDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for what Drizzle doesn't cover (transactions, pragmas, close).
 */
export function getRawDb(db: WiresDb): Database.Database {
  return db.$client;
}

/** File path the connection was opened with (':memory:' for tests) */
export function getDbPath(db: WiresDb): string {
  return getRawDb(db).name;
}

export function closeDb(db: WiresDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}

/**
 * Run `fn` in a BEGIN IMMEDIATE transaction: the write lock is taken before
 * the first read, so checks made inside `fn` still hold when it writes.
 * Driver errors come out as StoreError; the transaction is rolled back either way.
 */
export function writeTransaction<T>(db: WiresDb, fn: () => T): T {
  const raw = getRawDb(db);
  return withStoreErrors(() => raw.transaction(fn).immediate());
}

/** Consistent snapshot for multi-statement reads */
export function readTransaction<T>(db: WiresDb, fn: () => T): T {
  const raw = getRawDb(db);
  return withStoreErrors(() => raw.transaction(fn).deferred());
}
