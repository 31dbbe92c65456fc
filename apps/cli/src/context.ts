import type { Repository, WiresConfig, WiresDb } from '@wires/core';
import { closeRepository, openRepository } from '@wires/core';

/** What every command needs from the process it runs in */
export interface CliContext {
  readonly config: WiresConfig;
  readonly cwd: string;
  /** Whether stdout is a terminal; picks the default output format */
  readonly isTTY: boolean;
  /** The repository database, opened on first use */
  db(): WiresDb;
  /** Mark the invocation as failed (exit code 1) */
  fail(): void;
}

export interface ProcessContext extends CliContext {
  close(): void;
}

export function createProcessContext(config: WiresConfig): ProcessContext {
  let repo: Repository | undefined;
  const cwd = process.cwd();

  return {
    config,
    cwd,
    isTTY: process.stdout.isTTY === true,
    db() {
      repo ??= openRepository(config, cwd);
      return repo.db;
    },
    fail() {
      process.exitCode = 1;
    },
    close() {
      if (repo) closeRepository(repo);
      repo = undefined;
    },
  };
}
