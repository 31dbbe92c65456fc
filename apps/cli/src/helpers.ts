/**
 * CLI helpers: argument parsing, output format, error handling.
 */

import type { Command } from 'commander';
import type { Status } from '@wires/core';
import {
  InvalidStatusError, InvalidWireError, getLogger, isWireError, statusFromLabel,
} from '@wires/core';
import type { CliContext } from './context.js';
import * as out from './output.js';

export const OUTPUT_FORMATS = ['json', 'table'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Parse a status argument. Accepts the stored labels in any case,
 * with '-' in place of '_' (in-progress, In_Progress, IN-PROGRESS).
 */
export function parseStatusArg(value: string): Status {
  const label = value.trim().toUpperCase().replace(/-/g, '_');
  try {
    return statusFromLabel(label);
  } catch (err: unknown) {
    if (err instanceof InvalidStatusError) throw new InvalidStatusError(value);
    throw err;
  }
}

/** Parse a priority argument: any integer, negative allowed */
export function parsePriorityArg(value: string): number {
  const trimmed = value.trim();
  const priority = Number(trimmed);
  if (!/^[+-]?\d+$/.test(trimmed) || !Number.isSafeInteger(priority)) {
    throw new InvalidWireError(`Priority must be an integer, got '${value}'`);
  }
  return priority;
}

/** Explicit --format wins; otherwise tables for a terminal and JSON for pipes */
export function resolveFormat(explicit: OutputFormat | undefined, isTTY: boolean): OutputFormat {
  return explicit ?? (isTTY ? 'table' : 'json');
}

export function formatOf(ctx: CliContext, cmd: Command): OutputFormat {
  return resolveFormat(cmd.optsWithGlobals<{ format?: OutputFormat }>().format, ctx.isTTY);
}

/**
 * Run a command action. Failures are rendered in the active format on
 * stderr and mark the invocation as failed.
 */
export function $try(ctx: CliContext, cmd: Command, fn: (format: OutputFormat) => void): void {
  const format = formatOf(ctx, cmd);
  try {
    fn(format);
  } catch (err: unknown) {
    if (!isWireError(err)) getLogger('cli').error({ err, command: cmd.name() }, 'unexpected failure');
    out.printError(err, format);
    ctx.fail();
  }
}
