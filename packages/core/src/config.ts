/**
 * Environment-driven settings, validated once at the edge and then passed
 * explicitly to everything that needs them.
 */

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

const configSchema = z.object({
  /** Directory holding `.wires/`; unset means discover upward from the cwd */
  repositoryRoot: z.string().min(1).optional(),
  busyTimeoutMs: z.coerce.number().int().nonnegative().default(DEFAULT_BUSY_TIMEOUT_MS),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

export type WiresConfig = z.infer<typeof configSchema>;

/** Read WIRES_* variables, apply overrides, validate */
export function resolveConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<WiresConfig> = {},
): WiresConfig {
  const input: Record<string, unknown> = {
    repositoryRoot: overrides.repositoryRoot ?? (env['WIRES_DIR'] || undefined),
    busyTimeoutMs: overrides.busyTimeoutMs ?? (env['WIRES_BUSY_TIMEOUT'] || undefined),
    logLevel: overrides.logLevel ?? (env['WIRES_LOG'] || undefined)?.toLowerCase(),
  };

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}
