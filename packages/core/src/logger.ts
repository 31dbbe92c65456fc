import pino from 'pino';
import type { Logger } from 'pino';
import type { WiresConfig } from './config.js';

let rootLogger: Logger | undefined;

/** Root logger writing JSON lines to stderr, so stdout stays machine-readable */
export function createRootLogger(config: Pick<WiresConfig, 'logLevel'>): Logger {
  rootLogger = pino({ level: config.logLevel, base: { app: 'wires' } }, pino.destination(2));
  return rootLogger;
}

/** The root logger, or a silent one if none was created (library use, tests) */
export function getRootLogger(): Logger {
  rootLogger ??= pino({ level: 'silent' });
  return rootLogger;
}

/**
 * Child logger for a module. Resolved on every call so modules that grab a
 * logger at import time still follow a root created later.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
