/**
 * Diagnostics
 *
 * Structured logging with pino. Library code logs through the Logger held by
 * the build context; CLI output meant for the user stays on the console.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  /** Emit debug-level diagnostics */
  verbose?: boolean;
  /** Defaults to stderr */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: 'page-forge',
      level: options.verbose ? 'debug' : 'info',
      base: null,
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger that drops everything. Used where no sink was given.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
