/**
 * Structured logging.
 *
 * The engine itself never writes output; it logs diagnostics through a pino
 * logger supplied by the caller. Library consumers that pass nothing get a
 * silent logger.
 *
 * @module logger
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './types/config';

export type { Logger } from 'pino';

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Component name attached to every line */
  readonly name: string;

  /** Minimum level written */
  readonly level?: LogLevel;

  /**
   * Destination file descriptor. Defaults to stderr so that stdout stays
   * free for reports.
   */
  readonly fd?: number;
}

/**
 * Create a JSON logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'policy-scan', level: 'debug' });
 * logger.info({ manifests: 3 }, 'scan started');
 * ```
 */
export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: options.name,
      level: options.level ?? 'info',
      base: null,
    },
    pino.destination({ fd: options.fd ?? 2, sync: true }),
  );
}

/**
 * A logger that discards everything.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
