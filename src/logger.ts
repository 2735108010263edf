/**
 * @module logger
 *
 * Minimal logging seam.
 *
 * Components log through an injected {@link Logger}; the default writes to
 * the console with a `[Scope]` prefix. Tests pass {@link silentLogger} or a
 * spy.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console-backed logger. `debug` output is emitted only when `verbose`.
 *
 * @example
 * ```typescript
 * const log = consoleLogger('WorkerPool');
 * log.warn('Tile 13/4250/2861 failed:', err);
 * // → [WorkerPool] Tile 13/4250/2861 failed: Error ...
 * ```
 */
export function consoleLogger(scope: string, verbose = false): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (verbose) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => console.info(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
