/**
 * Minimal logging surface used across the client core.
 * Defaults to `console`; callers may inject their own sink (or a silent one in tests).
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export const consoleLogger: Logger = console;

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** Prefix every line with a bracketed component tag, e.g. `[Taxonomy]`. */
export function scopedLogger(base: Logger, scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...meta) => base.debug(`${tag} ${message}`, ...meta),
    info: (message, ...meta) => base.info(`${tag} ${message}`, ...meta),
    warn: (message, ...meta) => base.warn(`${tag} ${message}`, ...meta),
    error: (message, ...meta) => base.error(`${tag} ${message}`, ...meta),
  };
}
