/**
 * Logger interface, compatible with console, pino, winston and similar.
 *
 * Stream decoders take a logger option; pass null to disable logging.
 */
export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/** Default logger */
export const consoleLogger: Logger = console;

/** Noop logger for disabling logs */
export const noopLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Resolves a logger option: undefined means the default, null means off.
 */
export function resolveLogger(logger: Logger | null | undefined): Logger {
  if (logger === undefined) {
    return consoleLogger;
  }
  return logger ?? noopLogger;
}
