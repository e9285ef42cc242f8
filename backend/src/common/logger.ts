/**
 * LOGGER CONTRACT
 * ===============
 *
 * Components take a Logger instead of writing to the console directly. The
 * server hands them tagged console loggers (`[Sources]`, `[SignalRefresh]`);
 * tests hand them `vi.fn()` spies.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  info: (obj: LogContext, msg?: string) => void;
  warn: (obj: LogContext, msg?: string) => void;
  error: (obj: LogContext, msg?: string) => void;
  debug?: (obj: LogContext, msg?: string) => void;
}

/**
 * Console-backed logger with a `[Tag]` prefix.
 */
export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.log(`[${tag}] ${msg || ''}`, obj),
    warn: (obj, msg) => console.warn(`[${tag}] ${msg || ''}`, obj),
    error: (obj, msg) => console.error(`[${tag}] ${msg || ''}`, obj),
    debug: (obj, msg) => console.debug(`[${tag}] ${msg || ''}`, obj),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
