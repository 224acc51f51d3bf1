/**
 * Simple logger interface for the cachegate gateway.
 * @packageDocumentation
 */

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const debugEnabled = (): boolean => Boolean(process.env['CACHEGATE_DEBUG']);

/** Console logger with a `[cachegate:<scope>]` prefix. */
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[cachegate:${scope}]` : '[cachegate]';
  return {
    debug: (msg, ...args) => {
      if (debugEnabled()) console.debug(`${prefix} ${msg}`, ...args);
    },
    info: (msg, ...args) => console.log(`${prefix} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix} ${msg}`, ...args),
  };
}

export const defaultLogger: Logger = createLogger();

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
