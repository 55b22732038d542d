/**
 * SCOPED CONSOLE LOGGER
 *
 * Every component receives a logger instead of calling console directly,
 * so tests can pass a silent one and scopes stay consistent.
 */

export interface Logger {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
  child: (scope: string) => Logger;
}

export interface LoggerOptions {
  debug?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  return {
    info: (msg, data) => console.log(`${prefix} ${msg}`, data ?? ""),
    warn: (msg, data) => console.warn(`${prefix} ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`${prefix} ${msg}`, data ?? ""),
    debug: (msg, data) => {
      if (options.debug) console.log(`${prefix} ${msg}`, data ?? "");
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`, options),
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop,
  child: () => silentLogger,
};
