/**
 * Console logging for the engine. Only `error` is written when NODE_ENV is
 * production.
 */

import { isProduction } from './config';

type LogMethod = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function callConsole(method: LogMethod, args: unknown[]): void {
  if (typeof console === 'undefined') return;
  const fn: unknown = console[method];
  if (typeof fn === 'function') {
    Reflect.apply(fn, console, args);
  }
}

export const logger: Logger = {
  debug: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('debug', args);
  },

  info: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('info', args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole('warn', args);
  },

  error: (...args: unknown[]) => {
    callConsole('error', args);
  },
};

/** Logger whose lines start with `[Trellis:<namespace>]`. */
export function createLogger(namespace: string): Logger {
  const prefix = `[Trellis:${namespace}]`;
  return {
    debug: (...args: unknown[]) => logger.debug(prefix, ...args),
    info: (...args: unknown[]) => logger.info(prefix, ...args),
    warn: (...args: unknown[]) => logger.warn(prefix, ...args),
    error: (...args: unknown[]) => logger.error(prefix, ...args),
  };
}
