/**
 * StatusQuota Logging
 *
 * stdout belongs to the status line, so every diagnostic goes to stderr
 * with a bracketed component tag, e.g. "[Coordinator] Cache is 74s old".
 */

import { config } from '../config.js';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string, verbose = config.debug): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (verbose) console.error(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (verbose) console.error(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}
