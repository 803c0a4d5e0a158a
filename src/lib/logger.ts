/**
 * Prefixed console logging
 *
 * - debug/info: development only (NODE_ENV !== "production")
 * - warn/error: always; errors carry an ISO timestamp
 *
 * Usage:
 *   import { engineLog } from './lib/logger';
 *   engineLog.debug('Spectrum ready', snapshot);
 *   engineLog.child('Audio').warn('Short PCM block');  // [Engine:Audio] ...
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger whose prefix extends this one's as `parent:sub` */
  child(subPrefix: string): Logger;
}

function isDev(): boolean {
  return process.env.NODE_ENV !== "production";
}

function format(prefix: string, message: string, timestamp = false): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export function createLogger(prefix: string): Logger {
  return {
    debug(message, ...args) {
      if (isDev()) console.debug(format(prefix, message), ...args);
    },
    info(message, ...args) {
      if (isDev()) console.info(format(prefix, message), ...args);
    },
    warn(message, ...args) {
      console.warn(format(prefix, message), ...args);
    },
    error(message, ...args) {
      console.error(format(prefix, message, true), ...args);
    },
    child(subPrefix) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// Module loggers
export const engineLog = createLogger("Engine");
export const calibLog = createLogger("Calib");
export const audioLog = createLogger("Audio");
export const powerLog = createLogger("Power");
export const sessionLog = createLogger("Session");
