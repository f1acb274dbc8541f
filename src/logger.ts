/**
 * Logging
 *
 * Every component takes an optional pino `Logger` and derives a child bound to
 * its component name. Without one, the package-wide default logger is used.
 */

import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/** Paths removed from every log entry */
export const REDACTED_PATHS = [
  'authToken',
  '*.authToken',
  'headers.authorization',
  'headers.Authorization',
];

export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const merged: LoggerOptions = {
    name: 'lakequery',
    level: 'info',
    ...options,
    redact: { paths: REDACTED_PATHS, remove: true },
  };
  return destination ? pino(merged, destination) : pino(merged);
}

export const defaultLogger: Logger = createLogger();

export function componentLogger(component: string, logger?: Logger): Logger {
  return (logger ?? defaultLogger).child({ component });
}
