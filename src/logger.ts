import pino, { type DestinationStream, type Logger } from 'pino';

import type { LogLevel } from './config.ts';

export type { Logger };

/**
 * Create the engine's logger. Logs go to stdout as JSON lines unless a
 * `destination` stream is given.
 */
export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options = { name: 'memcast', level };
  return destination ? pino(options, destination) : pino(options);
}
