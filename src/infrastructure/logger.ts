import { pino, type DestinationStream, type Logger } from 'pino';
import type { AnalyticsConfig } from './config.js';

/** Writes to stdout unless a destination is given. */
export function createLogger(
  config: Pick<AnalyticsConfig, 'logLevel' | 'loggerName'>,
  destination?: DestinationStream,
): Logger {
  const options = { name: config.loggerName, level: config.logLevel };
  return destination ? pino(options, destination) : pino(options);
}
