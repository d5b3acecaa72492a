import type { Logger } from 'pino';
import { Analytics } from './application/index.js';
import type { AnalyticsBackend } from './domain/index.js';
import {
  createLogger,
  loadAnalyticsConfig,
  LoggingBackend,
  type AnalyticsConfig,
} from './infrastructure/index.js';

export interface CreateAnalyticsOptions {
  config?: AnalyticsConfig;
  logger?: Logger;
  backends?: readonly AnalyticsBackend[];
}

/**
 * Builds a ready-to-use dispatcher.
 *
 * Order:
 * 1) Config (from the environment unless given)
 * 2) Logger
 * 3) Logging backend, when `config.debug` is on
 * 4) Caller's backends, in the order given
 */
export function createAnalytics(options: CreateAnalyticsOptions = {}): Analytics {
  const config = options.config ?? loadAnalyticsConfig();
  const log = options.logger ?? createLogger(config);

  const analytics = new Analytics({ logger: log });

  // info: visible at the default log level
  if (config.debug) {
    analytics.register([new LoggingBackend(log, 'info')]);
  }

  analytics.register(options.backends ?? []);

  log.debug({ backends: analytics.size, debug: config.debug }, 'Analytics ready');

  return analytics;
}
