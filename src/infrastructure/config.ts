import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Analytics runtime configuration, read from environment variables.
 */
export interface AnalyticsConfig {
  logLevel: LogLevel;
  /** Registers the logging backend ahead of every other backend. */
  debug: boolean;
  loggerName: string;
}

/**
 * Default configuration: info-level logs, debug backend off.
 */
export const DEFAULT_CONFIG: AnalyticsConfig = {
  logLevel: 'info',
  debug: false,
  loggerName: 'analytics',
};

const logLevelSchema = z.enum(LOG_LEVELS);

const flagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v) => v === 'true' || v === '1');

const loggerNameSchema = z.string().trim().min(1).max(64);

function pick<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string | undefined, fallback: T): T {
  if (raw === undefined) return fallback;
  const result = schema.safeParse(raw);
  return result.success ? result.data : fallback;
}

/**
 * Loads configuration from `env` (defaults to `process.env`).
 *
 * Each field is validated on its own; a missing or invalid value falls
 * back to its DEFAULT_CONFIG entry, so this never throws.
 */
export function loadAnalyticsConfig(
  env: Record<string, string | undefined> = process.env,
): AnalyticsConfig {
  return {
    logLevel: pick(logLevelSchema, env['ANALYTICS_LOG_LEVEL']?.trim().toLowerCase(), DEFAULT_CONFIG.logLevel),
    debug: pick(flagSchema, env['ANALYTICS_DEBUG'], DEFAULT_CONFIG.debug),
    loggerName: pick(loggerNameSchema, env['ANALYTICS_LOGGER_NAME'], DEFAULT_CONFIG.loggerName),
  };
}
