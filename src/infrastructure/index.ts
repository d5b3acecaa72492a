export { loadAnalyticsConfig, DEFAULT_CONFIG } from './config.js';
export type { AnalyticsConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export { RecordingBackend, LoggingBackend } from './backends/index.js';
