export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { createAnalytics } from './bootstrap.js';
export type { CreateAnalyticsOptions } from './bootstrap.js';
