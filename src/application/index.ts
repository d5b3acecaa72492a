export { Analytics } from './analytics.js';
export type { AnalyticsOptions } from './analytics.js';
export { invokeIsolated, backendLabel } from './isolation.js';
