export type {
  ParameterValue,
  Parameters,
  View,
  Event,
  Purchase,
  PurchaseInput,
  Trackable,
} from './descriptors.js';
export { createView, createEvent, createPurchase } from './descriptors.js';
export type { AnalyticsBackend, BackendCall } from './backend.js';
