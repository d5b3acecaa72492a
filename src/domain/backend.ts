import type { View, Event, Purchase } from './descriptors.js';

/** Backend operations the dispatcher fans out to. */
export type BackendCall = 'logView' | 'logEvent' | 'logPurchase' | 'setUserProperty';

/**
 * One analytics destination (a vendor SDK, a warehouse sink, a debug log).
 *
 * Implementations own their failure handling. The dispatcher gives them
 * no error channel: a thrown error or a rejected promise is logged and
 * dropped, and a returned promise is never awaited.
 */
export interface AnalyticsBackend {
  /** Label used when a call into this backend fails. */
  readonly name?: string;

  logView(view: View): void | Promise<void>;
  logEvent(event: Event): void | Promise<void>;
  logPurchase(purchase: Purchase): void | Promise<void>;

  /** `value === null` asks the backend to clear `key`. */
  setUserProperty(value: string | null, key: string): void | Promise<void>;
}
