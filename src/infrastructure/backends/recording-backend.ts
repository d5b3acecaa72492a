import type { AnalyticsBackend, View, Event, Purchase } from '../../domain/index.js';

/**
 * In-memory backend that keeps every call it receives.
 *
 * Meant for tests and local inspection. `userProperties` stores a cleared
 * property as an explicit `null`, so `has(key)` tells "cleared" apart
 * from "never set".
 */
export class RecordingBackend implements AnalyticsBackend {
  readonly name: string;
  readonly views: View[] = [];
  readonly events: Event[] = [];
  readonly purchases: Purchase[] = [];
  readonly userProperties = new Map<string, string | null>();

  constructor(name = 'recording') {
    this.name = name;
  }

  logView(view: View): void {
    this.views.push(view);
  }

  logEvent(event: Event): void {
    this.events.push(event);
  }

  logPurchase(purchase: Purchase): void {
    this.purchases.push(purchase);
  }

  setUserProperty(value: string | null, key: string): void {
    this.userProperties.set(key, value);
  }

  reset(): void {
    this.views.length = 0;
    this.events.length = 0;
    this.purchases.length = 0;
    this.userProperties.clear();
  }
}
