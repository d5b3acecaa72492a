import type { Level, Logger } from 'pino';
import type { AnalyticsBackend, View, Event, Purchase } from '../../domain/index.js';

/**
 * Debug backend. Writes each tracking call as one structured log line.
 *
 * No vendor integration; useful during development to see what the
 * app would send.
 */
export class LoggingBackend implements AnalyticsBackend {
  readonly name = 'logging';

  constructor(
    private readonly log: Logger,
    private readonly level: Level = 'debug',
  ) {}

  logView(view: View): void {
    this.log[this.level]({ view: view.name, parameters: view.parameters }, 'Analytics view');
  }

  logEvent(event: Event): void {
    this.log[this.level]({ event: event.name, parameters: event.parameters }, 'Analytics event');
  }

  logPurchase(purchase: Purchase): void {
    this.log[this.level](
      {
        transaction_id: purchase.transactionId,
        name: purchase.name,
        price: purchase.price,
        currency: purchase.currency,
        category: purchase.category,
        sku: purchase.sku,
        success: purchase.success,
        coupon: purchase.coupon,
      },
      'Analytics purchase',
    );
  }

  setUserProperty(value: string | null, key: string): void {
    this.log[this.level]({ key, value }, 'Analytics user property');
  }
}
