import { pino, type Logger } from 'pino';
import type { AnalyticsBackend, BackendCall, Trackable } from '../domain/index.js';
import { invokeIsolated } from './isolation.js';

export interface AnalyticsOptions {
  /** Receives backend failures. Defaults to a silent logger. */
  logger?: Logger;
}

/**
 * Fan-out dispatcher. Forwards every tracking call to each registered
 * backend, in registration order, on the caller's turn of the event loop.
 *
 * The registration list is an immutable array replaced on `register()`.
 * A dispatch reads it once, so a backend registered while a dispatch is
 * running receives only later calls.
 */
export class Analytics {
  private backends: readonly AnalyticsBackend[] = [];
  private readonly logger: Logger;

  constructor(options: AnalyticsOptions = {}) {
    this.logger = options.logger ?? pino({ level: 'silent' });
  }

  /**
   * Appends backends to the end of the list, in the order given.
   * The same instance registered twice receives every call twice.
   */
  register(backends: readonly AnalyticsBackend[]): void {
    if (backends.length === 0) return;
    this.backends = [...this.backends, ...backends];
    this.logger.debug({ registered: backends.length, total: this.backends.length }, 'Analytics backends registered');
  }

  log(trackable: Trackable): void {
    switch (trackable.kind) {
      case 'view': {
        const view = trackable;
        this.fanOut('logView', (backend) => backend.logView(view));
        break;
      }
      case 'event': {
        const event = trackable;
        this.fanOut('logEvent', (backend) => backend.logEvent(event));
        break;
      }
      case 'purchase': {
        const purchase = trackable;
        this.fanOut('logPurchase', (backend) => backend.logPurchase(purchase));
        break;
      }
    }
  }

  /** `null` is passed through as-is; what clearing means is up to each backend. */
  setUserProperty(value: string | null, key: string): void {
    this.fanOut('setUserProperty', (backend) => backend.setUserProperty(value, key));
  }

  /** Number of registrations, duplicates included. */
  get size(): number {
    return this.backends.length;
  }

  private fanOut(
    call: BackendCall,
    invoke: (backend: AnalyticsBackend) => void | Promise<void>,
  ): void {
    const snapshot = this.backends;

    for (const backend of snapshot) {
      invokeIsolated(this.logger, backend, call, () => invoke(backend));
    }
  }
}
