import { vi } from 'vitest';
import { createPurchase, type Purchase, type PurchaseInput } from '../src/domain/index.js';

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

/**
 * Factory for test purchases with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makePurchase(overrides: Partial<PurchaseInput> = {}): Purchase {
  return createPurchase({
    transactionId: 'test_txn_123',
    price: 9.99,
    name: 'Test Product',
    currency: 'USD',
    category: 'test',
    sku: 'test_sku',
    success: true,
    ...overrides,
  });
}
