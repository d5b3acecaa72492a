/**
 * Trackable descriptors: the data-only values handed to the dispatcher.
 *
 * View and Event share a shape; the `kind` discriminant is what lets a
 * single `log()` entry point route them to the right backend operation.
 * They carry no framework dependencies.
 */

/** Scalar value allowed in a parameter map. */
export type ParameterValue = string | number | boolean | null;

/** Free-form key/value parameters attached to a view or event. */
export type Parameters = Readonly<Record<string, ParameterValue>>;

/** A screen or page shown to the user. */
export interface View {
  readonly kind: 'view';
  readonly name: string;
  readonly parameters: Parameters | null;
}

/** A discrete user action. */
export interface Event {
  readonly kind: 'event';
  readonly name: string;
  readonly parameters: Parameters | null;
}

/**
 * A commerce transaction.
 *
 * `transactionId` is assigned at construction if the caller does not
 * supply one, so every purchase is addressable.
 */
export interface Purchase {
  readonly kind: 'purchase';
  readonly transactionId: string;
  readonly price: number;
  readonly name: string;
  readonly currency: string;
  readonly category: string;
  readonly sku: string;
  readonly success: boolean;
  readonly coupon: string | null;
}

export type Trackable = View | Event | Purchase;

export interface PurchaseInput {
  transactionId?: string;
  price: number;
  name: string;
  currency: string;
  category: string;
  sku: string;
  success: boolean;
  coupon?: string | null;
}

function freezeParameters(parameters: Parameters | null | undefined): Parameters | null {
  if (parameters == null) return null;
  return Object.freeze({ ...parameters });
}

export function createView(name: string, parameters?: Parameters | null): View {
  const view: View = {
    kind: 'view',
    name,
    parameters: freezeParameters(parameters),
  };
  return Object.freeze(view);
}

export function createEvent(name: string, parameters?: Parameters | null): Event {
  const event: Event = {
    kind: 'event',
    name,
    parameters: freezeParameters(parameters),
  };
  return Object.freeze(event);
}

export function createPurchase(input: PurchaseInput): Purchase {
  const purchase: Purchase = {
    kind: 'purchase',
    transactionId: input.transactionId ?? globalThis.crypto.randomUUID(),
    price: input.price,
    name: input.name,
    currency: input.currency,
    category: input.category,
    sku: input.sku,
    success: input.success,
    coupon: input.coupon ?? null,
  };
  return Object.freeze(purchase);
}
