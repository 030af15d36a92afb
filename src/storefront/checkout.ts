import { where } from '../shared/document-store';
import { BadRequestError, ConflictError, NotFoundError } from '../shared/errors';
import { errorMessage, log } from '../shared/log';
import type { InventoryService } from './inventory';
import type { PaymentGateway } from './payments';
import { calculatePricing } from './pricing';
import type { CheckoutInitRequest } from './schemas';
import type { CodeKey, Order, PaymentProvider, Principal, Product, StorefrontStore } from './types';

export interface CheckoutInitResponse {
  order_id: string;
  total_cents: number;
  client_secret: string | null;
}

export interface CheckoutConfirmResponse {
  order_id: string;
  codes: string[];
}

export interface CheckoutDeps {
  store: StorefrontStore;
  inventory: InventoryService;
  payments: PaymentGateway;
}

const order = where<Order>();

export function createCheckoutService({ store, inventory, payments }: CheckoutDeps) {
  async function loadProducts(productIds: string[]): Promise<Map<string, Product>> {
    const products = new Map<string, Product>();
    for (const productId of productIds) {
      if (products.has(productId)) continue;
      const product = await store.get('product', productId);
      if (!product || !product.active) {
        throw new BadRequestError(`Invalid product ${productId}`);
      }
      products.set(productId, product);
    }
    return products;
  }

  async function initCheckout(req: CheckoutInitRequest, requester?: Principal): Promise<CheckoutInitResponse> {
    const start = Date.now();

    // 1. Recalculate total server-side from catalog prices
    const products = await loadProducts(req.items.map(item => item.product_id));
    const pricing = calculatePricing(req.items, products);

    // 2. Persist the order before talking to the payment provider
    const now = new Date().toISOString();
    const orderId = await store.create('order', {
      user_id: requester?.id ?? null,
      email: req.email,
      name: req.name ?? null,
      items: req.items.map(item => ({ product_id: item.product_id, quantity: item.quantity })),
      subtotal_cents: pricing.subtotal_cents,
      total_cents: pricing.total_cents,
      currency: pricing.currency,
      payment_intent_id: null,
      payment_provider: null,
      status: 'pending',
      delivered_codes: [],
      created_at: now,
      updated_at: now,
    });
    log({ level: 'info', action: 'checkout.init', orderId, total: pricing.total_cents, currency: pricing.currency });

    // 3. Open a payment intent; a failure never blocks the order
    const intent = await payments.createIntent(pricing.total_cents, pricing.currency, orderId);
    if (intent) {
      await store.update('order', orderId, { payment_intent_id: intent.id, updated_at: new Date().toISOString() });
    }

    log({ level: 'info', action: 'checkout.init.complete', orderId, paymentIntent: intent !== null, durationMs: Date.now() - start });
    return { order_id: orderId, total_cents: pricing.total_cents, client_secret: intent?.clientSecret ?? null };
  }

  /**
   * Allocates codes for every line of a pending order and marks it fulfilled.
   * All-or-nothing: if any line is short of stock or a store call fails, every
   * code claimed for the order is released and the order stays pending.
   */
  async function confirmCheckout(orderId: string, provider: PaymentProvider): Promise<CheckoutConfirmResponse> {
    const start = Date.now();
    const existing = await store.get('order', orderId);
    if (!existing) {
      throw new NotFoundError('Order not found');
    }

    // Repeat confirmation of a fulfilled order returns the same codes
    if (existing.status === 'fulfilled') {
      log({ level: 'info', action: 'checkout.confirm.duplicate', orderId });
      return { order_id: orderId, codes: existing.delivered_codes };
    }
    if (existing.status !== 'pending') {
      throw new ConflictError(`Order is ${existing.status}`);
    }

    const claimed: CodeKey[] = [];
    let fulfilled: boolean;
    try {
      for (const item of existing.items) {
        const codes = await inventory.reserve(item.product_id, item.quantity, orderId);
        claimed.push(...codes);
        if (codes.length < item.quantity) {
          log({ level: 'warn', action: 'checkout.confirm.insufficient_stock', orderId, productId: item.product_id, requested: item.quantity, available: codes.length });
          throw new ConflictError('Insufficient stock');
        }
      }

      fulfilled = await store.update(
        'order',
        orderId,
        { status: 'fulfilled', delivered_codes: claimed.map(code => code.code), payment_provider: provider, updated_at: new Date().toISOString() },
        [order.eq('status', 'pending')]
      );
    } catch (err) {
      // No code claimed by this attempt outlives it
      await inventory.release(claimed, orderId);
      if (!(err instanceof ConflictError)) {
        log({ level: 'error', action: 'checkout.confirm.failed', orderId, released: claimed.length, error: errorMessage(err), durationMs: Date.now() - start });
      }
      throw err;
    }

    const delivered = claimed.map(code => code.code);
    if (!fulfilled) {
      // Another confirmation of the same order won the race
      await inventory.release(claimed, orderId);
      const current = await store.get('order', orderId);
      if (current?.status === 'fulfilled') {
        log({ level: 'info', action: 'checkout.confirm.duplicate', orderId });
        return { order_id: orderId, codes: current.delivered_codes };
      }
      throw new ConflictError(`Order is ${current?.status ?? 'missing'}`);
    }

    log({ level: 'info', action: 'checkout.confirm.complete', orderId, codes: delivered.length, durationMs: Date.now() - start });
    return { order_id: orderId, codes: delivered };
  }

  return { initCheckout, confirmCheckout };
}

export type CheckoutService = ReturnType<typeof createCheckoutService>;
