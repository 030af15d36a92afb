import { BadRequestError } from '../shared/errors';
import type { CartItem, Product } from './types';

export interface PricedLine extends CartItem {
  unit_price_cents: number;
  line_total_cents: number;
}

export interface PricingResult {
  items: PricedLine[];
  subtotal_cents: number;
  total_cents: number;
  currency: string;
}

/**
 * Prices a cart against catalog prices. `products` is keyed by product id and
 * must hold every product the cart names. No taxes, fees or discounts are
 * modelled, so the total equals the subtotal.
 */
export function calculatePricing(items: CartItem[], products: ReadonlyMap<string, Product>): PricingResult {
  const lines: PricedLine[] = items.map(item => {
    const product = products.get(item.product_id);
    if (!product) {
      throw new BadRequestError(`Invalid product ${item.product_id}`);
    }
    return {
      ...item,
      unit_price_cents: product.price_cents,
      line_total_cents: product.price_cents * item.quantity,
    };
  });

  const currencies = new Set(items.map(item => products.get(item.product_id)?.currency ?? 'usd'));
  if (currencies.size > 1) {
    throw new BadRequestError('Mixed currencies in cart');
  }
  const [currency = 'usd'] = currencies;

  const subtotal_cents = lines.reduce((sum, line) => sum + line.line_total_cents, 0);

  return { items: lines, subtotal_cents, total_cents: subtotal_cents, currency };
}
