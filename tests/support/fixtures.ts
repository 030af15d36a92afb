import type { NewDocument } from '../../src/shared/document-store';
import type { Principal, Product, StorefrontCollections } from '../../src/storefront/types';
import { MemoryStore } from './memory-store';

export const TIMESTAMP = '2024-01-01T00:00:00.000Z';

export const ADMIN: Principal = { id: 'admin-1', email: 'admin@example.com', role: 'admin' };
export const CUSTOMER: Principal = { id: 'user-1', email: 'buyer@example.com', role: 'user' };

export function createStorefrontStore(): MemoryStore<StorefrontCollections> {
  return new MemoryStore<StorefrontCollections>();
}

export function productInput(overrides: Partial<NewDocument<Product>> = {}): NewDocument<Product> {
  return {
    title: 'Starter Skin Pack',
    game: 'Fortnite',
    reward_type: 'skin',
    description: 'Three starter skins',
    images: [],
    price_cents: 1999,
    currency: 'usd',
    active: true,
    tags: ['starter'],
    created_at: TIMESTAMP,
    updated_at: TIMESTAMP,
    ...overrides,
  };
}

export function seedProduct(
  store: MemoryStore<StorefrontCollections>,
  overrides: Partial<NewDocument<Product>> = {}
): Promise<string> {
  return store.create('product', productInput(overrides));
}

export async function seedCodes(store: MemoryStore<StorefrontCollections>, productId: string, codes: string[]): Promise<void> {
  for (const code of codes) {
    await store.create(
      'codekey',
      { product_id: productId, code, assigned: false, order_id: null, created_at: TIMESTAMP, updated_at: TIMESTAMP },
      { unique: 'code' }
    );
  }
}

export function silenceLogs(): jest.SpyInstance {
  return jest.spyOn(console, 'log').mockImplementation(() => undefined);
}

/** Parsed JSON log entries written through `console.log`. */
export function loggedEntries(spy: jest.SpyInstance): Array<Record<string, unknown>> {
  return spy.mock.calls.map((call: unknown[]) => JSON.parse(String(call[0])) as Record<string, unknown>);
}
