import { where, type Query } from '../shared/document-store';
import { NotFoundError } from '../shared/errors';
import { log } from '../shared/log';
import { requireAdmin } from './auth';
import type { ProductFilters, ProductInput, ProductPatch } from './schemas';
import type { Principal, Product, StorefrontStore } from './types';

const LIST_LIMIT = 100;

const product = where<Product>();

/** Compiles listing filters into a product query; only active products are listed. */
export function productQuery(filters: ProductFilters): Query<Product> {
  const query = [product.eq('active', true)];
  if (filters.game) query.push(product.eq('game', filters.game));
  if (filters.reward_type) query.push(product.eq('reward_type', filters.reward_type));
  if (filters.min_price !== undefined) query.push(product.gte('price_cents', filters.min_price));
  if (filters.max_price !== undefined) query.push(product.lte('price_cents', filters.max_price));
  return query;
}

export function createCatalogService(store: StorefrontStore) {
  async function createProduct(input: ProductInput, requester: Principal): Promise<{ id: string }> {
    requireAdmin(requester);
    const now = new Date().toISOString();
    const id = await store.create('product', { ...input, created_at: now, updated_at: now });
    log({ level: 'info', action: 'catalog.product.create', productId: id });
    return { id };
  }

  async function listProducts(filters: ProductFilters): Promise<Product[]> {
    return store.find('product', productQuery(filters), LIST_LIMIT);
  }

  async function getProduct(id: string): Promise<Product> {
    const found = await store.get('product', id);
    if (!found) {
      throw new NotFoundError('Product not found');
    }
    return found;
  }

  /** Merge-patch: only the fields present in `patch` change. */
  async function updateProduct(id: string, patch: ProductPatch, requester: Principal): Promise<Product> {
    requireAdmin(requester);
    const updated = await store.update('product', id, { ...patch, updated_at: new Date().toISOString() });
    if (!updated) {
      throw new NotFoundError('Product not found');
    }
    log({ level: 'info', action: 'catalog.product.update', productId: id, fields: Object.keys(patch) });
    return getProduct(id);
  }

  return { createProduct, listProducts, getProduct, updateProduct };
}

export type CatalogService = ReturnType<typeof createCatalogService>;
