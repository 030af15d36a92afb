import { where } from '../shared/document-store';
import { BadRequestError, DuplicateDocumentError, NotFoundError } from '../shared/errors';
import { errorMessage, log } from '../shared/log';
import { requireAdmin } from './auth';
import type { CodeKey, Principal, StorefrontStore } from './types';

/** Consecutive candidate rounds that may all be lost to other claimants before giving up. */
const MAX_CONTENDED_ROUNDS = 5;
const STOCK_SCAN_LIMIT = 10_000;

const codeKey = where<CodeKey>();

export interface AddCodesResult {
  inserted: string[];
  /** Codes skipped because they already exist in the store. */
  duplicates: string[];
}

export interface ReleaseResult {
  released: number;
  /** Ids of codes whose release write failed; they stay assigned to the order. */
  failed: string[];
}

export function createInventoryService(store: StorefrontStore) {
  async function addCodes(productId: string, codes: string[], requester: Principal): Promise<AddCodesResult> {
    requireAdmin(requester);
    if (!(await store.get('product', productId))) {
      throw new NotFoundError('Product not found');
    }

    const seen = new Set<string>();
    for (const code of codes) {
      if (seen.has(code)) {
        throw new BadRequestError(`Duplicate code in import: ${code}`);
      }
      seen.add(code);
    }

    const result: AddCodesResult = { inserted: [], duplicates: [] };
    for (const code of codes) {
      const now = new Date().toISOString();
      try {
        const id = await store.create(
          'codekey',
          { product_id: productId, code, assigned: false, order_id: null, created_at: now, updated_at: now },
          { unique: 'code' }
        );
        result.inserted.push(id);
      } catch (err) {
        if (!(err instanceof DuplicateDocumentError)) throw err;
        result.duplicates.push(code);
      }
    }

    log({ level: 'info', action: 'inventory.codes.add', productId, inserted: result.inserted.length, duplicates: result.duplicates.length });
    return result;
  }

  /**
   * Claims up to `quantity` unassigned codes of a product for an order. Each
   * claim is a conditional write on `assigned = false`, so a code can only
   * ever be handed to one order. May return fewer codes than requested; if a
   * store call fails, the codes claimed so far are released before rethrowing.
   */
  async function reserve(productId: string, quantity: number, orderId: string): Promise<CodeKey[]> {
    const claimed: CodeKey[] = [];
    let contendedRounds = 0;

    try {
      while (claimed.length < quantity && contendedRounds < MAX_CONTENDED_ROUNDS) {
        const candidates = await store.find(
          'codekey',
          [codeKey.eq('product_id', productId), codeKey.eq('assigned', false)],
          quantity - claimed.length
        );
        if (candidates.length === 0) break;

        const before = claimed.length;
        for (const candidate of candidates) {
          const updated_at = new Date().toISOString();
          const won = await store.update(
            'codekey',
            candidate.id,
            { assigned: true, order_id: orderId, updated_at },
            [codeKey.eq('assigned', false)]
          );
          if (won) {
            claimed.push({ ...candidate, assigned: true, order_id: orderId, updated_at });
          }
        }
        contendedRounds = claimed.length === before ? contendedRounds + 1 : 0;
      }
    } catch (err) {
      await release(claimed, orderId);
      throw err;
    }

    log({ level: 'info', action: 'inventory.reserve', productId, orderId, requested: quantity, claimed: claimed.length });
    return claimed;
  }

  /**
   * Returns codes claimed by `orderId` to the pool. Runs as a rollback, so a
   * failed write is logged and the remaining codes are still released.
   */
  async function release(codes: CodeKey[], orderId: string): Promise<ReleaseResult> {
    const result: ReleaseResult = { released: 0, failed: [] };
    for (const code of codes) {
      let released: boolean;
      try {
        released = await store.update(
          'codekey',
          code.id,
          { assigned: false, order_id: null, updated_at: new Date().toISOString() },
          [codeKey.eq('assigned', true), codeKey.eq('order_id', orderId)]
        );
      } catch (err) {
        log({ level: 'error', action: 'inventory.release.failed', orderId, productId: code.product_id, codeId: code.id, error: errorMessage(err) });
        result.failed.push(code.id);
        continue;
      }
      if (released) {
        result.released++;
      } else {
        log({ level: 'warn', action: 'inventory.release.skipped', orderId, productId: code.product_id, codeId: code.id });
      }
    }
    log({ level: 'info', action: 'inventory.release', orderId, released: result.released, failed: result.failed.length });
    return result;
  }

  async function countAvailable(productId: string, requester: Principal): Promise<{ product_id: string; available: number }> {
    requireAdmin(requester);
    const available = await store.find(
      'codekey',
      [codeKey.eq('product_id', productId), codeKey.eq('assigned', false)],
      STOCK_SCAN_LIMIT
    );
    return { product_id: productId, available: available.length };
  }

  return { addCodes, reserve, release, countAvailable };
}

export type InventoryService = ReturnType<typeof createInventoryService>;
