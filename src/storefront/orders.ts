import { where } from '../shared/document-store';
import { NotFoundError } from '../shared/errors';
import { log } from '../shared/log';
import type { ContactMessage, Order, Principal, StorefrontStore } from './types';

const ORDER_LIST_LIMIT = 50;

const order = where<Order>();

export function createOrderService(store: StorefrontStore) {
  /** Admins see every order; everyone else sees the orders placed under their email. */
  async function listOrders(principal: Principal): Promise<Order[]> {
    const query = principal.role === 'admin' ? [] : [order.eq('email', principal.email)];
    return store.find('order', query, ORDER_LIST_LIMIT);
  }

  async function getOrder(id: string, principal: Principal): Promise<Order> {
    const found = await store.get('order', id);
    if (!found || (principal.role !== 'admin' && found.email !== principal.email)) {
      throw new NotFoundError('Order not found');
    }
    return found;
  }

  async function submitContact(input: Omit<ContactMessage, 'id' | 'created_at'>): Promise<{ ok: true; id: string }> {
    const id = await store.create('contact', { ...input, created_at: new Date().toISOString() });
    log({ level: 'info', action: 'contact.submit', contactId: id });
    return { ok: true, id };
  }

  return { listOrders, getOrder, submitContact };
}

export type OrderService = ReturnType<typeof createOrderService>;
