import { errorMessage, log } from '../shared/log';
import { bearerToken, createRouter, ok, type ApiHandler, type RouteRequest } from '../shared/http';
import { parseRequest } from '../shared/validation';
import { createAuthService } from './auth';
import { createCatalogService } from './catalog';
import { createCheckoutService } from './checkout';
import { createInventoryService } from './inventory';
import { createOrderService } from './orders';
import type { PaymentGateway } from './payments';
import {
  addCodesSchema,
  checkoutConfirmSchema,
  checkoutInitSchema,
  contactSchema,
  loginSchema,
  productFiltersSchema,
  productPatchSchema,
  productSchema,
  registerSchema,
} from './schemas';
import type { Principal, StorefrontStore } from './types';

export interface StorefrontDeps {
  store: StorefrontStore;
  payments: PaymentGateway;
  jwtSecret: string;
  siteName: string;
}

const SERVICE = 'storefront';

export function createStorefrontHandler(deps: StorefrontDeps): ApiHandler {
  const { store } = deps;
  const auth = createAuthService({ store, jwtSecret: deps.jwtSecret });
  const catalog = createCatalogService(store);
  const inventory = createInventoryService(store);
  const checkout = createCheckoutService({ store, inventory, payments: deps.payments });
  const orders = createOrderService(store);

  const principal = (req: RouteRequest): Promise<Principal> => auth.authenticate(bearerToken(req.event));

  /** Checkout accepts guests; a valid token links the order to its user. */
  async function optionalPrincipal(req: RouteRequest): Promise<Principal | undefined> {
    const token = bearerToken(req.event);
    return token ? auth.authenticate(token) : undefined;
  }

  return createRouter(SERVICE, [
    // Health
    {
      method: 'GET',
      path: '/',
      handle: async () => ok({ ok: true, service: 'Game Codes Store API', site: deps.siteName }),
    },
    {
      method: 'GET',
      path: '/test',
      handle: async () => {
        let db = true;
        try {
          await store.ping();
        } catch (err) {
          db = false;
          log({ level: 'warn', action: `${SERVICE}.ping.failed`, error: errorMessage(err) });
        }
        return ok({ ok: true, db });
      },
    },

    // Auth
    {
      method: 'POST',
      path: '/api/auth/register',
      handle: async (req) => ok(await auth.register(parseRequest(registerSchema, req.body))),
    },
    {
      method: 'POST',
      path: '/api/auth/login',
      handle: async (req) => ok(await auth.login(parseRequest(loginSchema, req.body))),
    },

    // Catalog
    {
      method: 'GET',
      path: '/api/products',
      handle: async (req) => ok(await catalog.listProducts(parseRequest(productFiltersSchema, req.query))),
    },
    {
      method: 'GET',
      path: '/api/products/:id',
      handle: async (req) => ok(await catalog.getProduct(req.params['id'] ?? '')),
    },
    {
      method: 'POST',
      path: '/api/admin/products',
      handle: async (req) => {
        const requester = await principal(req);
        return ok(await catalog.createProduct(parseRequest(productSchema, req.body), requester));
      },
    },
    {
      method: 'PATCH',
      path: '/api/admin/products/:id',
      handle: async (req) => {
        const requester = await principal(req);
        return ok(await catalog.updateProduct(req.params['id'] ?? '', parseRequest(productPatchSchema, req.body), requester));
      },
    },

    // Code inventory
    {
      method: 'POST',
      path: '/api/admin/codes',
      handle: async (req) => {
        const requester = await principal(req);
        const payload = parseRequest(addCodesSchema, req.body);
        return ok(await inventory.addCodes(payload.product_id, payload.codes, requester));
      },
    },
    {
      method: 'GET',
      path: '/api/admin/codes/:productId/stock',
      handle: async (req) => ok(await inventory.countAvailable(req.params['productId'] ?? '', await principal(req))),
    },

    // Checkout
    {
      method: 'POST',
      path: '/api/checkout/init',
      handle: async (req) => {
        const payload = parseRequest(checkoutInitSchema, req.body);
        return ok(await checkout.initCheckout(payload, await optionalPrincipal(req)));
      },
    },
    {
      method: 'POST',
      path: '/api/checkout/confirm',
      handle: async (req) => {
        const payload = parseRequest(checkoutConfirmSchema, req.body);
        return ok(await checkout.confirmCheckout(payload.order_id, payload.provider));
      },
    },

    // Orders
    {
      method: 'GET',
      path: '/api/orders',
      handle: async (req) => ok(await orders.listOrders(await principal(req))),
    },
    {
      method: 'GET',
      path: '/api/orders/:id',
      handle: async (req) => ok(await orders.getOrder(req.params['id'] ?? '', await principal(req))),
    },

    // Contact
    {
      method: 'POST',
      path: '/api/contact',
      handle: async (req) => ok(await orders.submitContact(parseRequest(contactSchema, req.body))),
    },
  ]);
}
