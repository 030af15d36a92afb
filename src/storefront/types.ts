import type { DocumentStore } from '../shared/document-store';

export type Role = 'user' | 'admin';

export type OrderStatus = 'pending' | 'paid' | 'failed' | 'refunded' | 'fulfilled';

export type PaymentProvider = 'stripe' | 'paypal';

export interface Product {
  id: string;
  title: string;
  game: string;        // e.g. Fortnite, Roblox, Minecraft
  reward_type: string; // e.g. skin, coins, item, bonus
  description: string;
  images: string[];
  price_cents: number; // non-negative integer
  currency: string;    // lower-case ISO 4217, e.g. "usd"
  active: boolean;
  tags: string[];
  created_at: string;  // ISO 8601 timestamp
  updated_at: string;
}

export interface CodeKey {
  id: string;
  product_id: string;
  code: string;
  assigned: boolean;
  order_id: string | null; // set exactly when assigned
  created_at: string;
  updated_at: string;
}

export interface CartItem {
  product_id: string;
  quantity: number; // integer 1..10
}

export interface Order {
  id: string;
  user_id: string | null;
  email: string;
  name: string | null;
  items: CartItem[];
  subtotal_cents: number;
  total_cents: number; // equals subtotal_cents: no tax or discounts
  currency: string;
  payment_intent_id: string | null;
  payment_provider: PaymentProvider | null;
  status: OrderStatus;
  delivered_codes: string[];
  created_at: string;
  updated_at: string;
}

export interface User {
  id: string;
  email: string;
  name: string | null;
  password_hash: string;
  role: Role;
  created_at: string;
  updated_at: string;
}

export interface ContactMessage {
  id: string;
  email: string;
  subject: string;
  message: string;
  created_at: string;
}

/** Collections of the storefront's document store. */
export type StorefrontCollections = {
  product: Product;
  codekey: CodeKey;
  order: Order;
  user: User;
  contact: ContactMessage;
};

/** The authenticated caller, resolved from a bearer token. */
export interface Principal {
  id: string;
  email: string;
  role: Role;
}

export type StorefrontStore = DocumentStore<StorefrontCollections>;
