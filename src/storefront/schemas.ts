import { z } from 'zod';

const priceCents = z.number().int('price_cents must be an integer (cents)').min(0, 'price_cents must be >= 0');

export const registerSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1, 'Password required'),
  name: z.string().optional(),
});

export const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1, 'Password required'),
});

export const productSchema = z.object({
  title: z.string().min(1),
  game: z.string().min(1),
  reward_type: z.string().min(1),
  description: z.string(),
  images: z.array(z.string().url()).default([]),
  price_cents: priceCents,
  currency: z.string().min(1).default('usd'),
  active: z.boolean().default(true),
  tags: z.array(z.string()).default([]),
});

export type ProductInput = z.output<typeof productSchema>;

export const productPatchSchema = z
  .object({
    title: z.string().min(1),
    game: z.string().min(1),
    reward_type: z.string().min(1),
    description: z.string(),
    images: z.array(z.string().url()),
    price_cents: priceCents,
    currency: z.string().min(1),
    active: z.boolean(),
    tags: z.array(z.string()),
  })
  .partial()
  .strict()
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), 'Patch must change at least one field');

export type ProductPatch = z.output<typeof productPatchSchema>;

const optionalCents = z.coerce.number().int().min(0).optional();

export const productFiltersSchema = z.object({
  game: z.string().min(1).optional(),
  reward_type: z.string().min(1).optional(),
  min_price: optionalCents,
  max_price: optionalCents,
});

export type ProductFilters = z.output<typeof productFiltersSchema>;

export const addCodesSchema = z.object({
  product_id: z.string().min(1),
  codes: z.array(z.string().trim().min(1, 'Codes must not be blank')).min(1, 'At least one code is required'),
});

export const cartItemSchema = z.object({
  product_id: z.string().min(1),
  quantity: z.number().int().min(1, 'quantity must be an integer >= 1').max(10, 'quantity must be <= 10'),
});

export const checkoutInitSchema = z.object({
  items: z.array(cartItemSchema).min(1, 'Cart is empty').max(50),
  email: z.string().email(),
  name: z.string().optional(),
});

export type CheckoutInitRequest = z.output<typeof checkoutInitSchema>;

export const checkoutConfirmSchema = z.object({
  order_id: z.string().min(1),
  provider: z.enum(['stripe', 'paypal']).default('stripe'),
});

export const contactSchema = z.object({
  email: z.string().email(),
  subject: z.string().min(1),
  message: z.string().min(1),
});
