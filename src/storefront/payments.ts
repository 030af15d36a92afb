import Stripe from 'stripe';
import { errorMessage, log } from '../shared/log';

const PAYMENT_TIMEOUT_MS = 10_000;

export interface PaymentIntent {
  id: string;
  clientSecret: string | null;
}

export interface PaymentGateway {
  /** Opens an intent for `amountCents`; resolves `null` when the provider is unavailable. */
  createIntent(amountCents: number, currency: string, orderId: string): Promise<PaymentIntent | null>;
}

export class StripePaymentGateway implements PaymentGateway {
  private readonly stripe: Stripe;

  constructor(apiKey: string) {
    this.stripe = new Stripe(apiKey, { timeout: PAYMENT_TIMEOUT_MS, maxNetworkRetries: 0 });
  }

  async createIntent(amountCents: number, currency: string, orderId: string): Promise<PaymentIntent | null> {
    try {
      const intent = await this.stripe.paymentIntents.create({
        amount: amountCents,
        currency,
        automatic_payment_methods: { enabled: true },
        metadata: { order_id: orderId },
      });
      return { id: intent.id, clientSecret: intent.client_secret };
    } catch (err) {
      // The order is already persisted; checkout continues without a client secret.
      log({ level: 'warn', action: 'payment.intent.failed', orderId, error: errorMessage(err) });
      return null;
    }
  }
}

/** Used when no payment key is configured. */
export const noPaymentGateway: PaymentGateway = {
  async createIntent() {
    return null;
  },
};

export function createPaymentGateway(apiKey: string): PaymentGateway {
  return apiKey ? new StripePaymentGateway(apiKey) : noPaymentGateway;
}
