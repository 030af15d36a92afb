import { loadStorefrontConfig } from '../shared/config';
import { openDynamoStore } from '../shared/dynamo-store';
import { createStorefrontHandler } from './handler';
import { createPaymentGateway } from './payments';
import type { StorefrontCollections } from './types';

// Lambda entry point: configuration and the store client are built once per cold start.
const config = loadStorefrontConfig();

export const store = openDynamoStore<StorefrontCollections>(config.database);

export const handler = createStorefrontHandler({
  store,
  payments: createPaymentGateway(config.stripeApiKey),
  jwtSecret: config.jwtSecret,
  siteName: config.siteName,
});
