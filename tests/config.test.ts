import { loadGameStatsConfig, loadStorefrontConfig } from '../src/shared/config';

test('storefront config applies defaults', () => {
  expect(loadStorefrontConfig({ JWT_SECRET: 'test-secret' })).toEqual({
    database: { tablePrefix: 'game-codes', endpoint: undefined, region: 'us-east-1' },
    jwtSecret: 'test-secret',
    stripeApiKey: '',
    siteName: 'Game Codes Store',
  });
});

test('storefront config reads every variable', () => {
  const config = loadStorefrontConfig({
    JWT_SECRET: 'test-secret',
    STRIPE_API_KEY: 'sk_test_placeholder',
    SITE_NAME: 'Code Shop',
    TABLE_PREFIX: 'shop',
    DYNAMODB_ENDPOINT: 'http://localhost:8000',
    AWS_REGION: 'eu-west-1',
  });

  expect(config).toEqual({
    database: { tablePrefix: 'shop', endpoint: 'http://localhost:8000', region: 'eu-west-1' },
    jwtSecret: 'test-secret',
    stripeApiKey: 'sk_test_placeholder',
    siteName: 'Code Shop',
  });
});

test('a missing JWT_SECRET fails at start-up', () => {
  expect(() => loadStorefrontConfig({})).toThrow('Invalid configuration: Missing required environment variable: JWT_SECRET');
});

test('game-stats config defaults to the public upstream APIs', () => {
  const config = loadGameStatsConfig({});

  expect(config.osrsHiscoreUrl).toBe('https://secure.runescape.com/m=hiscore_oldschool/index_lite.ws');
  expect(config.xivApiUrl).toBe('https://xivapi.com');
});

test('a malformed endpoint URL is rejected', () => {
  expect(() => loadGameStatsConfig({ DYNAMODB_ENDPOINT: 'not a url' })).toThrow(/^Invalid configuration/);
});
