import { z } from 'zod';

const baseSchema = z.object({
  TABLE_PREFIX: z.string().min(1).default('game-codes'),
  DYNAMODB_ENDPOINT: z.string().url().optional(),
  AWS_REGION: z.string().min(1).default('us-east-1'),
});

const storefrontSchema = baseSchema.extend({
  JWT_SECRET: z.string({ required_error: 'Missing required environment variable: JWT_SECRET' }).min(1),
  STRIPE_API_KEY: z.string().optional(),
  SITE_NAME: z.string().min(1).default('Game Codes Store'),
});

const gameStatsSchema = baseSchema.extend({
  OSRS_HISCORE_URL: z.string().url().default('https://secure.runescape.com/m=hiscore_oldschool/index_lite.ws'),
  XIVAPI_URL: z.string().url().default('https://xivapi.com'),
});

export interface DatabaseConfig {
  tablePrefix: string;
  endpoint: string | undefined;
  region: string;
}

export interface StorefrontConfig {
  database: DatabaseConfig;
  jwtSecret: string;
  /** Empty when payment intents are disabled. */
  stripeApiKey: string;
  siteName: string;
}

export interface GameStatsConfig {
  database: DatabaseConfig;
  osrsHiscoreUrl: string;
  xivApiUrl: string;
}

type Env = Record<string, string | undefined>;

function parseEnv<S extends z.ZodTypeAny>(schema: S, env: Env): z.output<S> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => issue.message);
    throw new Error(`Invalid configuration: ${messages.join('; ')}`);
  }
  return parsed.data;
}

export function loadStorefrontConfig(env: Env = process.env): StorefrontConfig {
  const parsed = parseEnv(storefrontSchema, env);
  return {
    database: { tablePrefix: parsed.TABLE_PREFIX, endpoint: parsed.DYNAMODB_ENDPOINT, region: parsed.AWS_REGION },
    jwtSecret: parsed.JWT_SECRET,
    stripeApiKey: parsed.STRIPE_API_KEY ?? '',
    siteName: parsed.SITE_NAME,
  };
}

export function loadGameStatsConfig(env: Env = process.env): GameStatsConfig {
  const parsed = parseEnv(gameStatsSchema, env);
  return {
    database: { tablePrefix: parsed.TABLE_PREFIX, endpoint: parsed.DYNAMODB_ENDPOINT, region: parsed.AWS_REGION },
    osrsHiscoreUrl: parsed.OSRS_HISCORE_URL,
    xivApiUrl: parsed.XIVAPI_URL,
  };
}
