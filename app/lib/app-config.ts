// app/lib/app-config.ts
import { z } from 'zod';
import { ValidationError } from './errors';

export interface TypesenseSettings {
  host: string;
  port: number;
  protocol: 'http' | 'https';
  path: string;
  apiKey: string;
  connectionTimeoutSeconds: number;
}

export interface AppConfig {
  typesense: TypesenseSettings;
  collectionName: string;
  vectorSize: number;
  embeddingModel: string;
  openaiApiKey: string;
  dataPath: string;
  snapshotsDir: string;
  defaultRecommendationLimit: number;
  maxRecommendationLimit: number;
  exchangeRate: number;
  batchSize: number;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  TYPESENSE_HOST: z.string().min(1).default('localhost'),
  TYPESENSE_PORT: positiveInt(8108),
  TYPESENSE_PROTOCOL: z.enum(['http', 'https']).default('http'),
  TYPESENSE_PATH: z.string().default(''),
  TYPESENSE_API_KEY: z.string().default(''),
  TYPESENSE_CONNECTION_TIMEOUT: positiveInt(10),
  TYPESENSE_COLLECTION_NAME: z.string().min(1).default('products'),
  OPENAI_API_KEY: z.string().default(''),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  VECTOR_SIZE: positiveInt(1536),
  DATA_PATH: z.string().min(1).default('data/products.csv'),
  SNAPSHOTS_DIR: z.string().min(1).default('snapshots'),
  DEFAULT_RECOMMENDATION_LIMIT: positiveInt(5),
  // One slot goes to the anchor, and Typesense pages stop at 250 hits
  MAX_RECOMMENDATION_LIMIT: z.coerce.number().int().positive().max(249).default(100),
  PRICE_EXCHANGE_RATE: z.coerce.number().positive().default(0.035),
  PIPELINE_BATCH_SIZE: positiveInt(100),
});

// Empty strings in .env files mean "not set"
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ValidationError(`Invalid configuration: ${keys}`);
  }

  const values = parsed.data;
  return {
    typesense: {
      host: values.TYPESENSE_HOST,
      port: values.TYPESENSE_PORT,
      protocol: values.TYPESENSE_PROTOCOL,
      path: values.TYPESENSE_PATH,
      apiKey: values.TYPESENSE_API_KEY,
      connectionTimeoutSeconds: values.TYPESENSE_CONNECTION_TIMEOUT,
    },
    collectionName: values.TYPESENSE_COLLECTION_NAME,
    vectorSize: values.VECTOR_SIZE,
    embeddingModel: values.EMBEDDING_MODEL,
    openaiApiKey: values.OPENAI_API_KEY,
    dataPath: values.DATA_PATH,
    snapshotsDir: values.SNAPSHOTS_DIR,
    defaultRecommendationLimit: values.DEFAULT_RECOMMENDATION_LIMIT,
    maxRecommendationLimit: values.MAX_RECOMMENDATION_LIMIT,
    exchangeRate: values.PRICE_EXCHANGE_RATE,
    batchSize: values.PIPELINE_BATCH_SIZE,
  };
}
