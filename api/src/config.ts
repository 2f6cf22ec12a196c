/**
 * Runtime Configuration
 *
 * Parses process.env once into a typed AppConfig. Retrieval thresholds and the
 * provider table are policy, so they live here rather than in the services.
 */

import { z } from 'zod';
import { ConfigError } from '@/errors/research';

/** Width of research_memory.embedding; the column and the embedder must agree. */
export const MEMORY_VECTOR_DIMENSIONS = 1536;

const boolFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const score = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(20),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIM: z.coerce
    .number()
    .int()
    .refine((dim) => dim === MEMORY_VECTOR_DIMENSIONS, {
      message: `must be ${MEMORY_VECTOR_DIMENSIONS} to match research_memory.embedding`,
    })
    .default(MEMORY_VECTOR_DIMENSIONS),

  SERPAPI_KEY: z.string().optional(),
  BRAVE_KEY: z.string().optional(),
  OPENWEATHER_API_KEY: z.string().optional(),
  WEATHER_CITY: z.string().min(1).default('Pune'),

  OFFLINE_CACHE_PATH: z.string().min(1).default('data/offline_cache.json'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  SCHEDULER_ENABLED: boolFromEnv.default('true'),
  SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(1000),

  RAG_THRESHOLD_HIGH: score.default(0.82),
  RAG_THRESHOLD_MEDIUM: score.default(0.7),
  RAG_THRESHOLD_MINIMUM: score.default(0.4),
  RAG_TOP_K: z.coerce.number().int().positive().max(50).default(8),
  RAG_HYBRID_CACHED_CAP: z.coerce.number().int().min(0).default(2),
  RAG_DEFAULT_MAX_RESULTS: z.coerce.number().int().positive().max(20).default(5),
});

export interface ProviderConfig {
  name: string;
  weight: number;
  /** null = unlimited */
  quota: number | null;
  minCallIntervalMs: number;
}

export interface RetrievalPolicy {
  thresholdHigh: number;
  thresholdMedium: number;
  thresholdMinimum: number;
  topK: number;
  hybridCachedCap: number;
  defaultMaxResults: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  database: { url?: string; poolSize: number };
  openai: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    embeddingModel: string;
    embeddingDim: number;
  };
  search: {
    serpapiKey?: string;
    braveKey?: string;
    providers: ProviderConfig[];
    fallbackProvider: string;
    weightStepUp: number;
    weightStepDown: number;
    maxAttempts: number;
    offlineCachePath: string;
  };
  realtime: { openWeatherApiKey?: string; weatherCity: string };
  httpTimeoutMs: number;
  scheduler: { enabled: boolean; tickMs: number };
  retrieval: RetrievalPolicy;
}

export const DEFAULT_PROVIDERS: ProviderConfig[] = [
  { name: 'serpapi', weight: 1.0, quota: 100, minCallIntervalMs: 1000 },
  { name: 'brave', weight: 0.8, quota: 2000, minCallIntervalMs: 500 },
  { name: 'duckduckgo', weight: 0.5, quota: null, minCallIntervalMs: 500 },
];

export const OFFLINE_PROVIDER = 'offline';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(keys, parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const e = parsed.data;
  if (e.RAG_THRESHOLD_MINIMUM > e.RAG_THRESHOLD_MEDIUM || e.RAG_THRESHOLD_MEDIUM > e.RAG_THRESHOLD_HIGH) {
    throw new ConfigError(
      ['RAG_THRESHOLD_MINIMUM', 'RAG_THRESHOLD_MEDIUM', 'RAG_THRESHOLD_HIGH'],
      'thresholds must satisfy minimum <= medium <= high',
    );
  }

  return {
    env: e.NODE_ENV,
    database: { url: e.DATABASE_URL, poolSize: e.DB_POOL_SIZE },
    openai: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      model: e.OPENAI_MODEL,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      embeddingDim: e.EMBEDDING_DIM,
    },
    search: {
      serpapiKey: e.SERPAPI_KEY,
      braveKey: e.BRAVE_KEY,
      providers: DEFAULT_PROVIDERS.map((provider) => ({ ...provider })),
      fallbackProvider: OFFLINE_PROVIDER,
      weightStepUp: 0.05,
      weightStepDown: 0.1,
      maxAttempts: DEFAULT_PROVIDERS.length + 1,
      offlineCachePath: e.OFFLINE_CACHE_PATH,
    },
    realtime: { openWeatherApiKey: e.OPENWEATHER_API_KEY, weatherCity: e.WEATHER_CITY },
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    scheduler: { enabled: e.SCHEDULER_ENABLED, tickMs: e.SCHEDULER_TICK_MS },
    retrieval: {
      thresholdHigh: e.RAG_THRESHOLD_HIGH,
      thresholdMedium: e.RAG_THRESHOLD_MEDIUM,
      thresholdMinimum: e.RAG_THRESHOLD_MINIMUM,
      topK: e.RAG_TOP_K,
      hybridCachedCap: e.RAG_HYBRID_CACHED_CAP,
      defaultMaxResults: e.RAG_DEFAULT_MAX_RESULTS,
    },
  };
}
