import 'dotenv/config';
import { z } from 'zod';
import { RECOMMEND_WEIGHTS } from './search/constants';

const weight = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z
  .object({
    PORT: z.coerce.number().default(3000),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CATALOG_PATH: z.string().min(1).default('data/courses.json'),
    EMBEDDING_ENDPOINT: z.string().url('EMBEDDING_ENDPOINT must be a URL'),
    EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_API_KEY: z.string().optional(),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().max(2048).default(100),
    EMBEDDING_CACHE_PATH: z.string().min(1).default('data/embedding-cache.json'),
    DATABASE_URL: z.string().min(1).optional(),
    CHAT_ENDPOINT: z.string().url().optional(),
    CHAT_MODEL: z.string().min(1).default('gpt-4o-mini'),
    CHAT_API_KEY: z.string().optional(),
    RECOMMEND_LEXICAL_WEIGHT: weight(RECOMMEND_WEIGHTS.lexical),
    RECOMMEND_SEMANTIC_WEIGHT: weight(RECOMMEND_WEIGHTS.semantic),
    API_KEY: z.string().optional(),
    RATE_LIMIT_MAX: z.coerce.number().default(100),
    RATE_LIMIT_WINDOW: z.coerce.number().default(60_000),
    CORS_ORIGINS: z.string().optional()
  })
  .refine((env) => env.RECOMMEND_LEXICAL_WEIGHT + env.RECOMMEND_SEMANTIC_WEIGHT <= 1 + 1e-9, {
    message: 'RECOMMEND_LEXICAL_WEIGHT + RECOMMEND_SEMANTIC_WEIGHT must not exceed 1',
    path: ['RECOMMEND_SEMANTIC_WEIGHT']
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('❌ Invalid environment configuration', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const corsOrigins =
  parsed.data.CORS_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [];

export const config = {
  ...parsed.data,
  corsOrigins,
  weights: {
    lexical: parsed.data.RECOMMEND_LEXICAL_WEIGHT,
    semantic: parsed.data.RECOMMEND_SEMANTIC_WEIGHT
  }
};
