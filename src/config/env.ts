import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('chronicle'),
  DB_PASSWORD: z.string().default('chronicle_dev_pass'),
  DB_NAME: z.string().default('chronicle'),
  DB_POOL_MAX: z.string().transform(Number).optional(),
  DB_IDLE_TIMEOUT: z.string().transform(Number).optional(),
  DB_CONNECT_TIMEOUT: z.string().transform(Number).optional(),
  DB_TRANSACTION_MAX_ATTEMPTS: z.string().default('3').transform(Number),
  DB_RETRY_BASE_DELAY_MS: z.string().default('1000').transform(Number),
  EMBEDDING_PROVIDER: z.enum(['openai']).default('openai'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_API_KEY: z.string().optional(),
  WIKI_API_TIMEOUT_MS: z.string().default('15000').transform(Number),
  WIKI_MAX_RETRIES: z.string().default('5').transform(Number),
  WIKI_RETRY_DELAY_MS: z.string().default('500').transform(Number),
  WIKI_MIN_INTERVAL_MS: z.string().default('100').transform(Number),
  WIKI_CACHE_TTL_MS: z.string().default('3600000').transform(Number),
  WIKI_CACHE_MAX_ENTRIES: z.string().default('1000').transform(Number),
  WIKI_USER_AGENT: z
    .string()
    .default('ChronicleCore/0.1 (event resolution bot; contact: unavailable)'),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
