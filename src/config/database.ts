import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { createLogger } from '../utils/logger';
import { env, type Env } from './env';

const log = createLogger('database');

export type ConnectionOptions = postgres.Options<{}>;

/**
 * postgres-js settings for `config`. Production gets the larger pool, the
 * shorter connect timeout and TLS.
 */
export function connectionOptions(config: Env = env): ConnectionOptions {
  const isProd = config.NODE_ENV === 'production';
  return {
    host: config.DB_HOST,
    port: config.DB_PORT,
    username: config.DB_USER,
    password: config.DB_PASSWORD,
    database: config.DB_NAME,
    max: config.DB_POOL_MAX ?? (isProd ? 10 : 5),
    idle_timeout: config.DB_IDLE_TIMEOUT ?? 20,
    connect_timeout: config.DB_CONNECT_TIMEOUT ?? (isProd ? 5 : 10),
    connection: { application_name: 'chronicle-core' },
    onnotice: (notice) => log.debug({ notice: notice.message }, 'Postgres notice'),
    ssl: isProd ? 'require' : false,
  };
}

// Connects lazily, on the first query
const queryClient = postgres(connectionOptions());

export const db = drizzle(queryClient);

export type Database = typeof db;

/** Checks connectivity and that the pgvector extension is installed. */
export async function testConnection(): Promise<boolean> {
  try {
    const [vector] = await queryClient<{ extversion: string }[]>`
      SELECT extversion FROM pg_extension WHERE extname = 'vector'
    `;
    if (!vector) {
      log.error('Database reachable but the vector extension is missing; run CREATE EXTENSION vector');
      return false;
    }
    log.info({ pgvector: vector.extversion }, 'Database connection successful');
    return true;
  } catch (error) {
    log.error({ error }, 'Database connection failed');
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  await queryClient.end();
}
