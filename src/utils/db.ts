import { env } from '../config/env';
import type { Store, StoreSession } from '../services/storage/interface';
import { ConflictError, TransientStoreError, errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('db');

const UNIQUE_VIOLATION = '23505';

// postgres-js connection codes plus the socket errors Node surfaces underneath them
const TRANSIENT_CODES = new Set([
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

function errorCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  // Drizzle wraps driver errors; walk the cause chain
  for (let depth = 0; depth < 5 && current instanceof Object; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      codes.push(current.code);
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return codes;
}

export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof ConflictError) return true;
  return errorCodes(error).includes(UNIQUE_VIOLATION);
}

export function isTransientConnectionError(error: unknown): boolean {
  return errorCodes(error).some((code) => TRANSIENT_CODES.has(code) || code.startsWith('08'));
}

export interface TransactionOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  label?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Open one transaction and hand its session to `fn`. Nested services get the
 * same session passed explicitly; only this call commits or rolls back.
 *
 * Connection loss re-runs the whole of `fn` in a fresh transaction with
 * exponential backoff. Anything else propagates on the first failure.
 */
export async function withTransaction<T>(
  store: Store,
  fn: (session: StoreSession) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? env.DB_TRANSACTION_MAX_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? env.DB_RETRY_BASE_DELAY_MS;
  const label = options.label ?? 'transaction';

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await store.transaction(fn);
    } catch (error) {
      if (!isTransientConnectionError(error)) {
        throw error;
      }
      lastError = error;
      if (attempt < maxAttempts) {
        const delay = baseDelayMs * 2 ** (attempt - 1);
        log.warn(
          { label, attempt, maxAttempts, delay, error: errorMessage(error) },
          'Connection lost during transaction, retrying'
        );
        await sleep(delay);
      }
    }
  }

  log.error({ label, maxAttempts, error: errorMessage(lastError) }, 'All transaction attempts failed');
  throw new TransientStoreError(
    `${label} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
    lastError
  );
}
