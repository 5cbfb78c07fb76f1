export { closeDatabase, db, testConnection } from './config/database';
export { env } from './config/env';
export * as constants from './config/constants';
export * from './types/chronicle';

export {
  AppError,
  ConflictError,
  TransientStoreError,
  ValidationError,
  VerificationError,
} from './utils/errors';
export { isTransientConnectionError, isUniqueViolation, withTransaction } from './utils/db';
export { createLogger, logger } from './utils/logger';

export * from './services/storage';
export * from './services/associations';
export * from './services/canonicalEvents';
export * from './services/entityResolution';
export * from './services/rawEvents';
export * from './services/sourceDocuments';
export * from './services/pipeline';
export {
  buildEventEmbeddingText,
  computeEventEmbedding,
  getEmbeddingProvider,
  type EmbeddingProvider,
} from './services/embeddings';
export {
  getVerificationSource,
  WikipediaVerificationSource,
  type PageLookup,
  type VerificationSource,
} from './services/verification';
