import { env, type Env } from '../../config/env';
import type { EmbeddingProvider } from './provider.interface';
import { openaiEmbeddingProvider } from './providers/openai.provider';

const providers: Record<Env['EMBEDDING_PROVIDER'], EmbeddingProvider> = {
  openai: openaiEmbeddingProvider,
};

let cachedProvider: EmbeddingProvider | null = null;

export function getEmbeddingProvider(): EmbeddingProvider {
  if (cachedProvider) return cachedProvider;
  cachedProvider = providers[env.EMBEDDING_PROVIDER];
  return cachedProvider;
}
