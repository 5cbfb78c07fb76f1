import OpenAI from 'openai';
import { EMBEDDING_DIMENSIONS } from '../../../config/constants';
import { env } from '../../../config/env';
import { createLogger } from '../../../utils/logger';
import type { EmbeddingProvider } from '../provider.interface';

const log = createLogger('embeddings.openai');

let openaiClient: OpenAI | null = null;
let initialized = false;

function getClient(): OpenAI | null {
  if (!initialized) {
    initialized = true;
    openaiClient = env.OPENAI_API_KEY ? new OpenAI({ apiKey: env.OPENAI_API_KEY }) : null;
    if (!openaiClient) {
      log.warn('OPENAI_API_KEY not configured');
    }
  }
  return openaiClient;
}

function requireClient(): OpenAI {
  const client = getClient();
  if (!client) throw new Error('OpenAI client not configured');
  return client;
}

export const openaiEmbeddingProvider: EmbeddingProvider = {
  name: 'openai',
  dimensions: EMBEDDING_DIMENSIONS,

  async embed(text: string): Promise<number[]> {
    const response = await requireClient().embeddings.create({
      model: env.EMBEDDING_MODEL,
      input: text,
      dimensions: EMBEDDING_DIMENSIONS,
    });

    const [first] = response.data;
    if (!first) throw new Error('OpenAI returned no embedding');
    return first.embedding;
  },
};
