import { EMBEDDING_DIMENSIONS } from '../../config/constants';
import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { getEmbeddingProvider } from './factory';
import type { EmbeddingProvider } from './provider.interface';

export { getEmbeddingProvider } from './factory';
export type { EmbeddingProvider } from './provider.interface';
export { buildEventEmbeddingText, type EmbeddableRawEvent } from './eventText';

const log = createLogger('embeddings');

export function zeroVector(dimensions: number = EMBEDDING_DIMENSIONS): number[] {
  return new Array<number>(dimensions).fill(0);
}

/**
 * Embed `text`, degrading to a zero vector when the provider fails or
 * returns the wrong width. A zero vector matches no stored event.
 */
export async function computeEventEmbedding(
  text: string,
  provider: EmbeddingProvider = getEmbeddingProvider(),
  dimensions: number = EMBEDDING_DIMENSIONS
): Promise<number[]> {
  try {
    const vector = await provider.embed(text);
    if (vector.length !== dimensions) {
      log.error(
        { provider: provider.name, expected: dimensions, actual: vector.length },
        'Embedding has unexpected dimensions, using zero vector'
      );
      return zeroVector(dimensions);
    }
    return vector;
  } catch (error) {
    log.error(
      { provider: provider.name, error: errorMessage(error) },
      'Embedding computation failed, using zero vector'
    );
    return zeroVector(dimensions);
  }
}
