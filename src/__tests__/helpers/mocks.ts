import { vi } from 'vitest';
import type { EmbeddingProvider } from '../../services/embeddings';
import { missingPage, type PageLookup, type VerificationSource } from '../../services/verification';

/**
 * Embeds text by its leading description: the first registered prefix the
 * text starts with picks the vector. Unregistered text is an error.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake';
  private readonly vectors: Array<[string, number[]]> = [];

  constructor(readonly dimensions: number = 2) {}

  register(prefix: string, vector: number[]): this {
    this.vectors.push([prefix, vector]);
    return this;
  }

  embed = vi.fn(async (text: string): Promise<number[]> => {
    const match = this.vectors.find(([prefix]) => text.startsWith(prefix));
    if (!match) throw new Error(`No fake embedding for: ${text}`);
    return match[1];
  });
}

/** Unit vector whose cosine similarity to `[1, 0]` is `similarity`. */
export function vectorWithSimilarity(similarity: number): number[] {
  return [similarity, Math.sqrt(1 - similarity * similarity)];
}

export const BASE_VECTOR = [1, 0];

export class FakeVerificationSource implements VerificationSource {
  readonly name = 'fake';
  private readonly pages = new Map<string, PageLookup | Error>();

  lookup = vi.fn(async (name: string, language: string): Promise<PageLookup> => {
    const page = this.pages.get(`${language}:${name}`);
    if (page instanceof Error) throw page;
    return page ?? missingPage(name);
  });

  setPage(name: string, language: string, page: PageLookup | Error): this {
    this.pages.set(`${language}:${name}`, page);
    return this;
  }
}

export function verifiedPage(overrides: Partial<PageLookup> = {}): PageLookup {
  const title = overrides.canonicalTitle ?? 'Test Page';
  return {
    exists: true,
    isDisambiguation: false,
    canonicalId: 'Q1',
    canonicalTitle: title,
    url: `https://en.wikipedia.org/wiki/${title.replace(/ /g, '_')}`,
    pageId: '1',
    extract: `${title} is a test page.`,
    disambiguationOptions: [],
    ...overrides,
  };
}
