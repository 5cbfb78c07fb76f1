import Bottleneck from 'bottleneck';
import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import { env } from '../../config/env';
import { sleep } from '../../utils/db';
import { VerificationError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { languageCodeSchema, parseInput } from '../../utils/validation';
import { extractDisambiguationOptions } from './disambiguation';
import { missingPage, type PageLookup, type VerificationSource } from './interface';

const log = createLogger('verification.wikipedia');

const pageSchema = z.object({
  pageid: z.number().optional(),
  title: z.string().optional(),
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
  fullurl: z.string().optional(),
  extract: z.string().optional(),
  pageprops: z
    .object({
      wikibase_item: z.string().optional(),
      // formatversion=2 reports the flag as an empty string; presence is what counts
      disambiguation: z.union([z.string(), z.boolean()]).optional(),
    })
    .optional(),
});

const queryResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(pageSchema).optional(),
    })
    .optional(),
});

type WikiPage = z.infer<typeof pageSchema>;

export interface WikipediaSourceOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  minIntervalMs?: number;
  cacheTtlMs?: number;
  cacheMaxEntries?: number;
  userAgent?: string;
  fetch?: typeof fetch;
  now?: () => number;
}

class RetryableRequestError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'RetryableRequestError';
  }
}

interface CacheEntry {
  value: PageLookup;
  expiresAt: number;
}

export function toPageLookup(name: string, page: WikiPage | undefined): PageLookup {
  if (!page || page.missing || page.invalid) {
    return missingPage(name);
  }

  const flag = page.pageprops?.disambiguation;
  const isDisambiguation = flag !== undefined && flag !== false;
  const extract = page.extract?.trim() || null;

  return {
    exists: true,
    isDisambiguation,
    canonicalId: page.pageprops?.wikibase_item ?? null,
    canonicalTitle: page.title ?? name,
    url: page.fullurl || null,
    pageId: page.pageid !== undefined ? String(page.pageid) : null,
    extract,
    disambiguationOptions: isDisambiguation && extract ? extractDisambiguationOptions(extract) : [],
  };
}

/**
 * Verification through the MediaWiki query API. Requests go out one at a
 * time through a shared limiter; 429s, 5xxs, timeouts and network failures
 * back off and retry, other failures reject immediately. Results are kept
 * in a bounded LRU cache until their TTL runs out.
 */
export class WikipediaVerificationSource implements VerificationSource {
  readonly name = 'wikipedia';

  private readonly limiter: Bottleneck;
  private readonly cache: LRUCache<string, CacheEntry>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly cacheTtlMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(options: WikipediaSourceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? env.WIKI_API_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? env.WIKI_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? env.WIKI_RETRY_DELAY_MS;
    this.cacheTtlMs = options.cacheTtlMs ?? env.WIKI_CACHE_TTL_MS;
    this.userAgent = options.userAgent ?? env.WIKI_USER_AGENT;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.cache = new LRUCache<string, CacheEntry>({
      max: options.cacheMaxEntries ?? env.WIKI_CACHE_MAX_ENTRIES,
    });
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: options.minIntervalMs ?? env.WIKI_MIN_INTERVAL_MS,
    });
  }

  async lookup(name: string, rawLanguage: string): Promise<PageLookup> {
    // The language becomes part of the request hostname
    const language = parseInput(languageCodeSchema, rawLanguage, 'language');
    const key = JSON.stringify([language, name]);
    const cached = this.cache.get(key);
    if (cached) {
      if (cached.expiresAt > this.now()) return cached.value;
      this.cache.delete(key);
    }

    const value = await this.fetchWithRetry(name, language);
    this.cache.set(key, { value, expiresAt: this.now() + this.cacheTtlMs });
    return value;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async fetchWithRetry(name: string, language: string): Promise<PageLookup> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.limiter.schedule(() => this.fetchPage(name, language));
      } catch (error) {
        if (!(error instanceof RetryableRequestError)) {
          throw error;
        }
        if (attempt >= this.maxRetries) {
          log.error(
            { name, language, attempts: attempt + 1, error: error.message },
            'Wikipedia lookup failed after retries'
          );
          throw new VerificationError(
            `Wikipedia lookup for '${name}' (${language}) failed: ${error.message}`,
            error
          );
        }
        const delay = this.retryDelayMs * 2 ** attempt;
        log.warn(
          { name, language, attempt: attempt + 1, delay, status: error.status },
          'Wikipedia lookup failed, retrying'
        );
        await sleep(delay);
      }
    }
  }

  private async fetchPage(name: string, language: string): Promise<PageLookup> {
    const params = new URLSearchParams({
      action: 'query',
      format: 'json',
      titles: name,
      prop: 'info|extracts|pageprops',
      ppprop: 'wikibase_item|disambiguation',
      inprop: 'url',
      exintro: '1',
      explaintext: '1',
      redirects: '1',
      formatversion: '2',
    });
    const url = `https://${language}.wikipedia.org/w/api.php?${params.toString()}`;

    log.debug({ name, language }, 'Fetching Wikipedia page info');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RetryableRequestError(errorMessage(error));
    }

    if (!response.ok) {
      // Release the connection; the error body is not read
      await response.body?.cancel();
      if (response.status === 429 || response.status >= 500) {
        throw new RetryableRequestError(`HTTP ${response.status}`, response.status);
      }
      throw new VerificationError(`Wikipedia API returned HTTP ${response.status} for '${name}'`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new VerificationError(`Wikipedia API returned invalid JSON for '${name}'`, error);
    }

    const parsed = queryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new VerificationError(
        `Unexpected Wikipedia API response for '${name}': ${parsed.error.message}`
      );
    }

    const page = parsed.data.query?.pages?.[0];
    if (!page || page.missing) {
      log.info({ name, language }, 'Wikipedia page not found');
    }
    return toPageLookup(name, page);
  }
}
