import {
  CANDIDATE_LIMIT,
  EMBEDDING_DIMENSIONS,
  SEARCH_SIMILARITY_FLOOR,
} from '../../config/constants';
import type { Event, RawEvent } from '../../types/chronicle';
import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { assertNotBlank, checkDateInfo } from '../../utils/validation';
import { linkEventEntities, linkEventRawEvent } from '../associations';
import {
  buildEventEmbeddingText,
  computeEventEmbedding,
  getEmbeddingProvider,
  type EmbeddingProvider,
} from '../embeddings';
import type { StoreSession } from '../storage/interface';
import { evaluateCandidates } from './thresholding';
import type {
  CanonicalEventResolverDeps,
  ResolutionItem,
  ResolutionStats,
  ResolvedEntityRef,
  ResolvedItem,
} from './types';

const log = createLogger('canonicalEvents');

function emptyStats(): ResolutionStats {
  return {
    totalRawEventsProcessed: 0,
    newEventsCreated: 0,
    duplicatesFound: 0,
    embeddingComputations: 0,
    similaritySearchesPerformed: 0,
  };
}

/**
 * Turns raw events into canonical events inside the caller's transaction:
 * embed, search the closest candidates, apply the same/cross-source
 * threshold, then reuse or create the event and link it.
 *
 * Nothing here commits. Search and write failures propagate so the
 * enclosing transaction rolls back as a whole.
 */
export class CanonicalEventResolver {
  private stats: ResolutionStats = emptyStats();
  private readonly dimensions: number;

  constructor(private readonly deps: CanonicalEventResolverDeps = {}) {
    this.dimensions = deps.dimensions ?? EMBEDDING_DIMENSIONS;
  }

  private get provider(): EmbeddingProvider {
    return this.deps.embeddingProvider ?? getEmbeddingProvider();
  }

  async resolve(
    session: StoreSession,
    rawEvent: RawEvent,
    entities: ResolvedEntityRef[] = []
  ): Promise<Event> {
    const startedAt = Date.now();
    this.stats.totalRawEventsProcessed++;

    const text = buildEventEmbeddingText(rawEvent, entities);
    this.stats.embeddingComputations++;
    const embedding = await computeEventEmbedding(text, this.provider, this.dimensions);

    this.stats.similaritySearchesPerformed++;
    const candidates = await session.events.findNearestByEmbedding(
      embedding,
      CANDIDATE_LIMIT,
      1 - SEARCH_SIMILARITY_FLOOR
    );

    const { match } = await evaluateCandidates(session, rawEvent, candidates, embedding);

    let event: Event;
    if (match) {
      this.stats.duplicatesFound++;
      event = match;
      log.info({ rawEventId: rawEvent.id, eventId: event.id }, 'Merged raw event into existing event');
    } else {
      event = await this.createEvent(session, rawEvent, embedding);
    }

    await linkEventRawEvent(session, event.id, rawEvent.id);
    await linkEventEntities(
      session,
      entities.map((entity) => ({ eventId: event.id, entityId: entity.id }))
    );

    log.debug(
      { rawEventId: rawEvent.id, eventId: event.id, candidates: candidates.length, ms: Date.now() - startedAt },
      'Resolved raw event'
    );
    return event;
  }

  /**
   * Resolve items one by one, each in its own savepoint. A failed item is
   * rolled back and skipped; the rest still resolve.
   */
  async resolveMany(session: StoreSession, items: ResolutionItem[]): Promise<ResolvedItem[]> {
    if (items.length === 0) return [];

    const resolved: ResolvedItem[] = [];
    for (const { rawEvent, entities } of items) {
      try {
        const event = await session.savepoint((sp) => this.resolve(sp, rawEvent, entities));
        resolved.push({ rawEventId: rawEvent.id, event });
      } catch (error) {
        log.error(
          { rawEventId: rawEvent.id, error: errorMessage(error) },
          'Failed to resolve raw event, skipping'
        );
      }
    }

    log.info(
      {
        rawEvents: items.length,
        resolved: resolved.length,
        uniqueEvents: new Set(resolved.map((item) => item.event.id)).size,
        stats: this.stats,
      },
      'Batch resolution complete'
    );
    return resolved;
  }

  getStats(): ResolutionStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  private async createEvent(
    session: StoreSession,
    rawEvent: RawEvent,
    embedding: number[]
  ): Promise<Event> {
    const dateStr = assertNotBlank(rawEvent.dateStr, 'dateStr');

    const dateCheck = checkDateInfo(rawEvent.dateInfo);
    if (!dateCheck.valid) {
      log.warn(
        { rawEventId: rawEvent.id, errors: dateCheck.errors },
        'Raw event has malformed date info, storing as given'
      );
    }

    const event = await session.events.create({
      dateStr,
      description: rawEvent.description,
      dateInfo: rawEvent.dateInfo,
      embedding,
    });

    this.stats.newEventsCreated++;
    log.info({ rawEventId: rawEvent.id, eventId: event.id }, 'Created new event');
    return event;
  }
}

export async function resolveCanonicalEvent(
  session: StoreSession,
  rawEvent: RawEvent,
  entities: ResolvedEntityRef[] = [],
  deps: CanonicalEventResolverDeps = {}
): Promise<Event> {
  return new CanonicalEventResolver(deps).resolve(session, rawEvent, entities);
}
