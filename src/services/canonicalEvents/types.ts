import type { EntityDescriptor, Event, RawEvent } from '../../types/chronicle';
import type { EmbeddingProvider } from '../embeddings';

/** An entity already resolved to a stored id; Entity records satisfy this. */
export interface ResolvedEntityRef extends EntityDescriptor {
  id: string;
}

export interface CanonicalEventResolverDeps {
  embeddingProvider?: EmbeddingProvider;
  dimensions?: number;
}

export interface ResolutionItem {
  rawEvent: RawEvent;
  entities: ResolvedEntityRef[];
}

export interface ResolvedItem {
  rawEventId: string;
  event: Event;
}

export interface ResolutionStats {
  totalRawEventsProcessed: number;
  newEventsCreated: number;
  duplicatesFound: number;
  embeddingComputations: number;
  similaritySearchesPerformed: number;
}

export interface CandidateEvaluation {
  candidateId: string;
  similarity: number | null;
  threshold: number | null;
  accepted: boolean;
}
