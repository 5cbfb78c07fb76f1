/**
 * Dynamic thresholds for merging a raw event into a candidate event.
 *
 * - Same source (the raw event's document already backs the candidate): 0.95
 * - Cross source: 0.85
 *
 * Candidates arrive closest first and the first one that clears its own
 * threshold wins.
 */

import { CROSS_SOURCE_THRESHOLD, SAME_SOURCE_THRESHOLD } from '../../config/constants';
import type { Event, RawEvent } from '../../types/chronicle';
import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import type { StoreSession } from '../storage/interface';
import type { CandidateEvaluation } from './types';

const log = createLogger('canonicalEvents.thresholding');

export async function selectThreshold(
  session: StoreSession,
  rawEvent: Pick<RawEvent, 'id' | 'sourceDocumentId'>,
  candidateId: string
): Promise<number> {
  try {
    // A failed statement aborts the enclosing transaction unless it is
    // confined to a savepoint
    const documentIds = await session.savepoint((sp) => sp.events.getSourceDocumentIds(candidateId));
    return documentIds.has(rawEvent.sourceDocumentId)
      ? SAME_SOURCE_THRESHOLD
      : CROSS_SOURCE_THRESHOLD;
  } catch (error) {
    // Never let a lookup failure lower the bar below cross-source
    log.warn(
      { rawEventId: rawEvent.id, candidateId, error: errorMessage(error) },
      'Threshold lookup failed, using cross-source threshold'
    );
    return CROSS_SOURCE_THRESHOLD;
  }
}

export function similarityFromDistance(distance: number): number {
  return 1 - distance;
}

/**
 * Walk `candidates` in order and return the first accepted one, with the
 * evaluations made up to and including it.
 */
export async function evaluateCandidates(
  session: StoreSession,
  rawEvent: Pick<RawEvent, 'id' | 'sourceDocumentId'>,
  candidates: Event[],
  embedding: number[]
): Promise<{ match: Event | null; evaluations: CandidateEvaluation[] }> {
  const evaluations: CandidateEvaluation[] = [];

  for (const candidate of candidates) {
    const distance = await session.events.exactDistance(candidate.id, embedding);
    if (distance === null) {
      evaluations.push({ candidateId: candidate.id, similarity: null, threshold: null, accepted: false });
      continue;
    }

    const similarity = similarityFromDistance(distance);
    const threshold = await selectThreshold(session, rawEvent, candidate.id);
    const accepted = similarity >= threshold;
    evaluations.push({ candidateId: candidate.id, similarity, threshold, accepted });

    log.debug(
      { rawEventId: rawEvent.id, candidateId: candidate.id, similarity, threshold, accepted },
      'Evaluated candidate'
    );

    if (accepted) {
      return { match: candidate, evaluations };
    }
  }

  return { match: null, evaluations };
}
