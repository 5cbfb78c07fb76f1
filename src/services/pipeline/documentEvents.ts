import type { Entity, ExtractedEventInput, SourceDocument } from '../../types/chronicle';
import { createLogger } from '../../utils/logger';
import { linkViewpointEvents } from '../associations';
import {
  CanonicalEventResolver,
  type CanonicalEventResolverDeps,
  type ResolutionItem,
} from '../canonicalEvents';
import { stageRawEvents } from '../rawEvents';
import { advanceProcessingStatus } from '../sourceDocuments';
import type { StoreSession } from '../storage/interface';

const log = createLogger('pipeline');

export interface DocumentEventsInput {
  sourceDocument: SourceDocument;
  events: ExtractedEventInput[];
  viewpointId?: string;
}

export interface DocumentEventsResult {
  eventIds: string[];
  rawEventCount: number;
  newRawEventCount: number;
  /** Raw events left without an event; the document stays in `processing_linking`. */
  unresolvedRawEventIds: string[];
}

export interface DocumentEventsDeps extends CanonicalEventResolverDeps {
  resolver?: CanonicalEventResolver;
}

async function loadEntities(session: StoreSession, ids: string[]): Promise<Map<string, Entity>> {
  if (ids.length === 0) return new Map();
  const entities = await session.entities.getMultiByAttributes(
    [{ field: 'id', operator: 'in', value: ids }],
    { limit: ids.length }
  );
  return new Map(entities.map((entity) => [entity.id, entity]));
}

/**
 * Take one document's extracted events through staging, canonical
 * resolution and viewpoint linking, all on the caller's session.
 *
 * The document is marked `completed` only when every raw event was linked
 * to an event. Otherwise it stays in `processing_linking` and a later run
 * picks up the stored raw events again.
 */
export async function processDocumentEvents(
  session: StoreSession,
  input: DocumentEventsInput,
  deps: DocumentEventsDeps = {}
): Promise<DocumentEventsResult> {
  const resolver = deps.resolver ?? new CanonicalEventResolver(deps);
  const { viewpointId } = input;

  const document = await advanceProcessingStatus(session, input.sourceDocument, 'processing_linking');

  const staged = await stageRawEvents(session, document, input.events);
  const entitiesById = await loadEntities(session, [
    ...new Set(staged.flatMap((item) => item.entityIds)),
  ]);

  const items: ResolutionItem[] = staged.map(({ rawEvent, entityIds }) => ({
    rawEvent,
    entities: entityIds.flatMap((id) => {
      const entity = entitiesById.get(id);
      return entity ? [entity] : [];
    }),
  }));

  const resolved = await resolver.resolveMany(session, items);
  const eventIds = [...new Set(resolved.map((item) => item.event.id))];

  if (viewpointId) {
    await linkViewpointEvents(
      session,
      eventIds.map((eventId) => ({ viewpointId, eventId }))
    );
  }

  const resolvedIds = new Set(resolved.map((item) => item.rawEventId));
  const unresolvedRawEventIds = staged
    .map((item) => item.rawEvent.id)
    .filter((id) => !resolvedIds.has(id));

  if (unresolvedRawEventIds.length === 0) {
    await advanceProcessingStatus(session, document, 'completed');
  } else {
    log.warn(
      { sourceDocumentId: document.id, unresolvedRawEventIds },
      'Raw events left unresolved, document stays in processing_linking'
    );
  }

  const result: DocumentEventsResult = {
    eventIds,
    rawEventCount: staged.length,
    newRawEventCount: staged.filter((item) => item.isNew).length,
    unresolvedRawEventIds,
  };
  log.info({ sourceDocumentId: document.id, viewpointId, ...result }, 'Processed document events');
  return result;
}
