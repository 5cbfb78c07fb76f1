import { createHash } from 'node:crypto';
import type {
  ExtractedEvent,
  ExtractedEventInput,
  NewRawEvent,
  RawEvent,
  SourceDocument,
} from '../../types/chronicle';
import { createLogger } from '../../utils/logger';
import { checkDateInfo, extractedEventSchema, parseInput } from '../../utils/validation';
import { linkRawEventEntities } from '../associations';
import type { StoreSession } from '../storage/interface';

const log = createLogger('rawEvents');

export interface StagedRawEvent {
  rawEvent: RawEvent;
  /** Requested entity ids that exist in the store. */
  entityIds: string[];
  isNew: boolean;
}

export function rawEventSignature(sourceDocumentId: string, description: string, dateStr: string): string {
  return createHash('sha256')
    .update(`${sourceDocumentId}-${description}-${dateStr}`)
    .digest('hex');
}

async function existingEntityIds(session: StoreSession, requested: string[]): Promise<Set<string>> {
  if (requested.length === 0) return new Set();
  const entities = await session.entities.getMultiByAttributes(
    [{ field: 'id', operator: 'in', value: requested }],
    { limit: requested.length }
  );
  return new Set(entities.map((entity) => entity.id));
}

/**
 * Store the events extracted from one document as raw events. The same
 * extraction (description and date) is stored once per document; repeats
 * in `extracted` or from an earlier run reuse the stored row.
 */
export async function stageRawEvents(
  session: StoreSession,
  sourceDocument: Pick<SourceDocument, 'id'>,
  extracted: ExtractedEventInput[]
): Promise<StagedRawEvent[]> {
  if (extracted.length === 0) return [];

  const bySignature = new Map<string, ExtractedEvent>();
  extracted.forEach((input, index) => {
    const item = parseInput(extractedEventSchema, input, `extracted event ${index}`);
    const signature = rawEventSignature(sourceDocument.id, item.description, item.dateStr);
    if (bySignature.has(signature)) {
      log.debug({ sourceDocumentId: sourceDocument.id, index }, 'Dropping duplicate extraction');
      return;
    }
    bySignature.set(signature, item);
  });

  const signatures = [...bySignature.keys()];
  const stored = await session.rawEvents.getMultiByAttributes(
    [
      { field: 'sourceDocumentId', operator: 'eq', value: sourceDocument.id },
      { field: 'deduplicationSignature', operator: 'in', value: signatures },
    ],
    { limit: signatures.length }
  );
  const rawEventsBySignature = new Map(stored.map((row) => [row.deduplicationSignature, row]));

  const toCreate: NewRawEvent[] = [];
  for (const [signature, item] of bySignature) {
    if (rawEventsBySignature.has(signature)) continue;

    const dateCheck = checkDateInfo(item.dateInfo);
    if (!dateCheck.valid) {
      log.warn(
        { sourceDocumentId: sourceDocument.id, dateStr: item.dateStr, errors: dateCheck.errors },
        'Malformed date info, storing as given'
      );
    }

    toCreate.push({
      deduplicationSignature: signature,
      description: item.description,
      dateStr: item.dateStr,
      dateInfo: item.dateInfo ?? null,
      sourceTextSnippet: item.sourceTextSnippet ?? null,
      sourceDocumentId: sourceDocument.id,
    });
  }

  const created = new Set<string>();
  for (const row of await session.rawEvents.batchCreate(toCreate)) {
    rawEventsBySignature.set(row.deduplicationSignature, row);
    created.add(row.id);
  }

  const requestedIds = [...new Set([...bySignature.values()].flatMap((item) => item.entityIds))];
  const knownIds = await existingEntityIds(session, requestedIds);
  const unknownIds = requestedIds.filter((id) => !knownIds.has(id));
  if (unknownIds.length > 0) {
    log.warn({ sourceDocumentId: sourceDocument.id, unknownIds }, 'Skipping links to unknown entities');
  }

  const staged: StagedRawEvent[] = [];
  for (const [signature, item] of bySignature) {
    const rawEvent = rawEventsBySignature.get(signature);
    if (!rawEvent) {
      throw new Error(`Raw event for signature ${signature} was not stored`);
    }
    staged.push({
      rawEvent,
      entityIds: [...new Set(item.entityIds.filter((id) => knownIds.has(id)))],
      isNew: created.has(rawEvent.id),
    });
  }

  // Links on reused raw events stay as they were
  await linkRawEventEntities(
    session,
    staged
      .filter((item) => item.isNew)
      .flatMap((item) => item.entityIds.map((entityId) => ({ rawEventId: item.rawEvent.id, entityId })))
  );

  log.info(
    { sourceDocumentId: sourceDocument.id, staged: staged.length, created: created.size },
    'Staged raw events'
  );
  return staged;
}
