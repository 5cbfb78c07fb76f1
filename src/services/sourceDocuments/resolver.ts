import {
  DEFAULT_VERIFICATION_SOURCE_TYPE,
  EXTRACT_LIMIT,
  UNKNOWN_ENTITY_TYPE,
} from '../../config/constants';
import type {
  ProcessingStatus,
  SourceDocument,
  SourceDocumentMetadata,
  SourceDocumentMetadataInput,
} from '../../types/chronicle';
import { isUniqueViolation } from '../../utils/db';
import { ValidationError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { parseInput, sourceDocumentMetadataSchema } from '../../utils/validation';
import { resolveEntities, type EntityResolverDeps } from '../entityResolution';
import type { FilterSpec, StoreSession } from '../storage/interface';

const log = createLogger('sourceDocuments');

export const PROCESSING_STATUS_ORDER: readonly ProcessingStatus[] = [
  'pending',
  'processing_entities',
  'processing_linking',
  'completed',
];

/** Only encyclopedia sources may spawn entities. */
export function isVerificationEligible(metadata: Pick<SourceDocumentMetadata, 'url' | 'sourceType'>): boolean {
  return (
    (metadata.url?.toLowerCase().includes('wikipedia.org') ?? false) ||
    metadata.sourceType.toLowerCase().includes('wikipedia')
  );
}

function byUrl(url: string, sourceType: string): FilterSpec<SourceDocument>[] {
  return [
    { field: 'url', operator: 'eq', value: url },
    { field: 'sourceType', operator: 'eq', value: sourceType },
  ];
}

function byTitle(metadata: SourceDocumentMetadata): FilterSpec<SourceDocument>[] {
  return [
    { field: 'title', operator: 'eq', value: metadata.title },
    { field: 'language', operator: 'eq', value: metadata.language },
    { field: 'sourceType', operator: 'eq', value: metadata.sourceType },
  ];
}

function byEntity(entityId: string, sourceType: string): FilterSpec<SourceDocument>[] {
  return [
    { field: 'entityId', operator: 'eq', value: entityId },
    { field: 'sourceType', operator: 'eq', value: sourceType },
  ];
}

async function findExisting(
  session: StoreSession,
  metadata: SourceDocumentMetadata
): Promise<SourceDocument | null> {
  if (metadata.url) {
    const found = await session.sourceDocuments.getByAttributes(byUrl(metadata.url, metadata.sourceType));
    if (found) return found;
  }
  return session.sourceDocuments.getByAttributes(byTitle(metadata));
}

async function resolveDocumentEntity(
  session: StoreSession,
  metadata: SourceDocumentMetadata,
  deps: EntityResolverDeps
): Promise<{ entityId: string | null; existing: SourceDocument | null }> {
  const entity = await session.entities.getBySourceTitle(metadata.title, metadata.language);

  if (entity) {
    const existing = await session.sourceDocuments.getByAttributes(
      byEntity(entity.id, metadata.sourceType)
    );
    return { entityId: entity.id, existing };
  }

  if (!isVerificationEligible(metadata)) {
    log.debug({ title: metadata.title, sourceType: metadata.sourceType }, 'Source does not create entities');
    return { entityId: null, existing: null };
  }

  try {
    const [result] = await session.savepoint((sp) =>
      resolveEntities(
        sp,
        [{ name: metadata.title, entityType: UNKNOWN_ENTITY_TYPE, language: metadata.language }],
        metadata.sourceType || DEFAULT_VERIFICATION_SOURCE_TYPE,
        deps
      )
    );
    if (result?.status === 'resolved') {
      return { entityId: result.entityId, existing: null };
    }
    log.warn(
      { title: metadata.title, status: result?.status, message: result?.message },
      'Entity resolution returned no entity, continuing without one'
    );
  } catch (error) {
    log.error(
      { title: metadata.title, error: errorMessage(error) },
      'Entity resolution failed, continuing without entity'
    );
  }
  return { entityId: null, existing: null };
}

async function refetchAfterConflict(
  session: StoreSession,
  metadata: SourceDocumentMetadata,
  entityId: string | null
): Promise<SourceDocument | null> {
  const lookups: FilterSpec<SourceDocument>[][] = [];
  if (metadata.url) lookups.push(byUrl(metadata.url, metadata.sourceType));
  lookups.push(byTitle(metadata));
  if (entityId) lookups.push(byEntity(entityId, metadata.sourceType));

  for (const filters of lookups) {
    const found = await session.sourceDocuments.getByAttributes(filters);
    if (found) return found;
  }
  return null;
}

/**
 * Find the stored document for `input`, or create it together with the
 * entity it verifies. Concurrent creators converge on one row through the
 * (url, sourceType) unique key.
 */
export async function resolveSourceDocument(
  session: StoreSession,
  input: SourceDocumentMetadataInput,
  deps: EntityResolverDeps = {}
): Promise<SourceDocument> {
  const metadata = parseInput(sourceDocumentMetadataSchema, input, 'source document metadata');

  const existing = await findExisting(session, metadata);
  if (existing) {
    log.info({ sourceDocumentId: existing.id, title: metadata.title }, 'Found existing source document');
    return existing;
  }

  const resolution = await resolveDocumentEntity(session, metadata, deps);
  if (resolution.existing) {
    log.info(
      { sourceDocumentId: resolution.existing.id, entityId: resolution.entityId },
      'Found existing source document through its entity'
    );
    return resolution.existing;
  }
  const { entityId } = resolution;

  // Entity resolution may have just written this very document
  if (metadata.url) {
    const created = await session.sourceDocuments.getByAttributes(byUrl(metadata.url, metadata.sourceType));
    if (created) return created;
  }

  try {
    const document = await session.savepoint((sp) =>
      sp.sourceDocuments.create({
        title: metadata.title,
        language: metadata.language,
        sourceType: metadata.sourceType,
        url: metadata.url ?? null,
        pageId: metadata.pageId ?? null,
        extract: metadata.textContent ? metadata.textContent.slice(0, EXTRACT_LIMIT) : null,
        processingStatus: 'pending',
        entityId,
      })
    );
    log.info({ sourceDocumentId: document.id, title: metadata.title, entityId }, 'Created source document');
    return document;
  } catch (error) {
    if (!isUniqueViolation(error)) throw error;

    log.warn({ title: metadata.title, url: metadata.url }, 'Source document created concurrently, refetching');
    const concurrent = await refetchAfterConflict(session, metadata, entityId);
    if (!concurrent) throw error;
    return concurrent;
  }
}

/** Moves `document` forward through the processing states; never backwards. */
export async function advanceProcessingStatus(
  session: StoreSession,
  document: SourceDocument,
  status: ProcessingStatus
): Promise<SourceDocument> {
  const from = PROCESSING_STATUS_ORDER.indexOf(document.processingStatus);
  const to = PROCESSING_STATUS_ORDER.indexOf(status);

  if (to < from) {
    throw new ValidationError(
      `Cannot move source document ${document.id} from '${document.processingStatus}' back to '${status}'`
    );
  }
  if (to === from) return document;

  return session.sourceDocuments.update(document, { processingStatus: status });
}
