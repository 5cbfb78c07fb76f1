/**
 * Entity Resolution
 *
 * Maps (name, type, language) mentions to canonical entities in three phases:
 * 1. Local lookup through verifying source documents
 * 2. Verification lookup, one request at a time
 * 3. Create-or-merge keyed by canonical id, plus the verifying documents
 *
 * Results keep input order. Phases 1 and 2 never throw for a single request;
 * store failures in phase 3 propagate to the caller's transaction.
 */

import {
  DEFAULT_VERIFICATION_SOURCE_TYPE,
  EXTRACT_LIMIT,
  UNKNOWN_ENTITY_TYPE,
} from '../../config/constants';
import type {
  Entity,
  EntityRequest,
  EntityResolution,
  NewEntity,
  NewSourceDocument,
} from '../../types/chronicle';
import { errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { entityRequestSchema, parseInput } from '../../utils/validation';
import { titleLanguageKey, urlSourceKey, type StoreSession } from '../storage/interface';
import { getVerificationSource, type PageLookup } from '../verification';
import {
  disambiguationResult,
  errorResult,
  notFoundResult,
  resolvedResult,
  type EntityResolverDeps,
  type VerifiedMatch,
} from './types';

const log = createLogger('entityResolution');

type ResultSlots = Array<EntityResolution | undefined>;

/**
 * A stored UNKNOWN type is refined by the first specific type requested;
 * a specific stored type is never overwritten.
 */
export function shouldRefineType(storedType: string, requestedType: string): boolean {
  return (
    storedType.toUpperCase() === UNKNOWN_ENTITY_TYPE &&
    requestedType.toUpperCase() !== UNKNOWN_ENTITY_TYPE
  );
}

async function lookupLocally(
  session: StoreSession,
  requests: EntityRequest[],
  results: ResultSlots
): Promise<void> {
  try {
    // Savepoint so a failed lookup leaves the caller's transaction usable
    const found = await session.savepoint(async (sp) => {
      const entities = await sp.entities.batchGetBySourceTitles(
        requests.map(({ name, language }) => ({ title: name, language }))
      );

      const matches = new Map<number, Entity>();
      const refined = new Set<string>();

      for (const [index, request] of requests.entries()) {
        const entity = entities.get(titleLanguageKey(request.name, request.language));
        if (!entity) continue;

        if (!refined.has(entity.id) && shouldRefineType(entity.entityType, request.entityType)) {
          log.info(
            { canonicalId: entity.canonicalId, from: entity.entityType, to: request.entityType },
            'Refining entity type'
          );
          await sp.entities.update(entity, { entityType: request.entityType });
          refined.add(entity.id);
        }
        matches.set(index, entity);
      }
      return matches;
    });

    for (const [index, entity] of found) {
      const { name, language } = requests[index];
      results[index] = resolvedResult(
        entity.id,
        `Found existing entity by '${name}(${language})'.`
      );
    }
  } catch (error) {
    log.error(
      { error: errorMessage(error), count: requests.length },
      'Local entity lookup failed, verifying all requests'
    );
  }
}

async function verifyRemaining(
  requests: EntityRequest[],
  results: ResultSlots,
  deps: EntityResolverDeps
): Promise<VerifiedMatch[]> {
  const verification = deps.verification ?? getVerificationSource();
  const matches: VerifiedMatch[] = [];

  for (const [index, request] of requests.entries()) {
    if (results[index]) continue;

    let page: PageLookup;
    try {
      page = await verification.lookup(request.name, request.language);
    } catch (error) {
      log.warn(
        { name: request.name, language: request.language, error: errorMessage(error) },
        'Verification lookup failed'
      );
      results[index] = errorResult(
        `Verification lookup for '${request.name}' failed: ${errorMessage(error)}`
      );
      continue;
    }

    if (page.exists && !page.isDisambiguation) {
      if (!page.canonicalId) {
        log.warn({ name: request.name }, 'Verified page has no canonical id');
        results[index] = errorResult(
          `Entity '${request.name}' found but lacks required canonical identifier.`
        );
        continue;
      }
      matches.push({ index, request, page, canonicalId: page.canonicalId });
    } else if (page.isDisambiguation) {
      results[index] = disambiguationResult(
        page.disambiguationOptions,
        `Disambiguation page found for '${request.name}'.`
      );
    } else {
      results[index] = notFoundResult(`Could not verify entity '${request.name}'.`);
    }
  }

  return matches;
}

async function createOrMerge(
  session: StoreSession,
  matches: VerifiedMatch[],
  sourceType: string
): Promise<Map<number, Entity>> {
  const byCanonicalId = new Map<string, VerifiedMatch[]>();
  for (const match of matches) {
    const group = byCanonicalId.get(match.canonicalId) ?? [];
    group.push(match);
    byCanonicalId.set(match.canonicalId, group);
  }

  const canonicalIds = [...byCanonicalId.keys()];
  const existing = await session.entities.getMultiByAttributes(
    [{ field: 'canonicalId', operator: 'in', value: canonicalIds }],
    { limit: canonicalIds.length }
  );
  const entitiesById = new Map(existing.map((entity) => [entity.canonicalId, entity]));

  const toCreate: NewEntity[] = [];
  for (const [canonicalId, group] of byCanonicalId) {
    if (entitiesById.has(canonicalId)) continue;
    const [first] = group;
    toCreate.push({
      name: first.page.canonicalTitle,
      entityType: first.request.entityType,
      canonicalId,
      existenceVerified: Boolean(first.page.url),
    });
  }

  if (toCreate.length > 0) {
    log.info({ count: toCreate.length }, 'Creating verified entities');
    for (const entity of await session.entities.batchCreate(toCreate)) {
      entitiesById.set(entity.canonicalId, entity);
    }
  }

  const resolved = new Map<number, Entity>();
  for (const match of matches) {
    const entity = entitiesById.get(match.canonicalId);
    if (entity) resolved.set(match.index, entity);
  }

  await createVerifyingDocuments(session, matches, resolved, sourceType);
  return resolved;
}

async function createVerifyingDocuments(
  session: StoreSession,
  matches: VerifiedMatch[],
  resolved: Map<number, Entity>,
  sourceType: string
): Promise<void> {
  const urls = [...new Set(matches.flatMap((match) => (match.page.url ? [match.page.url] : [])))];
  if (urls.length === 0) return;

  const seen = await session.sourceDocuments.listExistingKeys(urls);
  const documents: NewSourceDocument[] = [];

  for (const { index, request, page, canonicalId } of matches) {
    const entity = resolved.get(index);
    if (!page.url || !entity) continue;

    const key = urlSourceKey(page.url, sourceType);
    if (seen.has(key)) continue;
    seen.add(key);

    documents.push({
      title: page.canonicalTitle,
      language: request.language,
      sourceType,
      url: page.url,
      pageId: page.pageId,
      canonicalId,
      extract: page.extract?.slice(0, EXTRACT_LIMIT) ?? null,
      processingStatus: 'pending',
      entityId: entity.id,
    });
  }

  if (documents.length > 0) {
    await session.sourceDocuments.batchCreate(documents);
  }
}

export async function resolveEntities(
  session: StoreSession,
  requests: EntityRequest[],
  sourceType: string = DEFAULT_VERIFICATION_SOURCE_TYPE,
  deps: EntityResolverDeps = {}
): Promise<EntityResolution[]> {
  if (requests.length === 0) return [];

  const parsed = requests.map((request, index) =>
    parseInput(entityRequestSchema, request, `entity request ${index}`)
  );
  const results: ResultSlots = new Array<EntityResolution | undefined>(parsed.length).fill(undefined);

  log.info({ count: parsed.length, sourceType }, 'Resolving entities');

  await lookupLocally(session, parsed, results);

  const pendingCount = results.filter((result) => result === undefined).length;
  if (pendingCount > 0) {
    log.info({ count: pendingCount }, 'Entities not found locally, verifying');

    const matches = await verifyRemaining(parsed, results, deps);
    if (matches.length > 0) {
      const resolved = await createOrMerge(session, matches, sourceType);
      for (const [index, entity] of resolved) {
        const { name, language } = parsed[index];
        results[index] = resolvedResult(
          entity.id,
          `Found or created verified entity for '${name}(${language})'.`
        );
      }
    }
  }

  return results.map(
    (result, index) =>
      result ?? errorResult(`ERROR_PROCESSING: An unknown error occurred for '${parsed[index].name}'.`)
  );
}
