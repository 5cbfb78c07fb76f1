import { randomUUID } from 'node:crypto';
import type {
  Entity,
  Event,
  EventEntityLink,
  EventRawEventLink,
  NewEntity,
  NewEvent,
  NewRawEvent,
  NewSourceDocument,
  RawEvent,
  RawEventEntityLink,
  SourceDocument,
  ViewpointEventLink,
} from '../../types/chronicle';
import { ConflictError } from '../../utils/errors';
import {
  DEFAULT_QUERY_LIMIT,
  titleLanguageKey,
  urlSourceKey,
  type AssociationRepository,
  type EntityRepository,
  type EventRepository,
  type FilterSpec,
  type OrderSpec,
  type QueryOptions,
  type RawEventRepository,
  type Repository,
  type SourceDocumentRepository,
  type Store,
  type StoreSession,
  type TitleLanguage,
} from '../../services/storage/interface';

interface Tables {
  entities: Entity[];
  sourceDocuments: SourceDocument[];
  rawEvents: RawEvent[];
  events: Event[];
  eventEntityLinks: EventEntityLink[];
  eventRawEventLinks: EventRawEventLink[];
  rawEventEntityLinks: RawEventEntityLink[];
  viewpointEventLinks: ViewpointEventLink[];
}

function emptyTables(): Tables {
  return {
    entities: [],
    sourceDocuments: [],
    rawEvents: [],
    events: [],
    eventEntityLinks: [],
    eventRawEventLinks: [],
    rawEventEntityLinks: [],
    viewpointEventLinks: [],
  };
}

/** Shared table state; transactions swap `tables` back on rollback. */
class MemoryDatabase {
  tables: Tables = emptyTables();

  snapshot(): Tables {
    return structuredClone(this.tables);
  }
}

export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * (b[i] ?? 0);
    normA += a[i] * a[i];
    normB += (b[i] ?? 0) * (b[i] ?? 0);
  }
  // Zero vectors yield NaN, which no distance comparison accepts
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function matches<TRecord>(record: TRecord, filter: FilterSpec<TRecord>): boolean {
  const value: unknown = record[filter.field];
  switch (filter.operator) {
    case 'eq':
      return value === filter.value;
    case 'ne':
      return value !== filter.value;
    case 'in':
      return filter.value.some((candidate) => candidate === value);
    case 'isNull':
      return value === null || value === undefined;
    case 'isNotNull':
      return value !== null && value !== undefined;
  }
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

function sortRecords<TRecord>(records: TRecord[], orderBy: OrderSpec<TRecord>[]): TRecord[] {
  return [...records].sort((left, right) => {
    for (const { field, direction } of orderBy) {
      const result = compareValues(left[field], right[field]);
      if (result !== 0) return direction === 'asc' ? result : -result;
    }
    return 0;
  });
}

interface TableConfig<TRecord, TInsert> {
  name: string;
  rows: () => TRecord[];
  build: (values: TInsert, id: string, now: Date) => TRecord;
  /** Unique keys; a null key is exempt, as NULLs are in a Postgres unique index. */
  uniqueKeys: Array<(record: TRecord) => string | null>;
}

class MemoryRepository<TRecord extends { id: string; updatedAt: Date }, TInsert>
  implements Repository<TRecord, TInsert>
{
  constructor(
    protected readonly db: MemoryDatabase,
    protected readonly config: TableConfig<TRecord, TInsert>
  ) {}

  protected get rows(): TRecord[] {
    return this.config.rows();
  }

  async get(id: string): Promise<TRecord | null> {
    return this.rows.find((row) => row.id === id) ?? null;
  }

  async getByAttributes(filters: FilterSpec<TRecord>[]): Promise<TRecord | null> {
    return this.rows.find((row) => filters.every((filter) => matches(row, filter))) ?? null;
  }

  async getMultiByAttributes(
    filters: FilterSpec<TRecord>[],
    options: QueryOptions<TRecord> = {}
  ): Promise<TRecord[]> {
    const offset = options.offset ?? 0;
    const limit = options.limit ?? DEFAULT_QUERY_LIMIT;
    const found = this.rows.filter((row) => filters.every((filter) => matches(row, filter)));
    return sortRecords(found, options.orderBy ?? []).slice(offset, offset + limit);
  }

  async create(fields: TInsert): Promise<TRecord> {
    const [record] = await this.batchCreate([fields]);
    return record;
  }

  async batchCreate(fields: TInsert[]): Promise<TRecord[]> {
    const now = new Date();
    const records = fields.map((values) => this.config.build(values, randomUUID(), now));
    const pending = [...this.rows];
    for (const record of records) {
      this.assertUnique(record, pending);
      pending.push(record);
    }
    this.rows.push(...records);
    return records;
  }

  async update(record: TRecord, fields: Partial<TInsert>): Promise<TRecord> {
    const index = this.rows.findIndex((row) => row.id === record.id);
    if (index === -1) {
      throw new Error(`Update of ${this.config.name} ${record.id} matched no row`);
    }
    const updated: TRecord = { ...this.rows[index], ...fields, updatedAt: new Date() };
    this.assertUnique(
      updated,
      this.rows.filter((row) => row.id !== record.id)
    );
    this.rows[index] = updated;
    return updated;
  }

  private assertUnique(record: TRecord, existing: TRecord[]): void {
    for (const key of this.config.uniqueKeys) {
      const value = key(record);
      if (value !== null && existing.some((row) => key(row) === value)) {
        throw new ConflictError(`Duplicate ${this.config.name}: ${value}`);
      }
    }
  }
}

class MemoryEntityRepository
  extends MemoryRepository<Entity, NewEntity>
  implements EntityRepository
{
  async getBySourceTitle(title: string, language: string): Promise<Entity | null> {
    const found = await this.batchGetBySourceTitles([{ title, language }]);
    return found.get(titleLanguageKey(title, language)) ?? null;
  }

  async batchGetBySourceTitles(pairs: TitleLanguage[]): Promise<Map<string, Entity>> {
    const wanted = new Set(pairs.map(({ title, language }) => titleLanguageKey(title, language)));
    const found = new Map<string, Entity>();
    for (const document of this.db.tables.sourceDocuments) {
      const key = titleLanguageKey(document.title, document.language);
      if (!document.entityId || !wanted.has(key) || found.has(key)) continue;
      const entity = this.rows.find((row) => row.id === document.entityId);
      if (entity) found.set(key, entity);
    }
    return found;
  }
}

class MemorySourceDocumentRepository
  extends MemoryRepository<SourceDocument, NewSourceDocument>
  implements SourceDocumentRepository
{
  async listExistingKeys(urls: string[]): Promise<Set<string>> {
    const keys = new Set<string>();
    for (const row of this.rows) {
      if (row.url && urls.includes(row.url)) keys.add(urlSourceKey(row.url, row.sourceType));
    }
    return keys;
  }
}

class MemoryEventRepository extends MemoryRepository<Event, NewEvent> implements EventRepository {
  async findNearestByEmbedding(
    embedding: number[],
    limit: number,
    maxDistance: number
  ): Promise<Event[]> {
    return this.rows
      .map((event) => ({ event, distance: cosineDistance(event.embedding, embedding) }))
      .filter(({ distance }) => distance < maxDistance)
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit)
      .map(({ event }) => event);
  }

  async exactDistance(eventId: string, embedding: number[]): Promise<number | null> {
    const event = await this.get(eventId);
    return event ? cosineDistance(event.embedding, embedding) : null;
  }

  async getSourceDocumentIds(eventId: string): Promise<Set<string>> {
    const rawEventIds = new Set(
      this.db.tables.eventRawEventLinks
        .filter((link) => link.eventId === eventId)
        .map((link) => link.rawEventId)
    );
    return new Set(
      this.db.tables.rawEvents
        .filter((rawEvent) => rawEventIds.has(rawEvent.id))
        .map((rawEvent) => rawEvent.sourceDocumentId)
    );
  }
}

class MemoryAssociationRepository<TLink> implements AssociationRepository<TLink> {
  constructor(
    private readonly rows: () => TLink[],
    private readonly key: (link: TLink) => string
  ) {}

  async bulkInsertIgnoreConflict(links: TLink[]): Promise<void> {
    const existing = new Set(this.rows().map(this.key));
    for (const link of links) {
      const key = this.key(link);
      if (existing.has(key)) continue;
      existing.add(key);
      this.rows().push({ ...link });
    }
  }

  async exists(link: TLink): Promise<boolean> {
    const key = this.key(link);
    return this.rows().some((row) => this.key(row) === key);
  }
}

/**
 * In-process Store with the Postgres store's observable behaviour: unique
 * keys raise ConflictError, links ignore conflicts, vector search uses
 * cosine distance, and a rejected transaction or savepoint restores the
 * tables to what they were when it opened.
 *
 * There is one session object, so tests can spy on its repositories.
 */
export class MemoryStore implements Store {
  readonly db = new MemoryDatabase();
  readonly session: StoreSession;
  transactionCount = 0;

  constructor() {
    const db = this.db;
    this.session = {
      entities: new MemoryEntityRepository(db, {
        name: 'entity',
        rows: () => db.tables.entities,
        build: (values, id, now) => ({
          id,
          name: values.name,
          entityType: values.entityType,
          canonicalId: values.canonicalId,
          existenceVerified: values.existenceVerified ?? false,
          createdAt: now,
          updatedAt: now,
        }),
        uniqueKeys: [(entity) => entity.canonicalId],
      }),
      sourceDocuments: new MemorySourceDocumentRepository(db, {
        name: 'source document',
        rows: () => db.tables.sourceDocuments,
        build: (values, id, now) => ({
          id,
          title: values.title,
          language: values.language,
          sourceType: values.sourceType,
          url: values.url ?? null,
          pageId: values.pageId ?? null,
          canonicalId: values.canonicalId ?? null,
          extract: values.extract ?? null,
          processingStatus: values.processingStatus ?? 'pending',
          entityId: values.entityId ?? null,
          createdAt: now,
          updatedAt: now,
        }),
        uniqueKeys: [(document) => (document.url ? urlSourceKey(document.url, document.sourceType) : null)],
      }),
      rawEvents: new MemoryRepository<RawEvent, NewRawEvent>(db, {
        name: 'raw event',
        rows: () => db.tables.rawEvents,
        build: (values, id, now) => ({
          id,
          deduplicationSignature: values.deduplicationSignature,
          description: values.description,
          dateStr: values.dateStr,
          dateInfo: values.dateInfo ?? null,
          sourceTextSnippet: values.sourceTextSnippet ?? null,
          sourceDocumentId: values.sourceDocumentId,
          createdAt: now,
          updatedAt: now,
        }),
        uniqueKeys: [(rawEvent) => `${rawEvent.sourceDocumentId}:${rawEvent.deduplicationSignature}`],
      }) satisfies RawEventRepository,
      events: new MemoryEventRepository(db, {
        name: 'event',
        rows: () => db.tables.events,
        build: (values, id, now) => ({
          id,
          dateStr: values.dateStr,
          description: values.description,
          dateInfo: values.dateInfo ?? null,
          embedding: values.embedding,
          createdAt: now,
          updatedAt: now,
        }),
        uniqueKeys: [],
      }),
      eventEntityLinks: new MemoryAssociationRepository(
        () => db.tables.eventEntityLinks,
        (link) => `${link.eventId}:${link.entityId}`
      ),
      eventRawEventLinks: new MemoryAssociationRepository(
        () => db.tables.eventRawEventLinks,
        (link) => `${link.eventId}:${link.rawEventId}`
      ),
      rawEventEntityLinks: new MemoryAssociationRepository(
        () => db.tables.rawEventEntityLinks,
        (link) => `${link.rawEventId}:${link.entityId}`
      ),
      viewpointEventLinks: new MemoryAssociationRepository(
        () => db.tables.viewpointEventLinks,
        (link) => `${link.viewpointId}:${link.eventId}`
      ),
      savepoint: <T>(fn: (session: StoreSession) => Promise<T>) => this.runIsolated(fn),
    };
  }

  get tables(): Tables {
    return this.db.tables;
  }

  async transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    this.transactionCount++;
    return this.runIsolated(fn);
  }

  private async runIsolated<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const snapshot = this.db.snapshot();
    try {
      return await fn(this.session);
    } catch (error) {
      this.db.tables = snapshot;
      throw error;
    }
  }
}
