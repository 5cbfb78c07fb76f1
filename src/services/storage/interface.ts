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

// ========== Filters ==========

/**
 * One typed predicate on a record field. Call sites list their filters
 * explicitly instead of passing arbitrary attribute names.
 */
export type FilterSpec<TRecord> = {
  [K in keyof TRecord & string]:
    | { field: K; operator: 'eq' | 'ne'; value: NonNullable<TRecord[K]> }
    | { field: K; operator: 'in'; value: ReadonlyArray<NonNullable<TRecord[K]>> }
    | { field: K; operator: 'isNull' | 'isNotNull' };
}[keyof TRecord & string];

export interface OrderSpec<TRecord> {
  field: keyof TRecord & string;
  direction: 'asc' | 'desc';
}

export interface QueryOptions<TRecord> {
  orderBy?: OrderSpec<TRecord>[];
  limit?: number;
  offset?: number;
}

export const DEFAULT_QUERY_LIMIT = 100;

// ========== Repositories ==========

export interface Repository<TRecord extends { id: string }, TInsert> {
  get(id: string): Promise<TRecord | null>;
  getByAttributes(filters: FilterSpec<TRecord>[]): Promise<TRecord | null>;
  getMultiByAttributes(
    filters: FilterSpec<TRecord>[],
    options?: QueryOptions<TRecord>
  ): Promise<TRecord[]>;
  create(fields: TInsert): Promise<TRecord>;
  batchCreate(fields: TInsert[]): Promise<TRecord[]>;
  update(record: TRecord, fields: Partial<TInsert>): Promise<TRecord>;
}

export interface TitleLanguage {
  title: string;
  language: string;
}

export interface EntityRepository extends Repository<Entity, NewEntity> {
  /** Entity verified by the source document with this title and language. */
  getBySourceTitle(title: string, language: string): Promise<Entity | null>;
  /** Keyed by `titleLanguageKey(title, language)`. */
  batchGetBySourceTitles(pairs: TitleLanguage[]): Promise<Map<string, Entity>>;
}

export interface SourceDocumentRepository extends Repository<SourceDocument, NewSourceDocument> {
  /** Existing (url, sourceType) pairs among `urls`, keyed by `urlSourceKey`. */
  listExistingKeys(urls: string[]): Promise<Set<string>>;
}

export type RawEventRepository = Repository<RawEvent, NewRawEvent>;

export interface EventRepository extends Repository<Event, NewEvent> {
  /**
   * Approximate nearest neighbours by cosine distance, closest first,
   * restricted to `distance < maxDistance`.
   */
  findNearestByEmbedding(embedding: number[], limit: number, maxDistance: number): Promise<Event[]>;
  /** Exact cosine distance between a stored event and `embedding`; null if the event is gone. */
  exactDistance(eventId: string, embedding: number[]): Promise<number | null>;
  /** Source documents backing the event through its raw events. */
  getSourceDocumentIds(eventId: string): Promise<Set<string>>;
}

export interface AssociationRepository<TLink> {
  /** Inserts all rows in one write; rows whose key already exists are skipped. */
  bulkInsertIgnoreConflict(rows: TLink[]): Promise<void>;
}

export interface EventRawEventLinkRepository extends AssociationRepository<EventRawEventLink> {
  exists(link: EventRawEventLink): Promise<boolean>;
}

// ========== Sessions ==========

/**
 * Handle for one open transaction. Services receive it explicitly; only
 * the code that opened the transaction decides commit or rollback.
 */
export interface StoreSession {
  entities: EntityRepository;
  sourceDocuments: SourceDocumentRepository;
  rawEvents: RawEventRepository;
  events: EventRepository;
  eventEntityLinks: AssociationRepository<EventEntityLink>;
  eventRawEventLinks: EventRawEventLinkRepository;
  rawEventEntityLinks: AssociationRepository<RawEventEntityLink>;
  viewpointEventLinks: AssociationRepository<ViewpointEventLink>;
  /** Runs `fn` in a nested transaction; a rejection undoes only that part. */
  savepoint<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
}

export interface Store {
  transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
}

// ========== Keys ==========

export function titleLanguageKey(title: string, language: string): string {
  return JSON.stringify([title, language]);
}

export function urlSourceKey(url: string, sourceType: string): string {
  return JSON.stringify([url, sourceType]);
}
