import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  boolean,
  pgEnum,
  primaryKey,
  index,
  uniqueIndex,
  text,
  jsonb,
  vector,
} from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';
import { EMBEDDING_DIMENSIONS } from '../config/constants';
import type { DateInfoPayload } from '../types/chronicle';

export const processingStatusEnum = pgEnum('processing_status', [
  'pending',
  'processing_entities',
  'processing_linking',
  'completed',
]);

export const entities = pgTable('entities', {
  id: uuid('id').defaultRandom().primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  entityType: varchar('entity_type', { length: 50 }).notNull(),
  canonicalId: varchar('canonical_id', { length: 50 }).notNull(),
  existenceVerified: boolean('existence_verified').default(false).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  canonicalIdUnique: uniqueIndex('entities_canonical_id_unique').on(table.canonicalId),
  typeIdx: index('entities_entity_type_idx').on(table.entityType),
  nameIdx: index('entities_name_idx').on(table.name),
}));

export const sourceDocuments = pgTable('source_documents', {
  id: uuid('id').defaultRandom().primaryKey(),
  title: varchar('title', { length: 255 }).notNull(),
  language: varchar('language', { length: 10 }).notNull(),
  sourceType: varchar('source_type', { length: 50 }).notNull(),
  url: text('url'),
  pageId: varchar('page_id', { length: 50 }),
  canonicalId: varchar('canonical_id', { length: 50 }),
  extract: text('extract'),
  processingStatus: processingStatusEnum('processing_status').default('pending').notNull(),
  entityId: uuid('entity_id').references(() => entities.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  urlSourceTypeUnique: uniqueIndex('source_documents_url_source_type_unique').on(
    table.url,
    table.sourceType
  ),
  titleLanguageIdx: index('source_documents_title_language_idx').on(table.title, table.language),
  entityIdIdx: index('source_documents_entity_id_idx').on(table.entityId),
}));

export const rawEvents = pgTable('raw_events', {
  id: uuid('id').defaultRandom().primaryKey(),
  deduplicationSignature: varchar('deduplication_signature', { length: 255 }).notNull(),
  description: text('description').notNull(),
  dateStr: text('date_str').notNull(),
  dateInfo: jsonb('date_info').$type<DateInfoPayload>(),
  sourceTextSnippet: text('source_text_snippet'),
  sourceDocumentId: uuid('source_document_id')
    .notNull()
    .references(() => sourceDocuments.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  sourceSignatureUnique: uniqueIndex('raw_events_source_signature_unique').on(
    table.sourceDocumentId,
    table.deduplicationSignature
  ),
}));

export const events = pgTable('events', {
  id: uuid('id').defaultRandom().primaryKey(),
  dateStr: text('date_str').notNull(),
  description: text('description').notNull(),
  dateInfo: jsonb('date_info').$type<DateInfoPayload>(),
  embedding: vector('embedding', { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
  embeddingIdx: index('events_embedding_hnsw_idx')
    .using('hnsw', table.embedding.op('vector_cosine_ops'))
    .with({ m: 16, ef_construction: 64 }),
}));

export const eventEntityLinks = pgTable(
  'event_entity_links',
  {
    eventId: uuid('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    entityId: uuid('entity_id')
      .notNull()
      .references(() => entities.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.eventId, table.entityId] }),
    entityIdIdx: index('event_entity_links_entity_id_idx').on(table.entityId),
  })
);

export const eventRawEventLinks = pgTable(
  'event_raw_event_links',
  {
    eventId: uuid('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    rawEventId: uuid('raw_event_id')
      .notNull()
      .references(() => rawEvents.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.eventId, table.rawEventId] }),
    rawEventIdIdx: index('event_raw_event_links_raw_event_id_idx').on(table.rawEventId),
  })
);

export const rawEventEntityLinks = pgTable(
  'raw_event_entity_links',
  {
    rawEventId: uuid('raw_event_id')
      .notNull()
      .references(() => rawEvents.id, { onDelete: 'cascade' }),
    entityId: uuid('entity_id')
      .notNull()
      .references(() => entities.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.rawEventId, table.entityId] }),
    entityIdIdx: index('raw_event_entity_links_entity_id_idx').on(table.entityId),
  })
);

// Viewpoints live in the orchestration layer, so viewpoint_id carries no foreign key here.
export const viewpointEventLinks = pgTable(
  'viewpoint_event_links',
  {
    viewpointId: uuid('viewpoint_id').notNull(),
    eventId: uuid('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.viewpointId, table.eventId] }),
    eventIdIdx: index('viewpoint_event_links_event_id_idx').on(table.eventId),
  })
);

export const entitiesRelations = relations(entities, ({ many }) => ({
  sourceDocuments: many(sourceDocuments),
  eventLinks: many(eventEntityLinks),
  rawEventLinks: many(rawEventEntityLinks),
}));

export const sourceDocumentsRelations = relations(sourceDocuments, ({ one, many }) => ({
  entity: one(entities, {
    fields: [sourceDocuments.entityId],
    references: [entities.id],
  }),
  rawEvents: many(rawEvents),
}));

export const rawEventsRelations = relations(rawEvents, ({ one, many }) => ({
  sourceDocument: one(sourceDocuments, {
    fields: [rawEvents.sourceDocumentId],
    references: [sourceDocuments.id],
  }),
  eventLinks: many(eventRawEventLinks),
  entityLinks: many(rawEventEntityLinks),
}));

export const eventsRelations = relations(events, ({ many }) => ({
  entityLinks: many(eventEntityLinks),
  rawEventLinks: many(eventRawEventLinks),
  viewpointLinks: many(viewpointEventLinks),
}));

export const eventEntityLinksRelations = relations(eventEntityLinks, ({ one }) => ({
  event: one(events, {
    fields: [eventEntityLinks.eventId],
    references: [events.id],
  }),
  entity: one(entities, {
    fields: [eventEntityLinks.entityId],
    references: [entities.id],
  }),
}));

export const eventRawEventLinksRelations = relations(eventRawEventLinks, ({ one }) => ({
  event: one(events, {
    fields: [eventRawEventLinks.eventId],
    references: [events.id],
  }),
  rawEvent: one(rawEvents, {
    fields: [eventRawEventLinks.rawEventId],
    references: [rawEvents.id],
  }),
}));

export const rawEventEntityLinksRelations = relations(rawEventEntityLinks, ({ one }) => ({
  rawEvent: one(rawEvents, {
    fields: [rawEventEntityLinks.rawEventId],
    references: [rawEvents.id],
  }),
  entity: one(entities, {
    fields: [rawEventEntityLinks.entityId],
    references: [entities.id],
  }),
}));

export const viewpointEventLinksRelations = relations(viewpointEventLinks, ({ one }) => ({
  event: one(events, {
    fields: [viewpointEventLinks.eventId],
    references: [events.id],
  }),
}));
