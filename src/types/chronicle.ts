import type {
  entities,
  events,
  eventEntityLinks,
  eventRawEventLinks,
  rawEventEntityLinks,
  rawEvents,
  sourceDocuments,
  viewpointEventLinks,
} from '../models/schema';
import type {
  entityRequestSchema,
  extractedEventSchema,
  parsedDateInfoSchema,
  sourceDocumentMetadataSchema,
} from '../utils/validation';
import type { z } from 'zod';

// ========== Records ==========

export type Entity = typeof entities.$inferSelect;
export type NewEntity = typeof entities.$inferInsert;

export type SourceDocument = typeof sourceDocuments.$inferSelect;
export type NewSourceDocument = typeof sourceDocuments.$inferInsert;
export type ProcessingStatus = SourceDocument['processingStatus'];

export type RawEvent = typeof rawEvents.$inferSelect;
export type NewRawEvent = typeof rawEvents.$inferInsert;

export type Event = typeof events.$inferSelect;
export type NewEvent = typeof events.$inferInsert;

export type EventEntityLink = typeof eventEntityLinks.$inferSelect;
export type EventRawEventLink = typeof eventRawEventLinks.$inferSelect;
export type RawEventEntityLink = typeof rawEventEntityLinks.$inferSelect;
export type ViewpointEventLink = typeof viewpointEventLinks.$inferSelect;

// ========== Inputs ==========

/** Structured date as stored; well-formed payloads match ParsedDateInfo. */
export type DateInfoPayload = Record<string, unknown>;

export type ParsedDateInfo = z.infer<typeof parsedDateInfoSchema>;
export type EntityRequest = z.infer<typeof entityRequestSchema>;
export type SourceDocumentMetadata = z.infer<typeof sourceDocumentMetadataSchema>;
export type ExtractedEvent = z.infer<typeof extractedEventSchema>;
export type ExtractedEventInput = z.input<typeof extractedEventSchema>;
export type SourceDocumentMetadataInput = z.input<typeof sourceDocumentMetadataSchema>;

/**
 * The parts of an entity the embedding text needs. Resolved entities and
 * plain name/type pairs from extraction both satisfy it.
 */
export interface EntityDescriptor {
  name: string;
  entityType?: string | null;
}

// ========== Entity resolution results ==========

interface ResolutionBase {
  message: string;
}

export type EntityResolution =
  | (ResolutionBase & { status: 'resolved'; entityId: string; verified: true })
  | (ResolutionBase & { status: 'not_found'; entityId: null; verified: false })
  | (ResolutionBase & {
      status: 'disambiguation';
      entityId: null;
      verified: false;
      options: string[];
    })
  | (ResolutionBase & { status: 'error'; entityId: null; verified: false });

export type EntityResolutionStatus = EntityResolution['status'];
