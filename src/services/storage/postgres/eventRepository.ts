import { cosineDistance, eq, getTableColumns, lt, type SQL } from 'drizzle-orm';
import { eventRawEventLinks, events, rawEvents } from '../../../models/schema';
import type { Event, NewEvent } from '../../../types/chronicle';
import type { EventRepository } from '../interface';
import { PgRepository, type Executor } from './base';

/**
 * Canonical events plus the pgvector queries behind candidate search.
 * Distances are cosine distances (`<=>`), so similarity is `1 - distance`.
 */
export class PgEventRepository extends PgRepository<Event, NewEvent> implements EventRepository {
  constructor(db: Executor) {
    super(db, getTableColumns(events), 'event');
  }

  protected async select(where: SQL | undefined, orderBy: SQL[], limit: number, offset: number) {
    return this.db
      .select()
      .from(events)
      .where(where)
      .orderBy(...orderBy)
      .limit(limit)
      .offset(offset);
  }

  protected async insert(values: NewEvent[]) {
    return this.db.insert(events).values(values).returning();
  }

  protected async updateById(id: string, fields: Partial<NewEvent>) {
    return this.db
      .update(events)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(events.id, id))
      .returning();
  }

  async findNearestByEmbedding(
    embedding: number[],
    limit: number,
    maxDistance: number
  ): Promise<Event[]> {
    // Served by the HNSW index, so results are approximate
    const distance = cosineDistance(events.embedding, embedding);
    return this.db
      .select()
      .from(events)
      .where(lt(distance, maxDistance))
      .orderBy(distance)
      .limit(limit);
  }

  async exactDistance(eventId: string, embedding: number[]): Promise<number | null> {
    const [row] = await this.db
      .select({ distance: cosineDistance(events.embedding, embedding).mapWith(Number) })
      .from(events)
      .where(eq(events.id, eventId));
    return row ? row.distance : null;
  }

  async getSourceDocumentIds(eventId: string): Promise<Set<string>> {
    const rows = await this.db
      .selectDistinct({ sourceDocumentId: rawEvents.sourceDocumentId })
      .from(eventRawEventLinks)
      .innerJoin(rawEvents, eq(eventRawEventLinks.rawEventId, rawEvents.id))
      .where(eq(eventRawEventLinks.eventId, eventId));
    return new Set(rows.map((row) => row.sourceDocumentId));
  }
}
