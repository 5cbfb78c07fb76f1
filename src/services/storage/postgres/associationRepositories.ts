import { and, eq } from 'drizzle-orm';
import {
  eventEntityLinks,
  eventRawEventLinks,
  rawEventEntityLinks,
  viewpointEventLinks,
} from '../../../models/schema';
import type {
  EventEntityLink,
  EventRawEventLink,
  RawEventEntityLink,
  ViewpointEventLink,
} from '../../../types/chronicle';
import type { AssociationRepository, EventRawEventLinkRepository } from '../interface';
import type { Executor } from './base';

export class PgEventEntityLinkRepository implements AssociationRepository<EventEntityLink> {
  constructor(private readonly db: Executor) {}

  async bulkInsertIgnoreConflict(rows: EventEntityLink[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(eventEntityLinks).values(rows).onConflictDoNothing();
  }
}

export class PgEventRawEventLinkRepository implements EventRawEventLinkRepository {
  constructor(private readonly db: Executor) {}

  async bulkInsertIgnoreConflict(rows: EventRawEventLink[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(eventRawEventLinks).values(rows).onConflictDoNothing();
  }

  async exists(link: EventRawEventLink): Promise<boolean> {
    const [row] = await this.db
      .select({ eventId: eventRawEventLinks.eventId })
      .from(eventRawEventLinks)
      .where(
        and(
          eq(eventRawEventLinks.eventId, link.eventId),
          eq(eventRawEventLinks.rawEventId, link.rawEventId)
        )
      )
      .limit(1);
    return row !== undefined;
  }
}

export class PgRawEventEntityLinkRepository implements AssociationRepository<RawEventEntityLink> {
  constructor(private readonly db: Executor) {}

  async bulkInsertIgnoreConflict(rows: RawEventEntityLink[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(rawEventEntityLinks).values(rows).onConflictDoNothing();
  }
}

export class PgViewpointEventLinkRepository implements AssociationRepository<ViewpointEventLink> {
  constructor(private readonly db: Executor) {}

  async bulkInsertIgnoreConflict(rows: ViewpointEventLink[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db.insert(viewpointEventLinks).values(rows).onConflictDoNothing();
  }
}
