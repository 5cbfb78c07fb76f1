import { eq, getTableColumns, type SQL } from 'drizzle-orm';
import { rawEvents } from '../../../models/schema';
import type { NewRawEvent, RawEvent } from '../../../types/chronicle';
import type { RawEventRepository } from '../interface';
import { PgRepository, type Executor } from './base';

export class PgRawEventRepository
  extends PgRepository<RawEvent, NewRawEvent>
  implements RawEventRepository
{
  constructor(db: Executor) {
    super(db, getTableColumns(rawEvents), 'raw event');
  }

  protected async select(where: SQL | undefined, orderBy: SQL[], limit: number, offset: number) {
    return this.db
      .select()
      .from(rawEvents)
      .where(where)
      .orderBy(...orderBy)
      .limit(limit)
      .offset(offset);
  }

  protected async insert(values: NewRawEvent[]) {
    return this.db.insert(rawEvents).values(values).returning();
  }

  protected async updateById(id: string, fields: Partial<NewRawEvent>) {
    return this.db
      .update(rawEvents)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(rawEvents.id, id))
      .returning();
  }
}
