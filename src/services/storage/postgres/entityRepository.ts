import { and, eq, getTableColumns, or, type SQL } from 'drizzle-orm';
import { entities, sourceDocuments } from '../../../models/schema';
import type { Entity, NewEntity } from '../../../types/chronicle';
import { titleLanguageKey, type EntityRepository, type TitleLanguage } from '../interface';
import { PgRepository, type Executor } from './base';

export class PgEntityRepository
  extends PgRepository<Entity, NewEntity>
  implements EntityRepository
{
  constructor(db: Executor) {
    super(db, getTableColumns(entities), 'entity');
  }

  protected async select(where: SQL | undefined, orderBy: SQL[], limit: number, offset: number) {
    return this.db
      .select()
      .from(entities)
      .where(where)
      .orderBy(...orderBy)
      .limit(limit)
      .offset(offset);
  }

  protected async insert(values: NewEntity[]) {
    return this.db.insert(entities).values(values).returning();
  }

  protected async updateById(id: string, fields: Partial<NewEntity>) {
    return this.db
      .update(entities)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(entities.id, id))
      .returning();
  }

  async getBySourceTitle(title: string, language: string): Promise<Entity | null> {
    const [row] = await this.db
      .select({ entity: entities })
      .from(sourceDocuments)
      .innerJoin(entities, eq(sourceDocuments.entityId, entities.id))
      .where(and(eq(sourceDocuments.title, title), eq(sourceDocuments.language, language)))
      .limit(1);
    return row?.entity ?? null;
  }

  async batchGetBySourceTitles(pairs: TitleLanguage[]): Promise<Map<string, Entity>> {
    const found = new Map<string, Entity>();
    if (pairs.length === 0) return found;

    const rows = await this.db
      .select({
        title: sourceDocuments.title,
        language: sourceDocuments.language,
        entity: entities,
      })
      .from(sourceDocuments)
      .innerJoin(entities, eq(sourceDocuments.entityId, entities.id))
      .where(
        or(
          ...pairs.map(({ title, language }) =>
            and(eq(sourceDocuments.title, title), eq(sourceDocuments.language, language))
          )
        )
      );

    for (const row of rows) {
      const key = titleLanguageKey(row.title, row.language);
      if (!found.has(key)) {
        found.set(key, row.entity);
      }
    }
    return found;
  }
}
