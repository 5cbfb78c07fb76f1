import { eq, getTableColumns, inArray, type SQL } from 'drizzle-orm';
import { sourceDocuments } from '../../../models/schema';
import type { NewSourceDocument, SourceDocument } from '../../../types/chronicle';
import { urlSourceKey, type SourceDocumentRepository } from '../interface';
import { PgRepository, type Executor } from './base';

export class PgSourceDocumentRepository
  extends PgRepository<SourceDocument, NewSourceDocument>
  implements SourceDocumentRepository
{
  constructor(db: Executor) {
    super(db, getTableColumns(sourceDocuments), 'source document');
  }

  protected async select(where: SQL | undefined, orderBy: SQL[], limit: number, offset: number) {
    return this.db
      .select()
      .from(sourceDocuments)
      .where(where)
      .orderBy(...orderBy)
      .limit(limit)
      .offset(offset);
  }

  protected async insert(values: NewSourceDocument[]) {
    return this.db.insert(sourceDocuments).values(values).returning();
  }

  protected async updateById(id: string, fields: Partial<NewSourceDocument>) {
    return this.db
      .update(sourceDocuments)
      .set({ ...fields, updatedAt: new Date() })
      .where(eq(sourceDocuments.id, id))
      .returning();
  }

  async listExistingKeys(urls: string[]): Promise<Set<string>> {
    const keys = new Set<string>();
    if (urls.length === 0) return keys;

    const rows = await this.db
      .select({ url: sourceDocuments.url, sourceType: sourceDocuments.sourceType })
      .from(sourceDocuments)
      .where(inArray(sourceDocuments.url, urls));

    for (const row of rows) {
      if (row.url) keys.add(urlSourceKey(row.url, row.sourceType));
    }
    return keys;
  }
}
