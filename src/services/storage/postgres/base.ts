import { and, asc, desc, eq, inArray, isNotNull, isNull, ne, type SQL } from 'drizzle-orm';
import type { PgColumn, PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import { ConflictError } from '../../../utils/errors';
import { isUniqueViolation } from '../../../utils/db';
import {
  DEFAULT_QUERY_LIMIT,
  type FilterSpec,
  type OrderSpec,
  type QueryOptions,
  type Repository,
} from '../interface';

/** The root database or any (nested) transaction opened from it. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT>;

export type ColumnMap<TRecord> = { [K in keyof TRecord & string]: PgColumn };

export function buildWhere<TRecord>(
  columns: ColumnMap<TRecord>,
  filters: FilterSpec<TRecord>[]
): SQL | undefined {
  const conditions = filters.map((filter): SQL => {
    const column = columns[filter.field];
    switch (filter.operator) {
      case 'eq':
        return eq(column, filter.value);
      case 'ne':
        return ne(column, filter.value);
      case 'in':
        return inArray(column, [...filter.value]);
      case 'isNull':
        return isNull(column);
      case 'isNotNull':
        return isNotNull(column);
    }
  });
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export function buildOrderBy<TRecord>(
  columns: ColumnMap<TRecord>,
  orderBy: OrderSpec<TRecord>[] = []
): SQL[] {
  return orderBy.map(({ field, direction }) =>
    direction === 'asc' ? asc(columns[field]) : desc(columns[field])
  );
}

/**
 * CRUD over one table. Subclasses supply the three table-specific queries;
 * filtering, ordering and error translation live here.
 */
export abstract class PgRepository<TRecord extends { id: string }, TInsert>
  implements Repository<TRecord, TInsert>
{
  protected constructor(
    protected readonly db: Executor,
    protected readonly columns: ColumnMap<TRecord>,
    private readonly recordName: string
  ) {}

  protected abstract select(
    where: SQL | undefined,
    orderBy: SQL[],
    limit: number,
    offset: number
  ): Promise<TRecord[]>;

  protected abstract insert(values: TInsert[]): Promise<TRecord[]>;

  protected abstract updateById(id: string, fields: Partial<TInsert>): Promise<TRecord[]>;

  async get(id: string): Promise<TRecord | null> {
    const [row] = await this.select(eq(this.columns.id, id), [], 1, 0);
    return row ?? null;
  }

  async getByAttributes(filters: FilterSpec<TRecord>[]): Promise<TRecord | null> {
    const [row] = await this.select(buildWhere(this.columns, filters), [], 1, 0);
    return row ?? null;
  }

  async getMultiByAttributes(
    filters: FilterSpec<TRecord>[],
    options: QueryOptions<TRecord> = {}
  ): Promise<TRecord[]> {
    return this.select(
      buildWhere(this.columns, filters),
      buildOrderBy(this.columns, options.orderBy),
      options.limit ?? DEFAULT_QUERY_LIMIT,
      options.offset ?? 0
    );
  }

  async create(fields: TInsert): Promise<TRecord> {
    const [row] = await this.guard(() => this.insert([fields]));
    if (!row) {
      throw new Error(`Insert into ${this.recordName} returned no row`);
    }
    return row;
  }

  async batchCreate(fields: TInsert[]): Promise<TRecord[]> {
    if (fields.length === 0) return [];
    return this.guard(() => this.insert(fields));
  }

  async update(record: TRecord, fields: Partial<TInsert>): Promise<TRecord> {
    const [row] = await this.guard(() => this.updateById(record.id, fields));
    if (!row) {
      throw new Error(`Update of ${this.recordName} ${record.id} matched no row`);
    }
    return row;
  }

  private async guard<T>(write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Duplicate ${this.recordName}: ${describe(error)}`);
      }
      throw error;
    }
  }
}

function describe(error: unknown): string {
  if (error instanceof Error && 'detail' in error && typeof error.detail === 'string') {
    return error.detail;
  }
  return error instanceof Error ? error.message : String(error);
}
