import {
  type CompiledQuery,
  type FilterOperator,
  type Sort,
  type SqlBuilder,
  createSqlBuilder,
} from '../compiler/index.js';
import type { Database } from '../database.js';
import { collectRows } from '../driver/row.js';
import { DecodeError } from '../errors/index.js';
import type { Model } from '../orm/types.js';

/**
 * Fluent SELECT over one table. Configure with the chained calls, then run
 * `execute` or `executeCount` once.
 */
export class QueryBuilder {
  readonly table: string;
  private filter?: FilterOperator;
  private sorts: Sort[] = [];
  private limitValue?: number;
  private offsetValue?: number;
  private compiler: SqlBuilder;

  constructor(table: string, compiler: SqlBuilder = createSqlBuilder()) {
    this.table = table;
    this.compiler = compiler;
  }

  /** Replaces any filter set before. */
  where(filter: FilterOperator): this {
    this.filter = filter;
    return this;
  }

  /** Appends a sort term; terms are emitted in the order they were added. */
  orderBy(sort: Sort): this {
    this.sorts.push(sort);
    return this;
  }

  limit(n: number): this {
    this.limitValue = n;
    return this;
  }

  offset(n: number): this {
    this.offsetValue = n;
    return this;
  }

  toSQL(columns: readonly string[] = []): CompiledQuery {
    return this.compiler.select(this.table, columns, {
      where: this.filter,
      orderBy: this.sorts,
      limit: this.limitValue,
      offset: this.offsetValue,
    });
  }

  /** Sort, limit and offset do not apply to the count. */
  toCountSQL(): CompiledQuery {
    return this.compiler.count(this.table, this.filter);
  }

  async execute<T>(model: Model<T>, db: Database): Promise<T[]> {
    const { sql, params } = this.toSQL(model.columns.map((column) => column.name));
    const rows = await collectRows(await db.query(sql, params));
    return rows.map((row) => model.decode(row));
  }

  async executeCount(db: Database): Promise<number> {
    const { sql, params } = this.toCountSQL();
    const rows = await db.query(sql, params);
    const row = await rows.next();
    if (!row) {
      throw new DecodeError(`COUNT query on ${this.table} returned no rows`);
    }
    return Number(row.getInteger(0));
  }
}

export function createQueryBuilder(table: string): QueryBuilder {
  return new QueryBuilder(table);
}
