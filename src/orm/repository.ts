import {
  type FilterOperator,
  type SqlBuilder,
  createSqlBuilder,
  eq,
  inList,
  single,
} from '../compiler/index.js';
import type { Database } from '../database.js';
import { ConfigurationError, NotFoundError, ValidationError } from '../errors/index.js';
import { type PaginatedResult, Pagination, type SearchFilter } from '../pagination/index.js';
import { QueryBuilder } from '../query-builder/index.js';
import { Value, type ValueInput, describeValue } from '../value/index.js';
import type { ColumnMetadata, Model } from './types.js';

export interface RepositoryOptions {
  compiler?: SqlBuilder;
}

/**
 * CRUD for one model over one database. Holds no state of its own beyond the
 * two references; every call issues its statements directly.
 */
export class Repository<T> {
  readonly model: Model<T>;
  private db: Database;
  private compiler: SqlBuilder;

  constructor(model: Model<T>, db: Database, options: RepositoryOptions = {}) {
    this.model = model;
    this.db = db;
    this.compiler = options.compiler ?? createSqlBuilder();
  }

  /**
   * Inserts the entity. An auto-increment key that is unset is left out so
   * the database assigns it; the generated key is not written back to
   * `entity`. Resolves to the number of rows inserted.
   */
  async create(entity: T): Promise<number> {
    const pk = this.model.primaryKey;
    const entries = this.model
      .encode(entity)
      .filter(
        ([column, value]) =>
          !(pk?.autoIncrement && column === pk.name && value.type === 'null')
      );

    const { sql, params } = this.compiler.insert(this.model.tableName, entries);
    return this.db.execute(sql, params);
  }

  async findById(id: ValueInput): Promise<T | null> {
    const pk = this.requirePrimaryKey('findById');
    const rows = await this.query()
      .where(single(eq(pk.name, id)))
      .limit(1)
      .execute(this.model, this.db);
    return rows[0] ?? null;
  }

  async findByIdOrFail(id: ValueInput): Promise<T> {
    const found = await this.findById(id);
    if (found === null) {
      const pk = this.requirePrimaryKey('findByIdOrFail');
      throw new NotFoundError(
        `No ${this.model.tableName} row with ${pk.name} = ${describeValue(Value.from(id))}`
      );
    }
    return found;
  }

  async findAll(): Promise<T[]> {
    return this.query().execute(this.model, this.db);
  }

  async findWhere(filter: FilterOperator): Promise<T[]> {
    return this.query().where(filter).execute(this.model, this.db);
  }

  async findPaginated(pagination: Pagination): Promise<PaginatedResult<T>> {
    return this.paginate(undefined, pagination);
  }

  async findWherePaginated(
    filter: FilterOperator,
    pagination: Pagination
  ): Promise<PaginatedResult<T>> {
    return this.paginate(filter, pagination);
  }

  /**
   * Updates every non-key column by primary key. A key that matches no row
   * is not an error; the promise resolves to 0.
   */
  async update(entity: T): Promise<number> {
    const pk = this.requirePrimaryKey('update');
    const id = this.requirePrimaryKeyValue(entity, pk);
    const set = this.model.encode(entity).filter(([column]) => column !== pk.name);

    const { sql, params } = this.compiler.update(this.model.tableName, set, single(eq(pk.name, id)));
    return this.db.execute(sql, params);
  }

  /**
   * Deletes the entity's row by primary key. Resolves to true once the
   * statement runs, whether or not a row matched.
   */
  async delete(entity: T): Promise<boolean> {
    const pk = this.requirePrimaryKey('delete');
    await this.deleteByKey(pk, this.requirePrimaryKeyValue(entity, pk));
    return true;
  }

  /** Same contract as `delete`, by key value. */
  async deleteById(id: ValueInput): Promise<boolean> {
    const pk = this.requirePrimaryKey('deleteById');
    await this.deleteByKey(pk, Value.from(id));
    return true;
  }

  /** Resolves to the number of rows actually removed. */
  async bulkDelete(ids: readonly ValueInput[]): Promise<number> {
    const pk = this.requirePrimaryKey('bulkDelete');
    if (ids.length === 0) return 0;
    return this.deleteWhere(single(inList(pk.name, ids)));
  }

  async deleteWhere(filter: FilterOperator): Promise<number> {
    const { sql, params } = this.compiler.delete(this.model.tableName, filter);
    return this.db.execute(sql, params);
  }

  async count(): Promise<number> {
    return this.query().executeCount(this.db);
  }

  async countWhere(filter: FilterOperator): Promise<number> {
    return this.query().where(filter).executeCount(this.db);
  }

  /**
   * `update` when the entity carries a key, `create` otherwise. There is no
   * existence check, so a key that matches no row changes nothing.
   */
  async createOrUpdate(entity: T): Promise<number> {
    if (this.model.primaryKey && this.model.primaryKeyValue(entity) !== null) {
      return this.update(entity);
    }
    return this.create(entity);
  }

  /**
   * Without `pagination` every match is returned as a single page.
   */
  async search(filter: SearchFilter, pagination?: Pagination): Promise<PaginatedResult<T>> {
    const where = filter.toFilter();
    if (pagination) {
      return this.paginate(where, pagination);
    }

    const data = await this.findWhere(where);
    return { data, pagination: new Pagination(1, Math.max(data.length, 1), data.length) };
  }

  private query(): QueryBuilder {
    return new QueryBuilder(this.model.tableName, this.compiler);
  }

  private async paginate(
    filter: FilterOperator | undefined,
    pagination: Pagination
  ): Promise<PaginatedResult<T>> {
    const counter = this.query();
    const select = this.query().limit(pagination.limit).offset(pagination.offset);
    if (filter) {
      counter.where(filter);
      select.where(filter);
    }

    const total = await counter.executeCount(this.db);
    const data = await select.execute(this.model, this.db);
    return { data, pagination: pagination.withTotal(total) };
  }

  private async deleteByKey(pk: ColumnMetadata, id: Value): Promise<void> {
    const { sql, params } = this.compiler.delete(this.model.tableName, single(eq(pk.name, id)));
    await this.db.execute(sql, params);
  }

  private requirePrimaryKey(operation: string): ColumnMetadata {
    const pk = this.model.primaryKey;
    if (!pk) {
      throw new ConfigurationError(
        `${operation} needs a primary key, but model "${this.model.tableName}" has none`
      );
    }
    return pk;
  }

  private requirePrimaryKeyValue(entity: T, pk: ColumnMetadata): Value {
    const id = this.model.primaryKeyValue(entity);
    if (id === null) {
      throw new ValidationError(
        `Cannot address a ${this.model.tableName} row without a value for ${pk.name}`
      );
    }
    return id;
  }
}

export function createRepository<T>(
  model: Model<T>,
  db: Database,
  options?: RepositoryOptions
): Repository<T> {
  return new Repository(model, db, options);
}
