import type { ColumnEntry } from '../compiler/index.js';
import type { Row } from '../driver/row.js';
import { ConfigurationError, DecodeError } from '../errors/index.js';
import type { Value } from '../value/index.js';
import { decodeField, encodeField, mapType } from './codec.js';
import { type EntityConstructor, metadataStorage, toSnakeCase } from './metadata.js';
import type { ColumnMetadata, ColumnType, Model } from './types.js';

export interface ColumnDefinition {
  type: ColumnType;
  /** Defaults to the property name in snake_case. */
  name?: string;
  sqlType?: string;
  primaryKey?: boolean;
  autoIncrement?: boolean;
  nullable?: boolean;
  unique?: boolean;
  default?: string;
}

export interface ModelDefinition<T extends object> {
  table: string;
  /** Returns a blank instance for `decode` to fill. */
  create: () => T;
  /** Keyed by property name; key order is column order. */
  columns: Partial<Record<keyof T & string, ColumnDefinition>>;
}

/**
 * Model backed by a column list and a factory. Both registration paths,
 * decorators and `defineModel`, end up here.
 */
export class EntityModel<T extends object> implements Model<T> {
  readonly tableName: string;
  readonly columns: readonly ColumnMetadata[];
  readonly primaryKey: ColumnMetadata | undefined;
  private readonly factory: () => T;

  constructor(tableName: string, columns: readonly ColumnMetadata[], factory: () => T) {
    validateModel(tableName, columns);
    this.tableName = tableName;
    this.columns = columns;
    this.primaryKey = columns.find((column) => column.primaryKey);
    this.factory = factory;
  }

  primaryKeyValue(entity: T): Value | null {
    if (!this.primaryKey) return null;
    const value = encodeField(this.primaryKey, Reflect.get(entity, this.primaryKey.propertyName));
    return value.type === 'null' ? null : value;
  }

  encode(entity: T): ColumnEntry[] {
    return this.columns.map((column): ColumnEntry => [
      column.name,
      encodeField(column, Reflect.get(entity, column.propertyName)),
    ]);
  }

  decode(row: Row): T {
    if (row.length !== this.columns.length) {
      throw new DecodeError(
        `Row has ${row.length} columns but model "${this.tableName}" declares ${this.columns.length}`
      );
    }

    const entity = this.factory();
    this.columns.forEach((column, index) => {
      Reflect.set(entity, column.propertyName, decodeField(column, row.get(index)));
    });
    return entity;
  }

  migrationSql(): string {
    const definitions = this.columns.map(compileColumn);
    return `CREATE TABLE IF NOT EXISTS ${this.tableName} (${definitions.join(', ')})`;
  }
}

function compileColumn(column: ColumnMetadata): string {
  let sql = `${column.name} ${column.sqlType}`;
  if (column.primaryKey && !/\bPRIMARY\s+KEY\b/i.test(column.sqlType)) {
    sql += ' PRIMARY KEY';
  }
  if (column.autoIncrement && !/\bAUTOINCREMENT\b/i.test(column.sqlType)) {
    sql += ' AUTOINCREMENT';
  }
  if (!column.nullable && !column.primaryKey) {
    sql += ' NOT NULL';
  }
  if (column.unique && !column.primaryKey) {
    sql += ' UNIQUE';
  }
  if (column.default !== undefined) {
    sql += ` DEFAULT ${column.default}`;
  }
  return sql;
}

function validateModel(tableName: string, columns: readonly ColumnMetadata[]): void {
  if (tableName.trim() === '') {
    throw new ConfigurationError('Model table name must not be empty');
  }
  if (columns.length === 0) {
    throw new ConfigurationError(`Model "${tableName}" declares no columns`);
  }

  const primaryKeys = columns.filter((column) => column.primaryKey);
  if (primaryKeys.length > 1) {
    throw new ConfigurationError(
      `Model "${tableName}" declares ${primaryKeys.length} primary keys (${primaryKeys
        .map((c) => c.name)
        .join(', ')}); at most one is supported`
    );
  }

  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new ConfigurationError(`Model "${tableName}" declares column "${column.name}" twice`);
    }
    seen.add(column.name);

    if (column.autoIncrement && !column.primaryKey) {
      throw new ConfigurationError(
        `Column "${tableName}.${column.name}" is auto-increment but not the primary key`
      );
    }
    if (column.autoIncrement && column.type !== 'integer' && column.type !== 'bigint') {
      throw new ConfigurationError(
        `Column "${tableName}.${column.name}" is auto-increment but has type ${column.type}`
      );
    }
  }
}

function toColumnMetadata(propertyName: string, definition: ColumnDefinition): ColumnMetadata {
  const primaryKey = definition.primaryKey ?? false;
  const column: ColumnMetadata = {
    propertyName,
    name: definition.name ?? toSnakeCase(propertyName),
    type: definition.type,
    sqlType: definition.sqlType ?? mapType(definition.type),
    primaryKey,
    nullable: primaryKey ? false : (definition.nullable ?? false),
    unique: definition.unique ?? false,
    autoIncrement: definition.autoIncrement ?? false,
  };
  if (definition.default !== undefined) column.default = definition.default;
  return column;
}

/**
 * Registers a model without decorators.
 *
 * @example
 * const Users = defineModel({
 *   table: 'users',
 *   create: (): User => ({ id: null, name: '' }),
 *   columns: {
 *     id: { type: 'integer', primaryKey: true, autoIncrement: true },
 *     name: { type: 'string' },
 *   },
 * });
 */
export function defineModel<T extends object>(definition: ModelDefinition<T>): Model<T> {
  const entries: [string, ColumnDefinition | undefined][] = Object.entries(definition.columns);
  const columns: ColumnMetadata[] = [];
  for (const [propertyName, column] of entries) {
    if (column) columns.push(toColumnMetadata(propertyName, column));
  }
  return new EntityModel(definition.table, columns, definition.create);
}

/**
 * Derives the model of a class decorated with `@Entity` and `@Column`.
 */
export function modelFor<T extends object>(entity: EntityConstructor<T>): Model<T> {
  const metadata = metadataStorage.getEntityMetadata(entity);
  if (!metadata) {
    throw new ConfigurationError(
      `${entity.name} is not a registered entity; decorate it with @Entity and @Column`
    );
  }

  const columns = [...metadata.columns.values()].map((column) => ({
    ...column,
    sqlType: column.sqlType || mapType(column.type),
  }));
  return new EntityModel(metadata.tableName, columns, () => new entity());
}
