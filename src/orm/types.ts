import type { ColumnEntry } from '../compiler/index.js';
import type { Row } from '../driver/row.js';
import type { Value } from '../value/index.js';

export type ColumnType =
  | 'integer'
  | 'bigint'
  | 'float'
  | 'boolean'
  | 'string'
  | 'text'
  | 'uuid'
  | 'datetime'
  | 'json'
  | 'binary';

export interface ColumnMetadata {
  propertyName: string;
  name: string;
  type: ColumnType;
  /** Column type as written in CREATE TABLE. */
  sqlType: string;
  primaryKey: boolean;
  nullable: boolean;
  unique: boolean;
  autoIncrement: boolean;
  /** Raw SQL default expression. */
  default?: string;
}

/**
 * What a persisted entity type provides. Column order is fixed: `encode`
 * emits and `decode` reads columns in this order.
 */
export interface Model<T> {
  readonly tableName: string;
  readonly columns: readonly ColumnMetadata[];
  readonly primaryKey: ColumnMetadata | undefined;
  primaryKeyValue(entity: T): Value | null;
  encode(entity: T): ColumnEntry[];
  decode(row: Row): T;
  migrationSql(): string;
}
