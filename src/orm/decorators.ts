import { metadataStorage, toSnakeCase } from './metadata.js';
import type { ColumnMetadata, ColumnType } from './types.js';

export interface ColumnOptions {
  name?: string;
  /** Overrides the SQL type derived from the column type. */
  sqlType?: string;
  nullable?: boolean;
  unique?: boolean;
  default?: string;
}

export interface EntityOptions {
  name?: string;
}

export interface PrimaryKeyOptions {
  autoIncrement?: boolean;
}

export function Entity(tableNameOrOptions?: string | EntityOptions): ClassDecorator {
  return (target: Function) => {
    const tableName =
      typeof tableNameOrOptions === 'string'
        ? tableNameOrOptions
        : tableNameOrOptions?.name || toSnakeCase(target.name);

    metadataStorage.registerEntity(target, tableName);
  };
}

function registerProperty(metadata: Partial<ColumnMetadata>): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    metadataStorage.registerColumn(target.constructor, String(propertyKey), metadata);
  };
}

export function Column(type: ColumnType, options: ColumnOptions = {}): PropertyDecorator {
  const metadata: Partial<ColumnMetadata> = { type };
  if (options.name !== undefined) metadata.name = options.name;
  if (options.sqlType !== undefined) metadata.sqlType = options.sqlType;
  if (options.nullable !== undefined) metadata.nullable = options.nullable;
  if (options.unique !== undefined) metadata.unique = options.unique;
  if (options.default !== undefined) metadata.default = options.default;
  return registerProperty(metadata);
}

export function PrimaryKey(options: PrimaryKeyOptions = {}): PropertyDecorator {
  return registerProperty({
    primaryKey: true,
    nullable: false,
    autoIncrement: options.autoIncrement ?? false,
  });
}

/** Shorthand for `@PrimaryKey({ autoIncrement: true })`. */
export function AutoIncrement(): PropertyDecorator {
  return registerProperty({ primaryKey: true, nullable: false, autoIncrement: true });
}

export function Unique(): PropertyDecorator {
  return registerProperty({ unique: true });
}

export function Nullable(): PropertyDecorator {
  return registerProperty({ nullable: true });
}

export function Default(value: string): PropertyDecorator {
  return registerProperty({ default: value });
}
