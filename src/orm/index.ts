export {
  Entity,
  Column,
  PrimaryKey,
  AutoIncrement,
  Unique,
  Nullable,
  Default,
} from './decorators.js';
export type { ColumnOptions, EntityOptions, PrimaryKeyOptions } from './decorators.js';

export { metadataStorage, toSnakeCase } from './metadata.js';
export type { EntityMetadata, EntityConstructor } from './metadata.js';

export type { ColumnMetadata, ColumnType, Model } from './types.js';
export { encodeField, decodeField, mapType } from './codec.js';
export { EntityModel, defineModel, modelFor } from './model.js';
export type { ColumnDefinition, ModelDefinition } from './model.js';

export { Repository, createRepository } from './repository.js';
export type { RepositoryOptions } from './repository.js';
