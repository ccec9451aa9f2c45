import type { Model } from '../orm/types.js';
import { createMigration } from './builder.js';
import type { Migration } from './types.js';

/** A `create_table_<table>` migration built from the model's CREATE TABLE. */
export function generateMigration<T>(model: Model<T>): Migration {
  return createMigration(`create_table_${model.tableName}`, model.migrationSql());
}
