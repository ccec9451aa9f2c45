import { MigrationBuilder } from './builder.js';
import type { Migration } from './types.js';

export type ColumnDefinitionPair = readonly [name: string, definition: string];

export function createTable(table: string, columns: readonly ColumnDefinitionPair[]): Migration {
  const definitions = columns.map(([name, definition]) => `${name} ${definition}`).join(', ');
  return new MigrationBuilder(`create_table_${table}`)
    .up(`CREATE TABLE ${table} (${definitions})`)
    .build();
}

export function addColumn(table: string, column: string, definition: string): Migration {
  return new MigrationBuilder(`add_column_${table}_${column}`)
    .up(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`)
    .build();
}

/** Needs SQLite 3.35 or later. */
export function dropColumn(table: string, column: string): Migration {
  return new MigrationBuilder(`drop_column_${table}_${column}`)
    .up(`ALTER TABLE ${table} DROP COLUMN ${column}`)
    .build();
}

export function createIndex(index: string, table: string, columns: readonly string[]): Migration {
  return new MigrationBuilder(`create_index_${index}`)
    .up(`CREATE INDEX ${index} ON ${table} (${columns.join(', ')})`)
    .build();
}

export function dropIndex(index: string): Migration {
  return new MigrationBuilder(`drop_index_${index}`).up(`DROP INDEX ${index}`).build();
}

export const templates = {
  createTable,
  addColumn,
  dropColumn,
  createIndex,
  dropIndex,
};
