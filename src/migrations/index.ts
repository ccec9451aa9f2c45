export type { Migration } from './types.js';
export { MigrationManager, createMigrationManager } from './manager.js';
export type { MigrationManagerOptions } from './manager.js';
export { MigrationBuilder, createMigration } from './builder.js';
export { createMigrationFromFile, loadMigrationsFromDirectory } from './loader.js';
export { generateMigrationName, parseMigrationTimestamp } from './names.js';
export { generateMigration } from './generate.js';
export { splitSqlStatements } from './split.js';
export {
  templates,
  createTable,
  addColumn,
  dropColumn,
  createIndex,
  dropIndex,
} from './templates.js';
export type { ColumnDefinitionPair } from './templates.js';
