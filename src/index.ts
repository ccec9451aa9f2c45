export * from './value/index.js';
export * from './errors/index.js';

export { createLogger, silentLogger, defaultLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';

export { loadConfig } from './config/index.js';
export type { ModelsqlConfig, ConfigEnv } from './config/index.js';

export {
  createDriver,
  detectDialect,
  createSQLiteDriver,
  resolveSqlitePath,
  isMemoryTarget,
  Row,
  BufferedRows,
  collectRows,
} from './driver/index.js';
export type { Driver, DriverConfig, DialectName, CreateDriverOptions, Rows } from './driver/index.js';

export { Database } from './database.js';
export type { DatabaseOptions, OpenDatabaseOptions } from './database.js';

export * from './compiler/index.js';

export { QueryBuilder, createQueryBuilder } from './query-builder/index.js';

export { Pagination, SearchFilter } from './pagination/index.js';
export type { PaginatedResult } from './pagination/index.js';

export * from './orm/index.js';

export * from './migrations/index.js';
