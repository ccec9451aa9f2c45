import { ConfigurationError } from '../errors/index.js';
import { createSQLiteDriver, isMemoryTarget } from './sqlite.js';
import type { DialectName, Driver, DriverConfig } from './types.js';

export type { DialectName, Driver, DriverConfig } from './types.js';
export { Row, BufferedRows, collectRows } from './row.js';
export type { Rows } from './row.js';
export { createSQLiteDriver, isMemoryTarget, resolveSqlitePath, MEMORY_PATH } from './sqlite.js';

export type CreateDriverOptions = DriverConfig;

const UNSUPPORTED_SCHEMES = [
  'postgres://',
  'postgresql://',
  'mysql://',
  'mariadb://',
  'mongodb://',
  'mongodb+srv://',
];

export function detectDialect(connectionString: string): DialectName {
  const scheme = UNSUPPORTED_SCHEMES.find((s) => connectionString.startsWith(s));
  if (scheme) {
    throw new ConfigurationError(
      `Connection scheme ${scheme} is not supported; only SQLite databases can be opened`
    );
  }

  if (
    isMemoryTarget(connectionString) ||
    connectionString.startsWith('sqlite://') ||
    connectionString.startsWith('file://') ||
    connectionString.endsWith('.db') ||
    connectionString.endsWith('.sqlite') ||
    connectionString.endsWith('.sqlite3')
  ) {
    return 'sqlite';
  }

  throw new ConfigurationError(
    `Unable to detect database dialect from connection string: ${connectionString}`
  );
}

/**
 * Opens a driver for the given connection string. `:memory:` and `memory://`
 * open a private in-memory database; other SQLite targets are files.
 */
export async function createDriver(options: CreateDriverOptions): Promise<Driver> {
  detectDialect(options.connectionString);
  return createSQLiteDriver(options);
}
