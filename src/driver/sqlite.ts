import type BetterSqlite3 from 'better-sqlite3';
import { ConnectionError, QueryError, errorMessage } from '../errors/index.js';
import { type Value, fromDriverValue, toDriverParam } from '../value/index.js';
import { BufferedRows, Row, type Rows } from './row.js';
import type { Driver, DriverConfig } from './types.js';

export const MEMORY_PATH = ':memory:';

/** `:memory:` and any `memory://` URL open a private in-memory database. */
export function isMemoryTarget(connectionString: string): boolean {
  return connectionString === MEMORY_PATH || connectionString.startsWith('memory://');
}

export function resolveSqlitePath(connectionString: string): string {
  if (isMemoryTarget(connectionString)) {
    return MEMORY_PATH;
  }
  return connectionString.replace(/^sqlite:\/\//, '').replace(/^file:\/\//, '');
}

export async function createSQLiteDriver(config: DriverConfig): Promise<Driver> {
  const Database = (await import('better-sqlite3')).default;

  const dbPath = resolveSqlitePath(config.connectionString);
  let db: BetterSqlite3.Database;
  try {
    const options: BetterSqlite3.Options = {};
    if (config.timeout !== undefined) {
      options.timeout = config.timeout;
    }
    db = new Database(dbPath, options);
    db.pragma('foreign_keys = ON');
  } catch (error) {
    throw new ConnectionError(`Unable to open SQLite database at ${dbPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let open = true;

  function prepare(sql: string): BetterSqlite3.Statement<unknown[]> {
    if (!open) {
      throw new ConnectionError('SQLite database is closed');
    }
    try {
      return db.prepare<unknown[]>(sql);
    } catch (error) {
      throw new QueryError(errorMessage(error), { sql, cause: error });
    }
  }

  function run(sql: string, params: readonly Value[]): number {
    const stmt = prepare(sql);
    try {
      return stmt.run(...params.map(toDriverParam)).changes;
    } catch (error) {
      throw new QueryError(errorMessage(error), { sql, cause: error });
    }
  }

  return {
    dialect: 'sqlite',
    connectionString: config.connectionString,

    get isOpen() {
      return open;
    },

    async query(queryText: string, params: readonly Value[] = []): Promise<Rows> {
      const stmt = prepare(queryText);

      if (!stmt.reader) {
        run(queryText, params);
        return new BufferedRows([], []);
      }

      let raw: unknown[];
      let columns: string[];
      try {
        stmt.safeIntegers(true).raw(true);
        columns = stmt.columns().map((c) => c.name);
        raw = stmt.all(...params.map(toDriverParam));
      } catch (error) {
        throw new QueryError(errorMessage(error), { sql: queryText, cause: error });
      }

      const rows = raw.map((cells) => {
        if (!Array.isArray(cells)) {
          throw new QueryError('SQLite returned a row that is not an array', { sql: queryText });
        }
        return new Row(
          columns,
          cells.map((cell: unknown) => fromDriverValue(cell))
        );
      });
      return new BufferedRows(columns, rows);
    },

    async execute(queryText: string, params: readonly Value[] = []): Promise<{ rowCount: number }> {
      return { rowCount: run(queryText, params) };
    },

    async close(): Promise<void> {
      if (!open) return;
      open = false;
      db.close();
    },
  };
}
