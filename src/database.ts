import { type ConfigEnv, type ModelsqlConfig, loadConfig } from './config/index.js';
import { createDriver } from './driver/index.js';
import type { Rows } from './driver/row.js';
import type { Driver } from './driver/types.js';
import { type Logger, createLogger } from './logger.js';
import { Value, type ValueInput } from './value/index.js';

export interface DatabaseOptions {
  logger?: Logger;
}

export interface OpenDatabaseOptions extends DatabaseOptions {
  /** Defaults to `DATABASE_URL`, then `:memory:`. */
  connectionString?: string;
  timeout?: number;
  /** Read for settings not given above. Defaults to `process.env`. */
  env?: ConfigEnv;
}

/**
 * Owns exactly one driver connection for its lifetime. Closing the Database
 * closes the connection; nothing else holds it.
 */
export class Database {
  private driver: Driver;
  private logger: Logger;

  constructor(driver: Driver, options: DatabaseOptions = {}) {
    this.driver = driver;
    this.logger = options.logger ?? createLogger();
  }

  static async open(options: OpenDatabaseOptions = {}): Promise<Database> {
    let config: ModelsqlConfig | undefined;
    const settings = (): ModelsqlConfig => (config ??= loadConfig(options.env));

    const connectionString = options.connectionString ?? settings().databaseUrl;
    const logger = options.logger ?? createLogger({ level: settings().logLevel });

    const driver = await createDriver({ connectionString, timeout: options.timeout });
    logger.debug(`Opened ${driver.dialect} database ${connectionString}`);
    return new Database(driver, { logger });
  }

  get dialect() {
    return this.driver.dialect;
  }

  get isOpen(): boolean {
    return this.driver.isOpen;
  }

  async query(sql: string, params: readonly ValueInput[] = []): Promise<Rows> {
    this.logger.debug(`query: ${compact(sql)} [${params.length} params]`);
    return this.driver.query(sql, params.map(Value.from));
  }

  /**
   * Runs a statement and resolves to the number of rows it changed.
   */
  async execute(sql: string, params: readonly ValueInput[] = []): Promise<number> {
    this.logger.debug(`execute: ${compact(sql)} [${params.length} params]`);
    const { rowCount } = await this.driver.execute(sql, params.map(Value.from));
    return rowCount;
  }

  async close(): Promise<void> {
    if (!this.driver.isOpen) return;
    await this.driver.close();
    this.logger.debug('Database closed');
  }
}

function compact(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim();
}
