import { z } from 'zod';
import { Sort, type SqlBuilder, createSqlBuilder, eq, single } from '../compiler/index.js';
import type { Database } from '../database.js';
import { collectRows, type Row } from '../driver/row.js';
import { ConfigurationError, MigrationError, errorMessage } from '../errors/index.js';
import { type Logger, createLogger } from '../logger.js';
import { Value } from '../value/index.js';
import { createMigration } from './builder.js';
import { createMigrationFromFile } from './loader.js';
import { generateMigrationName } from './names.js';
import { splitSqlStatements } from './split.js';
import type { Migration } from './types.js';

const TRACKING_COLUMNS = ['id', 'name', 'sql', 'created_at', 'executed_at'] as const;

const timestampSchema = z.string().datetime({ offset: true });

export interface MigrationManagerOptions {
  /** Tracking table name. Defaults to `migrations`. */
  tableName?: string;
  logger?: Logger;
  compiler?: SqlBuilder;
}

/**
 * Applies migrations and records them in a tracking table. Each migration
 * runs between BEGIN and COMMIT on the manager's database; on failure a
 * ROLLBACK is sent and the original error is rethrown.
 */
export class MigrationManager {
  private db: Database;
  private tableName: string;
  private logger: Logger;
  private compiler: SqlBuilder;

  constructor(db: Database, options: MigrationManagerOptions = {}) {
    const tableName = options.tableName ?? 'migrations';
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
      throw new ConfigurationError(`Invalid migrations table name: ${tableName}`);
    }

    this.db = db;
    this.tableName = tableName;
    this.logger = options.logger ?? createLogger();
    this.compiler = options.compiler ?? createSqlBuilder();
  }

  get database(): Database {
    return this.db;
  }

  static createMigration(name: string, sql: string): Migration {
    return createMigration(name, sql);
  }

  static createMigrationFromFile(name: string, path: string): Promise<Migration> {
    return createMigrationFromFile(name, path);
  }

  static generateMigrationName(description: string, now?: Date): string {
    return generateMigrationName(description, now);
  }

  async init(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        sql TEXT NOT NULL,
        created_at TEXT NOT NULL,
        executed_at TEXT
      )
    `);
  }

  /**
   * Every tracking row, oldest first. One malformed timestamp fails the
   * whole read.
   */
  async getMigrations(): Promise<Migration[]> {
    const { sql, params } = this.compiler.select(this.tableName, TRACKING_COLUMNS, {
      orderBy: [Sort.asc('created_at')],
    });
    const rows = await collectRows(await this.db.query(sql, params));
    return rows.map((row) => this.parseRow(row));
  }

  async getPendingMigrations(): Promise<Migration[]> {
    const migrations = await this.getMigrations();
    return migrations.filter((m) => m.executedAt === null);
  }

  async getExecutedMigrations(): Promise<Migration[]> {
    const migrations = await this.getMigrations();
    return migrations.filter((m) => m.executedAt !== null);
  }

  /**
   * Runs the migration SQL and records it, in one transaction. Resolves to
   * the migration with `executedAt` set; the argument is left unchanged.
   */
  async executeMigration(migration: Migration): Promise<Migration> {
    const executedAt = new Date();

    await this.db.execute('BEGIN');
    try {
      for (const statement of splitSqlStatements(migration.sql)) {
        await this.db.execute(statement);
      }
      const { sql, params } = this.compiler.insert(this.tableName, [
        ['id', Value.text(migration.id)],
        ['name', Value.text(migration.name)],
        ['sql', Value.text(migration.sql)],
        ['created_at', Value.text(migration.createdAt.toISOString())],
        ['executed_at', Value.text(executedAt.toISOString())],
      ]);
      await this.db.execute(sql, params);
      await this.db.execute('COMMIT');
    } catch (error) {
      await this.abort(migration);
      throw error;
    }

    this.logger.info(`Executed migration ${migration.name} (${migration.id})`);
    return { ...migration, executedAt };
  }

  /**
   * Forgets that a migration ran. The schema changes it made stay in place.
   */
  async rollbackMigration(id: string): Promise<void> {
    const { sql, params } = this.compiler.delete(this.tableName, single(eq('id', id)));
    const removed = await this.db.execute(sql, params);
    if (removed > 0) {
      this.logger.info(`Rolled back migration ${id}`);
    } else {
      this.logger.warn(`No tracked migration with id ${id}`);
    }
  }

  /**
   * Executes, in order, every migration whose own `executedAt` is null and
   * stops at the first failure. The tracking table is not consulted; filter
   * against `getExecutedMigrations()` first to avoid re-running work.
   */
  async runMigrations(migrations: readonly Migration[]): Promise<Migration[]> {
    const executed: Migration[] = [];
    for (const migration of migrations) {
      if (migration.executedAt !== null) continue;
      executed.push(await this.executeMigration(migration));
    }
    return executed;
  }

  private async abort(migration: Migration): Promise<void> {
    try {
      await this.db.execute('ROLLBACK');
    } catch (rollbackError) {
      this.logger.error(
        `ROLLBACK after failed migration ${migration.name} (${migration.id}) failed: ${errorMessage(rollbackError)}`
      );
    }
  }

  private parseRow(row: Row): Migration {
    const id = row.getText(0);
    const executedAt = row.getOptionalText(4);
    return {
      id,
      name: row.getText(1),
      sql: row.getText(2),
      createdAt: parseTimestamp(row.getText(3), 'created_at', id),
      executedAt: executedAt ? parseTimestamp(executedAt, 'executed_at', id) : null,
    };
  }
}

function parseTimestamp(text: string, column: string, id: string): Date {
  const parsed = timestampSchema.safeParse(text);
  if (!parsed.success) {
    throw new MigrationError(`Invalid ${column} timestamp "${text}" on migration ${id}`);
  }
  return new Date(parsed.data);
}

export function createMigrationManager(
  db: Database,
  options?: MigrationManagerOptions
): MigrationManager {
  return new MigrationManager(db, options);
}
