import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { type ModelsqlConfig, loadConfig } from '../config/index.js';
import { Database } from '../database.js';
import { errorMessage } from '../errors/index.js';
import { createLogger } from '../logger.js';
import { MigrationManager } from '../migrations/manager.js';
import { loadMigrationsFromDirectory } from '../migrations/loader.js';
import { generateMigrationName } from '../migrations/names.js';
import type { Migration } from '../migrations/types.js';

export type CliConfig = ModelsqlConfig;

export interface MigrationStatusReport {
  executed: Migration[];
  pending: Migration[];
}

async function withManager<T>(
  config: CliConfig,
  fn: (manager: MigrationManager) => Promise<T>
): Promise<T> {
  const logger = createLogger({ level: config.logLevel });
  const db = await Database.open({ connectionString: config.databaseUrl, logger });
  try {
    const manager = new MigrationManager(db, { tableName: config.migrationsTable, logger });
    await manager.init();
    return await fn(manager);
  } finally {
    await db.close();
  }
}

/**
 * Files in the migrations directory whose name has no tracking row yet.
 */
async function findPending(config: CliConfig, manager: MigrationManager): Promise<Migration[]> {
  const files = await loadMigrationsFromDirectory(config.migrationsPath);
  const executed = await manager.getExecutedMigrations();
  const executedNames = new Set(executed.map((m) => m.name));
  return files.filter((m) => !executedNames.has(m.name));
}

export async function migrateUp(config: CliConfig): Promise<Migration[]> {
  return withManager(config, async (manager) => {
    const pending = await findPending(config, manager);
    const executed = await manager.runMigrations(pending);

    for (const m of executed) {
      console.log(`✓ ${m.name}`);
    }
    if (executed.length === 0) {
      console.log('No migrations to run');
    }
    return executed;
  });
}

export async function migrationStatus(config: CliConfig): Promise<MigrationStatusReport> {
  return withManager(config, async (manager) => {
    const executed = await manager.getExecutedMigrations();
    const pending = await findPending(config, manager);

    console.log(`Executed (${executed.length}):`);
    for (const m of executed) {
      console.log(`  ✓ ${m.name} ${m.id} (${m.executedAt?.toISOString() ?? ''})`);
    }
    console.log(`Pending (${pending.length}):`);
    for (const m of pending) {
      console.log(`  ○ ${m.name}`);
    }
    return { executed, pending };
  });
}

export async function rollbackMigration(config: CliConfig, id: string): Promise<void> {
  await withManager(config, async (manager) => {
    await manager.rollbackMigration(id);
    console.log(`Forgot migration ${id}; its schema changes were not reverted`);
  });
}

/**
 * Writes an empty `<timestamp>_<description>.sql` file and resolves to its path.
 */
export async function createMigrationFile(
  config: CliConfig,
  description: string,
  now: Date = new Date()
): Promise<string> {
  const name = generateMigrationName(description, now);
  await mkdir(config.migrationsPath, { recursive: true });

  const filePath = join(config.migrationsPath, `${name}.sql`);
  await writeFile(filePath, `-- ${name}\n-- Created: ${now.toISOString()}\n\n`, 'utf-8');
  console.log(`Created migration: ${filePath}`);
  return filePath;
}

export function printHelp(): void {
  console.log(`
modelsql - migrations CLI

Usage: modelsql <command> [options]

Commands:
  migrate:up        Run migrations from the migrations directory that have not run yet
  migrate:status    Show executed and pending migrations
  migrate:rollback  Forget an executed migration (--id <id>); the schema is left as is
  migrate:create    Create an empty migration file (--name <description>)

Global Options:
  --db-url          Database connection string (or set DATABASE_URL)
  --dir             Migrations directory (or set MODELSQL_MIGRATIONS_DIR, default ./migrations)
  --help            Show this help message

Examples:
  modelsql migrate:create --name "add users table"
  modelsql migrate:up --db-url sqlite://./app.db
  modelsql migrate:rollback --id 0b6f3c1e-2d7a-4f57-9a61-7c9d2b1e4a10
`);
}

type CommandHandler = (config: CliConfig, args: ParsedArgs) => Promise<void>;

interface ParsedArgs {
  'db-url'?: string;
  dir?: string;
  id?: string;
  name?: string;
  help?: boolean;
}

const commandHandlers: Record<string, CommandHandler> = {
  'migrate:up': async (config) => {
    await migrateUp(config);
  },
  'migrate:status': async (config) => {
    await migrationStatus(config);
  },
  'migrate:rollback': async (config, args) => {
    if (!args.id) throw new Error('Migration id required. Use --id <id>');
    await rollbackMigration(config, args.id);
  },
  'migrate:create': async (config, args) => {
    if (!args.name) throw new Error('Migration name required. Use --name <description>');
    await createMigrationFile(config, args.name);
  },
};

function parseCliArgs(args: string[]): ParsedArgs {
  const { values } = parseArgs({
    args,
    options: {
      'db-url': { type: 'string' },
      dir: { type: 'string' },
      id: { type: 'string' },
      name: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
  return values;
}

/**
 * Runs one CLI invocation and resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  const handler = commandHandlers[command];
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  try {
    const args = parseCliArgs(rest);
    if (args.help) {
      printHelp();
      return 0;
    }

    const base = loadConfig(env);
    const config: CliConfig = {
      ...base,
      databaseUrl: args['db-url'] ?? base.databaseUrl,
      migrationsPath: args.dir ?? base.migrationsPath,
    };
    await handler(config, args);
    return 0;
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }
}
