import { readFile, readdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { MigrationError, errorMessage } from '../errors/index.js';
import { createMigration } from './builder.js';
import { parseMigrationTimestamp } from './names.js';
import type { Migration } from './types.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Builds a migration from the contents of a SQL file.
 */
export async function createMigrationFromFile(name: string, path: string): Promise<Migration> {
  let sql: string;
  try {
    sql = await readFile(path, 'utf-8');
  } catch (error) {
    throw new MigrationError(`Failed to read migration file ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return createMigration(name, sql);
}

/**
 * Loads every `*.sql` file in `dir`, sorted by filename. The name is the
 * filename without `.sql`; a `YYYYMMDD_HHMMSS_` prefix becomes `createdAt`.
 * A missing directory yields no migrations.
 */
export async function loadMigrationsFromDirectory(dir: string): Promise<Migration[]> {
  let files: string[];
  try {
    files = await readdir(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw new MigrationError(`Failed to read migrations directory ${dir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const now = new Date();
  const migrations: Migration[] = [];
  for (const file of files.filter((f) => f.endsWith('.sql')).sort()) {
    const name = basename(file, extname(file));
    const migration = await createMigrationFromFile(name, join(dir, file));
    migrations.push({ ...migration, createdAt: parseMigrationTimestamp(name) ?? now });
  }
  return migrations;
}
