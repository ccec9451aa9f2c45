import { randomUUID } from 'node:crypto';
import type { Migration } from './types.js';

export function createMigration(name: string, sql: string, now: Date = new Date()): Migration {
  return {
    id: randomUUID(),
    name,
    sql,
    createdAt: now,
    executedAt: null,
  };
}

/**
 * Forward-only: there is no `down`, since a rollback only forgets the
 * tracking row.
 *
 * @example
 * const migration = new MigrationBuilder('add_users_email_index')
 *   .up('CREATE UNIQUE INDEX idx_users_email ON users (email)')
 *   .build();
 */
export class MigrationBuilder {
  private readonly name: string;
  private upSql = '';

  constructor(name: string) {
    this.name = name;
  }

  /** Replaces the SQL set by an earlier call. */
  up(sql: string): this {
    this.upSql = sql;
    return this;
  }

  build(): Migration {
    return createMigration(this.name, this.upSql);
  }
}
