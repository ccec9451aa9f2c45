/**
 * A named unit of schema-change SQL. `executedAt` stays null until the
 * migration has been recorded in the tracking table.
 */
export interface Migration {
  readonly id: string;
  readonly name: string;
  readonly sql: string;
  readonly createdAt: Date;
  readonly executedAt: Date | null;
}

