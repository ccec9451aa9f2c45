import type { Value } from '../value/index.js';
import type { Rows } from './row.js';

export type DialectName = 'sqlite';

export interface DriverConfig {
  connectionString: string;
  timeout?: number;
}

export interface Driver {
  readonly dialect: DialectName;
  readonly connectionString: string;

  query(sql: string, params?: readonly Value[]): Promise<Rows>;

  execute(sql: string, params?: readonly Value[]): Promise<{ rowCount: number }>;

  close(): Promise<void>;

  readonly isOpen: boolean;
}
