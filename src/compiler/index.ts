import { ValidationError } from '../errors/index.js';
import type { Value } from '../value/index.js';
import type { Filter, FilterOperator } from './filter.js';
import type { Sort } from './sort.js';

export * from './filter.js';
export * from './sort.js';

export interface CompiledQuery {
  sql: string;
  params: Value[];
}

export type ColumnEntry = readonly [column: string, value: Value];

export interface SelectOptions {
  where?: FilterOperator;
  orderBy?: readonly Sort[];
  limit?: number;
  offset?: number;
}

interface CompilationState {
  params: Value[];
}

const ALWAYS_TRUE = '1 = 1';
const ALWAYS_FALSE = '1 = 0';

/**
 * Renders filter trees and statements to SQLite text with `?` placeholders.
 * Identifiers are trusted and emitted as given; only values are bound.
 *
 * Parameters are collected depth-first, left to right, which is the order
 * the placeholders appear in the emitted text.
 */
export class SqlBuilder {
  render(op: FilterOperator): CompiledQuery {
    const state: CompilationState = { params: [] };
    const sql = this.compileOperator(op, state);
    return { sql, params: state.params };
  }

  orderBy(sorts: readonly Sort[]): string {
    if (sorts.length === 0) return '';

    const terms = sorts.map((sort) => {
      const direction = sort.order.toUpperCase();
      if (direction !== 'ASC' && direction !== 'DESC') {
        throw new ValidationError(
          `Invalid ORDER BY direction: ${sort.order}. Must be 'asc' or 'desc'.`
        );
      }
      return `${sort.column} ${direction}`;
    });
    return ` ORDER BY ${terms.join(', ')}`;
  }

  limitOffset(limit?: number, offset?: number): string {
    if (limit !== undefined) checkCount('LIMIT', limit);
    if (offset !== undefined) checkCount('OFFSET', offset);

    let sql = '';
    if (limit !== undefined) {
      sql += ` LIMIT ${limit}`;
    } else if (offset !== undefined) {
      // SQLite only accepts OFFSET after a LIMIT; -1 means no limit.
      sql += ' LIMIT -1';
    }
    if (offset !== undefined) {
      sql += ` OFFSET ${offset}`;
    }
    return sql;
  }

  select(table: string, columns: readonly string[], options: SelectOptions = {}): CompiledQuery {
    const state: CompilationState = { params: [] };
    const list = columns.length > 0 ? columns.join(', ') : '*';

    let sql = `SELECT ${list} FROM ${table}`;
    sql += this.compileWhere(options.where, state);
    sql += this.orderBy(options.orderBy ?? []);
    sql += this.limitOffset(options.limit, options.offset);

    return { sql, params: state.params };
  }

  count(table: string, where?: FilterOperator): CompiledQuery {
    const state: CompilationState = { params: [] };
    const sql = `SELECT COUNT(*) FROM ${table}${this.compileWhere(where, state)}`;
    return { sql, params: state.params };
  }

  insert(table: string, entries: readonly ColumnEntry[]): CompiledQuery {
    if (entries.length === 0) {
      return { sql: `INSERT INTO ${table} DEFAULT VALUES`, params: [] };
    }

    const columns = entries.map(([column]) => column);
    const placeholders = entries.map(() => '?');
    return {
      sql: `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders.join(', ')})`,
      params: entries.map(([, value]) => value),
    };
  }

  update(table: string, set: readonly ColumnEntry[], where: FilterOperator): CompiledQuery {
    if (set.length === 0) {
      throw new ValidationError(`Cannot update ${table} without any columns to set`);
    }

    const state: CompilationState = { params: [] };
    const assignments = set.map(([column, value]) => {
      state.params.push(value);
      return `${column} = ?`;
    });

    let sql = `UPDATE ${table} SET ${assignments.join(', ')}`;
    sql += this.compileWhere(where, state);
    return { sql, params: state.params };
  }

  delete(table: string, where?: FilterOperator): CompiledQuery {
    const state: CompilationState = { params: [] };
    const sql = `DELETE FROM ${table}${this.compileWhere(where, state)}`;
    return { sql, params: state.params };
  }

  private compileWhere(where: FilterOperator | undefined, state: CompilationState): string {
    if (!where) return '';
    return ` WHERE ${this.compileOperator(where, state)}`;
  }

  private compileOperator(op: FilterOperator, state: CompilationState): string {
    switch (op.kind) {
      case 'single':
        return this.compileFilter(op.filter, state);
      case 'and':
        return this.compileGroup(op.operands, 'AND', ALWAYS_TRUE, state);
      case 'or':
        return this.compileGroup(op.operands, 'OR', ALWAYS_FALSE, state);
    }
  }

  private compileGroup(
    operands: readonly FilterOperator[],
    connector: 'AND' | 'OR',
    whenEmpty: string,
    state: CompilationState
  ): string {
    if (operands.length === 0) return whenEmpty;
    return operands
      .map((operand) => `(${this.compileOperator(operand, state)})`)
      .join(` ${connector} `);
  }

  private compileFilter(filter: Filter, state: CompilationState): string {
    switch (filter.op) {
      case 'IS NULL':
      case 'IS NOT NULL':
        return `${filter.column} ${filter.op}`;
      case 'IN': {
        if (filter.values.length === 0) return ALWAYS_FALSE;
        state.params.push(...filter.values);
        return `${filter.column} IN (${filter.values.map(() => '?').join(', ')})`;
      }
      default:
        state.params.push(filter.value);
        return `${filter.column} ${filter.op} ?`;
    }
  }
}

function checkCount(clause: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${clause} must be a non-negative integer, got ${value}`);
  }
}

export function createSqlBuilder(): SqlBuilder {
  return new SqlBuilder();
}
