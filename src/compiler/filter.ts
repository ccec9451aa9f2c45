import { ValidationError } from '../errors/index.js';
import { Value, type ValueInput } from '../value/index.js';

export type ComparisonOperator = '=' | '!=' | '>' | '>=' | '<' | '<=' | 'LIKE';

export type NullOperator = 'IS NULL' | 'IS NOT NULL';

export type Operator = ComparisonOperator | 'IN' | NullOperator;

export interface ComparisonFilter {
  readonly column: string;
  readonly op: ComparisonOperator;
  readonly value: Value;
}

export interface InFilter {
  readonly column: string;
  readonly op: 'IN';
  readonly values: readonly Value[];
}

export interface NullFilter {
  readonly column: string;
  readonly op: NullOperator;
}

/**
 * One column compared against its operands. The operand arity follows the
 * operator: IN takes a list, the null checks take none, the rest take one.
 */
export type Filter = ComparisonFilter | InFilter | NullFilter;

export type FilterOperator =
  | { readonly kind: 'single'; readonly filter: Filter }
  | { readonly kind: 'and'; readonly operands: readonly FilterOperator[] }
  | { readonly kind: 'or'; readonly operands: readonly FilterOperator[] };

function checkColumn(column: string): string {
  if (typeof column !== 'string' || column.trim() === '') {
    throw new ValidationError('Filter column must be a non-empty string');
  }
  return column;
}

function compare(column: string, op: ComparisonOperator, value: ValueInput): ComparisonFilter {
  return { column: checkColumn(column), op, value: Value.from(value) };
}

export function eq(column: string, value: ValueInput): ComparisonFilter {
  return compare(column, '=', value);
}

export function ne(column: string, value: ValueInput): ComparisonFilter {
  return compare(column, '!=', value);
}

export function gt(column: string, value: ValueInput): ComparisonFilter {
  return compare(column, '>', value);
}

export function gte(column: string, value: ValueInput): ComparisonFilter {
  return compare(column, '>=', value);
}

export function lt(column: string, value: ValueInput): ComparisonFilter {
  return compare(column, '<', value);
}

export function lte(column: string, value: ValueInput): ComparisonFilter {
  return compare(column, '<=', value);
}

/** The pattern is used as given; include `%` / `_` wildcards yourself. */
export function like(column: string, pattern: string): ComparisonFilter {
  return compare(column, 'LIKE', pattern);
}

export function inList(column: string, values: readonly ValueInput[]): InFilter {
  return { column: checkColumn(column), op: 'IN', values: values.map((v) => Value.from(v)) };
}

export function isNull(column: string): NullFilter {
  return { column: checkColumn(column), op: 'IS NULL' };
}

export function isNotNull(column: string): NullFilter {
  return { column: checkColumn(column), op: 'IS NOT NULL' };
}

export const Filter = {
  eq,
  ne,
  gt,
  gte,
  lt,
  lte,
  like,
  in: inList,
  inList,
  isNull,
  isNotNull,
};

type Operand = Filter | FilterOperator;

function isFilterOperator(operand: Operand): operand is FilterOperator {
  return 'kind' in operand;
}

function toOperator(operand: Operand): FilterOperator {
  return isFilterOperator(operand) ? operand : single(operand);
}

function isOperandList(operand: Operand | readonly Operand[]): operand is readonly Operand[] {
  return Array.isArray(operand);
}

function flattenOperands(operands: ReadonlyArray<Operand | readonly Operand[]>): FilterOperator[] {
  const result: FilterOperator[] = [];
  for (const operand of operands) {
    if (isOperandList(operand)) {
      result.push(...operand.map(toOperator));
    } else {
      result.push(toOperator(operand));
    }
  }
  return result;
}

export function single(filter: Filter): FilterOperator {
  return { kind: 'single', filter };
}

/**
 * Conjunction of operands. Accepts filters or nested operators, either
 * spread or as one array. `and()` with no operands matches every row.
 */
export function and(...operands: Array<Operand | readonly Operand[]>): FilterOperator {
  return { kind: 'and', operands: flattenOperands(operands) };
}

/** Disjunction of operands. `or()` with no operands matches no row. */
export function or(...operands: Array<Operand | readonly Operand[]>): FilterOperator {
  return { kind: 'or', operands: flattenOperands(operands) };
}

export const FilterOperator = {
  single,
  and,
  or,
};
