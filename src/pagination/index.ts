import { type FilterOperator, like, or } from '../compiler/index.js';
import { ValidationError } from '../errors/index.js';

function checkPositive(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be an integer >= 1, got ${value}`);
  }
  return value;
}

/**
 * A 1-indexed page window. `total` and `totalPages` are known only after a
 * count query, via `withTotal`.
 */
export class Pagination {
  readonly page: number;
  readonly perPage: number;
  readonly total?: number;
  readonly totalPages?: number;

  constructor(page: number, perPage: number, total?: number) {
    this.page = checkPositive('page', page);
    this.perPage = checkPositive('perPage', perPage);
    if (total !== undefined) {
      if (!Number.isInteger(total) || total < 0) {
        throw new ValidationError(`total must be a non-negative integer, got ${total}`);
      }
      this.total = total;
      this.totalPages = Math.ceil(total / perPage);
    }
  }

  static of(page: number, perPage: number): Pagination {
    return new Pagination(page, perPage);
  }

  get offset(): number {
    return (this.page - 1) * this.perPage;
  }

  get limit(): number {
    return this.perPage;
  }

  withTotal(total: number): Pagination {
    return new Pagination(this.page, this.perPage, total);
  }

  get hasNextPage(): boolean {
    return this.totalPages !== undefined && this.page < this.totalPages;
  }

  get hasPreviousPage(): boolean {
    return this.page > 1;
  }
}

export interface PaginatedResult<T> {
  data: T[];
  pagination: Pagination;
}

/**
 * Matches rows where any of `columns` contains `term`. Case sensitivity is
 * whatever the column collation gives.
 */
export class SearchFilter {
  readonly term: string;
  readonly columns: readonly string[];

  constructor(term: string, columns: readonly string[]) {
    this.term = term;
    this.columns = columns;
  }

  toFilter(): FilterOperator {
    return or(this.columns.map((column) => like(column, `%${this.term}%`)));
  }
}
