import { ValidationError } from '../errors/index.js';

export type SortOrder = 'asc' | 'desc';

export interface Sort {
  readonly column: string;
  readonly order: SortOrder;
}

function of(column: string, order: SortOrder = 'asc'): Sort {
  if (typeof column !== 'string' || column.trim() === '') {
    throw new ValidationError('Sort column must be a non-empty string');
  }
  if (order !== 'asc' && order !== 'desc') {
    throw new ValidationError(`Invalid sort order: ${String(order)}. Must be 'asc' or 'desc'.`);
  }
  return { column, order };
}

export const Sort = {
  of,
  asc: (column: string): Sort => of(column, 'asc'),
  desc: (column: string): Sort => of(column, 'desc'),
};
