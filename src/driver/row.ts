import { DecodeError } from '../errors/index.js';
import { type Value, describeValue } from '../value/index.js';

export class Row {
  readonly columns: readonly string[];
  private readonly values: readonly Value[];

  constructor(columns: readonly string[], values: readonly Value[]) {
    if (columns.length !== values.length) {
      throw new DecodeError(
        `Row has ${values.length} values but ${columns.length} column names`
      );
    }
    this.columns = columns;
    this.values = values;
  }

  get length(): number {
    return this.values.length;
  }

  get(index: number): Value {
    const value = this.values[index];
    if (value === undefined) {
      throw new DecodeError(
        `Column index ${index} is out of range (row has ${this.values.length} columns)`
      );
    }
    return value;
  }

  getByName(name: string): Value {
    const index = this.columns.indexOf(name);
    if (index === -1) {
      throw new DecodeError(`Row has no column named "${name}"`);
    }
    return this.get(index);
  }

  columnName(index: number): string | undefined {
    return this.columns[index];
  }

  getText(index: number): string {
    const value = this.get(index);
    if (value.type !== 'text') {
      throw this.mismatch(index, 'TEXT', value);
    }
    return value.value;
  }

  getOptionalText(index: number): string | null {
    const value = this.get(index);
    if (value.type === 'null') return null;
    if (value.type !== 'text') {
      throw this.mismatch(index, 'TEXT or NULL', value);
    }
    return value.value;
  }

  getInteger(index: number): bigint {
    const value = this.get(index);
    if (value.type !== 'integer') {
      throw this.mismatch(index, 'INTEGER', value);
    }
    return value.value;
  }

  toArray(): Value[] {
    return [...this.values];
  }

  private mismatch(index: number, expected: string, actual: Value): DecodeError {
    const name = this.columns[index] ?? String(index);
    return new DecodeError(`Column "${name}" expected ${expected}, got ${describeValue(actual)}`);
  }
}

/**
 * Forward-only cursor over a statement's result. Not restartable.
 */
export interface Rows {
  readonly columns: readonly string[];
  next(): Promise<Row | null>;
}

export class BufferedRows implements Rows {
  readonly columns: readonly string[];
  private readonly rows: readonly Row[];
  private index = 0;

  constructor(columns: readonly string[], rows: readonly Row[]) {
    this.columns = columns;
    this.rows = rows;
  }

  async next(): Promise<Row | null> {
    const row = this.rows[this.index];
    if (row === undefined) return null;
    this.index++;
    return row;
  }
}

export async function collectRows(rows: Rows): Promise<Row[]> {
  const collected: Row[] = [];
  for (let row = await rows.next(); row !== null; row = await rows.next()) {
    collected.push(row);
  }
  return collected;
}
