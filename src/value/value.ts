import { ValidationError } from '../errors/index.js';

export type NullValue = { readonly type: 'null' };
export type IntegerValue = { readonly type: 'integer'; readonly value: bigint };
export type RealValue = { readonly type: 'real'; readonly value: number };
export type TextValue = { readonly type: 'text'; readonly value: string };
export type BlobValue = { readonly type: 'blob'; readonly value: Uint8Array };

/**
 * A database-portable scalar. Every parameter handed to a driver and every
 * cell read back from one is a Value.
 */
export type Value = NullValue | IntegerValue | RealValue | TextValue | BlobValue;

export type ValueType = Value['type'];

/**
 * Plain JavaScript input accepted wherever a Value is expected.
 */
export type ValueInput =
  | Value
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Date;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

const NULL: NullValue = Object.freeze({ type: 'null' });

function nullValue(): NullValue {
  return NULL;
}

function integer(input: number | bigint): IntegerValue {
  let value: bigint;
  if (typeof input === 'bigint') {
    value = input;
  } else {
    if (!Number.isInteger(input)) {
      throw new ValidationError(`Integer value must be integral, got ${input}`);
    }
    value = BigInt(input);
  }
  if (value < I64_MIN || value > I64_MAX) {
    throw new ValidationError(`Integer value ${value} is outside the 64-bit range`);
  }
  return { type: 'integer', value };
}

function real(value: number): RealValue {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Real value must be finite, got ${value}`);
  }
  return { type: 'real', value };
}

function text(value: string): TextValue {
  return { type: 'text', value };
}

function blob(value: Uint8Array): BlobValue {
  return { type: 'blob', value };
}

function from(input: ValueInput): Value {
  if (input === null || input === undefined) return NULL;
  if (isValue(input)) return input;

  if (typeof input === 'boolean') return integer(input ? 1 : 0);
  if (typeof input === 'bigint') return integer(input);
  if (typeof input === 'number') return Number.isInteger(input) ? integer(input) : real(input);
  if (typeof input === 'string') return text(input);

  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new ValidationError('Cannot convert an invalid Date to a value');
    }
    return text(input.toISOString());
  }

  return blob(input);
}

export const Value = {
  null: nullValue,
  integer,
  real,
  text,
  blob,
  from,
};

export function isValue(input: unknown): input is Value {
  if (typeof input !== 'object' || input === null || input instanceof Uint8Array) {
    return false;
  }
  if (!('type' in input)) return false;

  switch (input.type) {
    case 'null':
      return true;
    case 'integer':
      return 'value' in input && typeof input.value === 'bigint';
    case 'real':
      return 'value' in input && typeof input.value === 'number';
    case 'text':
      return 'value' in input && typeof input.value === 'string';
    case 'blob':
      return 'value' in input && input.value instanceof Uint8Array;
    default:
      return false;
  }
}

export function valueEquals(a: Value, b: Value): boolean {
  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'integer':
      return b.type === 'integer' && a.value === b.value;
    case 'real':
      return b.type === 'real' && Object.is(a.value, b.value);
    case 'text':
      return b.type === 'text' && a.value === b.value;
    case 'blob':
      return (
        b.type === 'blob' &&
        a.value.length === b.value.length &&
        a.value.every((byte, i) => byte === b.value[i])
      );
  }
}

export function describeValue(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'NULL';
    case 'integer':
      return `INTEGER(${value.value})`;
    case 'real':
      return `REAL(${value.value})`;
    case 'text':
      return `TEXT(${JSON.stringify(value.value)})`;
    case 'blob':
      return `BLOB(${value.value.length} bytes)`;
  }
}
