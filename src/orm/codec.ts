import { DecodeError, ValidationError } from '../errors/index.js';
import { Value, describeValue } from '../value/index.js';
import type { ColumnMetadata, ColumnType } from './types.js';

const SQLITE_TYPES: Record<ColumnType, string> = {
  integer: 'INTEGER',
  bigint: 'INTEGER',
  float: 'REAL',
  boolean: 'INTEGER',
  string: 'TEXT',
  text: 'TEXT',
  uuid: 'TEXT',
  datetime: 'TEXT',
  json: 'TEXT',
  binary: 'BLOB',
};

export function mapType(type: ColumnType): string {
  return SQLITE_TYPES[type];
}

function invalidField(column: ColumnMetadata, raw: unknown): ValidationError {
  const shown = raw instanceof Uint8Array ? 'Uint8Array' : typeof raw;
  return new ValidationError(
    `Property "${column.propertyName}" (${column.type}) cannot hold a ${shown} value`
  );
}

/**
 * Converts an entity property into the Value bound for its column.
 */
export function encodeField(column: ColumnMetadata, raw: unknown): Value {
  if (raw === null || raw === undefined) return Value.null();

  switch (column.type) {
    case 'integer':
    case 'bigint':
      if (typeof raw === 'number' || typeof raw === 'bigint') return Value.integer(raw);
      break;
    case 'float':
      if (typeof raw === 'number') return Value.real(raw);
      break;
    case 'boolean':
      if (typeof raw === 'boolean') return Value.from(raw);
      break;
    case 'string':
    case 'text':
    case 'uuid':
      if (typeof raw === 'string') return Value.text(raw);
      break;
    case 'datetime':
      if (raw instanceof Date || typeof raw === 'string') return Value.from(raw);
      break;
    case 'json':
      return Value.text(JSON.stringify(raw));
    case 'binary':
      if (raw instanceof Uint8Array) return Value.blob(raw);
      break;
  }
  throw invalidField(column, raw);
}

function mismatch(column: ColumnMetadata, expected: string, actual: Value): DecodeError {
  return new DecodeError(
    `Column "${column.name}" expected ${expected}, got ${describeValue(actual)}`
  );
}

/**
 * Converts a cell read from `column` back into the property value.
 */
export function decodeField(column: ColumnMetadata, value: Value): unknown {
  if (value.type === 'null') {
    if (!column.nullable) {
      throw new DecodeError(`Column "${column.name}" is NOT NULL but the row holds NULL`);
    }
    return null;
  }

  switch (column.type) {
    case 'integer': {
      if (value.type !== 'integer') throw mismatch(column, 'INTEGER', value);
      const n = Number(value.value);
      if (!Number.isSafeInteger(n)) {
        throw new DecodeError(
          `Column "${column.name}" holds ${value.value}, which is outside the safe integer range; declare it as bigint`
        );
      }
      return n;
    }
    case 'bigint':
      if (value.type !== 'integer') throw mismatch(column, 'INTEGER', value);
      return value.value;
    case 'float':
      if (value.type === 'real') return value.value;
      if (value.type === 'integer') return Number(value.value);
      throw mismatch(column, 'REAL', value);
    case 'boolean':
      if (value.type !== 'integer') throw mismatch(column, 'INTEGER', value);
      return value.value !== 0n;
    case 'string':
    case 'text':
    case 'uuid':
      if (value.type !== 'text') throw mismatch(column, 'TEXT', value);
      return value.value;
    case 'datetime': {
      if (value.type !== 'text') throw mismatch(column, 'TEXT', value);
      const date = new Date(value.value);
      if (Number.isNaN(date.getTime())) {
        throw new DecodeError(`Column "${column.name}" holds an unparseable datetime "${value.value}"`);
      }
      return date;
    }
    case 'json':
      if (value.type !== 'text') throw mismatch(column, 'TEXT', value);
      try {
        const parsed: unknown = JSON.parse(value.value);
        return parsed;
      } catch (error) {
        throw new DecodeError(`Column "${column.name}" holds invalid JSON`, { cause: error });
      }
    case 'binary':
      if (value.type !== 'blob') throw mismatch(column, 'BLOB', value);
      return value.value;
  }
}
