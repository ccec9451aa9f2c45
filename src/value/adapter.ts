import { DecodeError } from '../errors/index.js';
import { Value } from './value.js';

/**
 * The shapes better-sqlite3 binds and returns. Nothing outside this file
 * should depend on them.
 */
export type DriverParam = null | bigint | number | string | Buffer;

export function toDriverParam(value: Value): DriverParam {
  switch (value.type) {
    case 'null':
      return null;
    case 'integer':
      return value.value;
    case 'real':
      return value.value;
    case 'text':
      return value.value;
    case 'blob':
      return Buffer.from(value.value.buffer, value.value.byteOffset, value.value.byteLength);
  }
}

export function fromDriverValue(raw: unknown): Value {
  if (raw === null || raw === undefined) {
    return Value.null();
  }
  if (typeof raw === 'bigint') {
    return Value.integer(raw);
  }
  if (typeof raw === 'number') {
    // Integers arrive as bigint (safe-integer mode), so a number is always a REAL cell.
    if (!Number.isFinite(raw)) {
      throw new DecodeError(`Cannot represent non-finite REAL ${raw}`);
    }
    return Value.real(raw);
  }
  if (typeof raw === 'string') {
    return Value.text(raw);
  }
  if (raw instanceof Uint8Array) {
    return Value.blob(new Uint8Array(raw));
  }
  throw new DecodeError(`Unsupported driver value of type ${typeof raw}`);
}
