import { describe, expect, it } from 'vitest';
import { Row } from '../driver/row.js';
import { ConfigurationError, DecodeError, ValidationError } from '../errors/index.js';
import { Value } from '../value/index.js';
import { decodeField, encodeField } from './codec.js';
import { type ModelDefinition, defineModel } from './model.js';
import type { ColumnMetadata } from './types.js';

interface Product {
  id: number | null;
  name: string;
  price: number;
  inStock: boolean;
  tags: string[] | null;
  releasedAt: Date | null;
}

const Products = defineModel<Product>({
  table: 'products',
  create: () => ({ id: null, name: '', price: 0, inStock: false, tags: null, releasedAt: null }),
  columns: {
    id: { type: 'integer', primaryKey: true, autoIncrement: true },
    name: { type: 'string', unique: true },
    price: { type: 'float', default: '0' },
    inStock: { type: 'boolean' },
    tags: { type: 'json', nullable: true },
    releasedAt: { type: 'datetime', nullable: true },
  },
});

interface Loose {
  a: unknown;
  b: unknown;
}

const invalidDefinitions: [string, Pick<ModelDefinition<Loose>, 'table' | 'columns'>, string][] = [
  ['an empty table name', { table: ' ', columns: { a: { type: 'string' } } }, 'Model table name must not be empty'],
  ['no columns', { table: 't', columns: {} }, 'Model "t" declares no columns'],
  [
    'a duplicate column name',
    { table: 't', columns: { a: { type: 'string' }, b: { type: 'string', name: 'a' } } },
    'Model "t" declares column "a" twice',
  ],
  [
    'auto-increment off the primary key',
    { table: 't', columns: { a: { type: 'integer', autoIncrement: true } } },
    'Column "t.a" is auto-increment but not the primary key',
  ],
  [
    'auto-increment on a text key',
    { table: 't', columns: { a: { type: 'uuid', primaryKey: true, autoIncrement: true } } },
    'Column "t.a" is auto-increment but has type uuid',
  ],
];

function column(overrides: Partial<ColumnMetadata>): ColumnMetadata {
  return {
    propertyName: 'field',
    name: 'field',
    type: 'string',
    sqlType: 'TEXT',
    primaryKey: false,
    nullable: false,
    unique: false,
    autoIncrement: false,
    ...overrides,
  };
}

describe('defineModel()', () => {
  it('should derive column names and SQL types', () => {
    expect(Products.columns.map((c) => [c.name, c.sqlType])).toEqual([
      ['id', 'INTEGER'],
      ['name', 'TEXT'],
      ['price', 'REAL'],
      ['in_stock', 'INTEGER'],
      ['tags', 'TEXT'],
      ['released_at', 'TEXT'],
    ]);
    expect(Products.primaryKey?.propertyName).toBe('id');
  });

  it('should generate CREATE TABLE IF NOT EXISTS', () => {
    expect(Products.migrationSql()).toBe(
      'CREATE TABLE IF NOT EXISTS products (' +
        'id INTEGER PRIMARY KEY AUTOINCREMENT, ' +
        'name TEXT NOT NULL UNIQUE, ' +
        'price REAL NOT NULL DEFAULT 0, ' +
        'in_stock INTEGER NOT NULL, ' +
        'tags TEXT, ' +
        'released_at TEXT)'
    );
  });

  it('should not repeat PRIMARY KEY spelled out in a custom SQL type', () => {
    const model = defineModel<{ code: string }>({
      table: 'codes',
      create: () => ({ code: '' }),
      columns: { code: { type: 'string', primaryKey: true, sqlType: 'TEXT PRIMARY KEY' } },
    });
    expect(model.migrationSql()).toBe('CREATE TABLE IF NOT EXISTS codes (code TEXT PRIMARY KEY)');
  });

  it.each(invalidDefinitions)('should reject %s', (_label, definition, message) => {
    expect(() => defineModel<Loose>({ create: () => ({ a: null, b: null }), ...definition })).toThrow(
      new ConfigurationError(message)
    );
  });
});

describe('EntityModel', () => {
  const released = new Date('2024-03-01T12:00:00.000Z');

  it('should encode properties in column order', () => {
    const product: Product = {
      id: 7,
      name: "O'Reilly",
      price: 9.5,
      inStock: true,
      tags: ['a', 'b'],
      releasedAt: released,
    };
    expect(Products.encode(product)).toEqual([
      ['id', Value.integer(7)],
      ['name', Value.text("O'Reilly")],
      ['price', Value.real(9.5)],
      ['in_stock', Value.integer(1)],
      ['tags', Value.text('["a","b"]')],
      ['released_at', Value.text('2024-03-01T12:00:00.000Z')],
    ]);
  });

  it('should report the primary key value, or null when unset', () => {
    const product = Products.decode(
      new Row(
        ['id', 'name', 'price', 'in_stock', 'tags', 'released_at'],
        [Value.integer(3), Value.text('x'), Value.real(1), Value.integer(0), Value.null(), Value.null()]
      )
    );
    expect(Products.primaryKeyValue(product)).toEqual(Value.integer(3));
    expect(Products.primaryKeyValue({ ...product, id: null })).toBeNull();
  });

  it('should decode a row into a fresh entity', () => {
    const row = new Row(
      ['id', 'name', 'price', 'in_stock', 'tags', 'released_at'],
      [
        Value.integer(1),
        Value.text('Lamp'),
        Value.integer(12),
        Value.integer(0),
        Value.text('["desk"]'),
        Value.text('2024-03-01T12:00:00.000Z'),
      ]
    );
    expect(Products.decode(row)).toEqual({
      id: 1,
      name: 'Lamp',
      price: 12,
      inStock: false,
      tags: ['desk'],
      releasedAt: released,
    });
  });

  it('should reject a row of the wrong width', () => {
    const row = new Row(['id'], [Value.integer(1)]);
    expect(() => Products.decode(row)).toThrow(
      new DecodeError('Row has 1 columns but model "products" declares 6')
    );
  });
});

describe('encodeField()', () => {
  it('should map null and undefined to NULL', () => {
    expect(encodeField(column({}), null)).toEqual(Value.null());
    expect(encodeField(column({}), undefined)).toEqual(Value.null());
  });

  it('should reject a value of the wrong kind', () => {
    expect(() => encodeField(column({ type: 'integer' }), 'seven')).toThrow(
      new ValidationError('Property "field" (integer) cannot hold a string value')
    );
    expect(() => encodeField(column({ type: 'binary' }), 'bytes')).toThrow(ValidationError);
  });

  it('should keep floats that happen to be whole as REAL', () => {
    expect(encodeField(column({ type: 'float' }), 2)).toEqual(Value.real(2));
  });
});

describe('decodeField()', () => {
  it('should reject NULL in a NOT NULL column', () => {
    expect(() => decodeField(column({ name: 'title' }), Value.null())).toThrow(
      new DecodeError('Column "title" is NOT NULL but the row holds NULL')
    );
  });

  it('should reject a cell of the wrong storage class', () => {
    expect(() => decodeField(column({ name: 'title' }), Value.integer(5))).toThrow(
      new DecodeError('Column "title" expected TEXT, got INTEGER(5)')
    );
  });

  it('should keep bigint columns as bigint', () => {
    expect(decodeField(column({ type: 'bigint' }), Value.integer(2n ** 60n))).toBe(2n ** 60n);
  });

  it('should refuse integers beyond the safe range for integer columns', () => {
    expect(() => decodeField(column({ type: 'integer' }), Value.integer(2n ** 60n))).toThrow(
      DecodeError
    );
  });

  it('should decode booleans from 0 and 1', () => {
    expect(decodeField(column({ type: 'boolean' }), Value.integer(1))).toBe(true);
    expect(decodeField(column({ type: 'boolean' }), Value.integer(0))).toBe(false);
  });

  it('should reject invalid JSON and dates', () => {
    expect(() => decodeField(column({ type: 'json' }), Value.text('{'))).toThrow(
      new DecodeError('Column "field" holds invalid JSON')
    );
    expect(() => decodeField(column({ type: 'datetime' }), Value.text('soon'))).toThrow(
      new DecodeError('Column "field" holds an unparseable datetime "soon"')
    );
  });
});
