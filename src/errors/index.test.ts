import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  DecodeError,
  MigrationError,
  NotFoundError,
  OrmError,
  QueryError,
  errorMessage,
  isOrmError,
} from './index.js';

describe('errors', () => {
  it('should keep kind, name and prototype chain', () => {
    const error = new DecodeError('bad row');
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toBeInstanceOf(OrmError);
    expect(error).toBeInstanceOf(Error);
    expect(error.kind).toBe('decode');
    expect(error.name).toBe('DecodeError');
    expect(error.message).toBe('bad row');
  });

  it('should carry the statement and cause on QueryError', () => {
    const cause = new Error('no such table: users');
    const error = new QueryError('no such table: users', { sql: 'SELECT * FROM users', cause });
    expect(error.kind).toBe('query');
    expect(error.sql).toBe('SELECT * FROM users');
    expect(error.cause).toBe(cause);
  });

  it('should report each kind', () => {
    expect(new NotFoundError('x').kind).toBe('not_found');
    expect(new MigrationError('x').kind).toBe('migration');
    expect(new ConfigurationError('x').kind).toBe('configuration');
  });

  it('should guard and format unknown errors', () => {
    expect(isOrmError(new MigrationError('x'))).toBe(true);
    expect(isOrmError(new Error('x'))).toBe(false);
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
