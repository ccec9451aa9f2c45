export type OrmErrorKind =
  | 'connection'
  | 'query'
  | 'decode'
  | 'not_found'
  | 'migration'
  | 'configuration'
  | 'validation';

export interface OrmErrorOptions {
  cause?: unknown;
}

export class OrmError extends Error {
  readonly kind: OrmErrorKind;

  constructor(kind: OrmErrorKind, message: string, options: OrmErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'OrmError';
    this.kind = kind;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The driver could not be reached or the database could not be opened.
 */
export class ConnectionError extends OrmError {
  constructor(message: string, options?: OrmErrorOptions) {
    super('connection', message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * The driver rejected or failed a statement. `sql` is the statement text as sent.
 */
export class QueryError extends OrmError {
  readonly sql?: string;

  constructor(message: string, options: OrmErrorOptions & { sql?: string } = {}) {
    super('query', message, options);
    this.name = 'QueryError';
    this.sql = options.sql;
  }
}

export class DecodeError extends OrmError {
  constructor(message: string, options?: OrmErrorOptions) {
    super('decode', message, options);
    this.name = 'DecodeError';
  }
}

export class NotFoundError extends OrmError {
  constructor(message: string, options?: OrmErrorOptions) {
    super('not_found', message, options);
    this.name = 'NotFoundError';
  }
}

export class MigrationError extends OrmError {
  constructor(message: string, options?: OrmErrorOptions) {
    super('migration', message, options);
    this.name = 'MigrationError';
  }
}

/**
 * An operation was invoked in a configuration that cannot support it.
 * Not retryable: callers avoid it by construction.
 */
export class ConfigurationError extends OrmError {
  constructor(message: string, options?: OrmErrorOptions) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends OrmError {
  constructor(message: string, options?: OrmErrorOptions) {
    super('validation', message, options);
    this.name = 'ValidationError';
  }
}

export function isOrmError(error: unknown): error is OrmError {
  return error instanceof OrmError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
