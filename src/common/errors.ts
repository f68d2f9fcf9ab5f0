import type { OperationType } from './types';

/**
 * Context attached to every mapper error
 * `sql` is the placeholder form of the statement; bound values never appear here
 */
export interface ErrorContext {
  sql?: string;
  operation?: OperationType;
  cause?: unknown;
}

/**
 * Base class for everything the mapper throws
 */
export class MapperError extends Error {
  readonly sql?: string;
  readonly operation?: OperationType;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.sql = context.sql;
    this.operation = context.operation;
  }
}

export class ConfigError extends MapperError {}

export class ConnectionError extends MapperError {}

export class InvalidArgumentError extends MapperError {}

export class MissingTableError extends MapperError {}

export class MissingFieldError extends MapperError {}

export class EmptyWhereError extends MapperError {
  constructor(operation: OperationType, table: string) {
    super(`Refusing to ${operation.toLowerCase()} every row of ${table}: no predicates and allowEmpty() not set`, { operation });
  }
}

export class InvalidStateError extends MapperError {}

export class TransactionBrokenError extends MapperError {}

export class SqlInjectionDetectedError extends MapperError {
  readonly reasons: string[];

  constructor(reasons: string[], context: ErrorContext = {}) {
    super(`SQL injection detected: ${reasons.join('; ')}`, context);
    this.reasons = reasons;
  }
}

export class InterceptorError extends MapperError {
  readonly interceptor: string;

  constructor(interceptor: string, message: string, context: ErrorContext = {}) {
    super(`Interceptor error [${interceptor}]: ${message}`, context);
    this.interceptor = interceptor;
  }
}

export class DatabaseError extends MapperError {}

export type DataErrorReason =
  | 'TypeMismatch'
  | 'ParseError'
  | 'ConversionError'
  | 'NoSuchValue'
  | 'IndexOutOfBounds'
  | 'RowCount';

/**
 * Conversion failure between a Value and a typed field
 */
export class DataError extends MapperError {
  readonly reason: DataErrorReason;

  constructor(reason: DataErrorReason, message: string) {
    super(message);
    this.reason = reason;
  }

  static typeMismatch(expected: string, found: string): DataError {
    return new DataError('TypeMismatch', `Type mismatch: expected ${expected}, found ${found}`);
  }

  static parse(message: string): DataError {
    return new DataError('ParseError', `Parse error: ${message}`);
  }

  static conversion(message: string): DataError {
    return new DataError('ConversionError', `Conversion error: ${message}`);
  }

  static noSuchValue(what = 'value'): DataError {
    return new DataError('NoSuchValue', `No such ${what}`);
  }

  static indexOutOfBounds(index: number, length: number): DataError {
    return new DataError('IndexOutOfBounds', `Index ${index} out of bounds for length ${length}`);
  }

  /**
   * A single-row query returned zero rows or several
   */
  static rowCount(found: number): DataError {
    return new DataError('RowCount', found === 0 ? 'Zero record returned' : 'More than one record returned');
  }
}

/**
 * Normalize anything thrown by a driver into a readable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
