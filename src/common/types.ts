/**
 * Shared enums used across the mapper layers
 */

/**
 * Database backends the mapper can talk to
 */
export enum Platform {
  MySQL = 'mysql',
  Postgres = 'postgres',
  SQLite = 'sqlite',
  Oracle = 'oracle',
  MSSQL = 'mssql',
}

/**
 * Kind of statement flowing through the execution pipeline
 */
export enum OperationType {
  Select = 'Select',
  Insert = 'Insert',
  Update = 'Update',
  Delete = 'Delete',
  DDL = 'DDL',
  Call = 'Call',  // stored procedures, skipped by interceptors unless they opt in
  Other = 'Other',
}

/**
 * Mapper log verbosity, ordered from most to least chatty
 */
export enum MapperLogLevel {
  Trace = 1,
  Debug = 2,
  Info = 3,
  Warn = 4,
  Error = 5,
}

/**
 * What to do when the injection detector flags a statement
 */
export enum SqlSecurityPolicy {
  Off = 'off',
  Warn = 'warn',
  Deny = 'deny',
}

/**
 * Guess the operation type from the leading keyword of a statement
 */
export function detectOperationType(sql: string): OperationType {
  const keyword = sql.trimStart().split(/\s+/, 1)[0]?.toUpperCase() ?? '';
  switch (keyword) {
    case 'SELECT':
    case 'WITH':
    case 'SHOW':
    case 'EXPLAIN':
    case 'PRAGMA':
      return OperationType.Select;
    case 'INSERT':
    case 'REPLACE':
    case 'MERGE':
      return OperationType.Insert;
    case 'UPDATE':
      return OperationType.Update;
    case 'DELETE':
      return OperationType.Delete;
    case 'CREATE':
    case 'ALTER':
    case 'DROP':
    case 'TRUNCATE':
    case 'RENAME':
      return OperationType.DDL;
    case 'CALL':
    case 'EXEC':
    case 'EXECUTE':
      return OperationType.Call;
    default:
      return OperationType.Other;
  }
}
