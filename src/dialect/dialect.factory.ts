import { ConfigError } from '../common/errors';
import { Platform } from '../common/types';
import type { Dialect } from './dialect';
import { MssqlDialect } from './mssql.dialect';
import { MySqlDialect } from './mysql.dialect';
import { OracleDialect } from './oracle.dialect';
import { PostgresDialect } from './postgres.dialect';
import { SqliteDialect } from './sqlite.dialect';

export interface DialectOptions {
  oracleRownumPaging?: boolean;
}

export function createDialect(platform: Platform, options: DialectOptions = {}): Dialect {
  switch (platform) {
    case Platform.MySQL:
      return new MySqlDialect();
    case Platform.Postgres:
      return new PostgresDialect();
    case Platform.SQLite:
      return new SqliteDialect();
    case Platform.Oracle:
      return new OracleDialect(options.oracleRownumPaging ?? true);
    case Platform.MSSQL:
      return new MssqlDialect();
    default:
      throw new ConfigError(`Unsupported platform: ${String(platform)}`);
  }
}
