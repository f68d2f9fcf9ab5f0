import { ConfigError } from '../common/errors';
import { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import type { DriverAdapter } from './driver';
import { MssqlDriver } from './mssql.driver';
import { MysqlDriver } from './mysql.driver';
import { OracleDriver } from './oracle.driver';
import { PostgresDriver } from './postgres.driver';
import { SqliteDriver } from './sqlite.driver';

export function createDriver(config: DatabaseConfig): DriverAdapter {
  switch (config.platform) {
    case Platform.MySQL:
      return new MysqlDriver(config);
    case Platform.Postgres:
      return new PostgresDriver(config);
    case Platform.SQLite:
      return new SqliteDriver(config);
    case Platform.Oracle:
      return new OracleDriver(config);
    case Platform.MSSQL:
      return new MssqlDriver(config);
    default:
      throw new ConfigError(`Unsupported platform: ${String(config.platform)}`);
  }
}
