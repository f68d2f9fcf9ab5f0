import { Logger } from '@nestjs/common';
import { createPool, type FieldPacket, type Pool, type PoolConnection, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise';
import { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import { Rows } from '../data/rows';
import { parseNaiveDate, parseNaiveDateTime, parseNaiveTime } from '../value/temporal';
import { Value } from '../value/value';
import { decodeCell } from './decode';
import { BaseConnection, DriverAdapter, describeTarget, toDatabaseError, withAcquireTimeout, type DriverConnection, type ExecuteOutcome } from './driver';
import { toDriverParams } from './parameters';

// Column type codes from the MySQL client/server protocol
const MYSQL_TYPES = {
  DECIMAL: 0x00,
  TIMESTAMP: 0x07,
  LONGLONG: 0x08,
  DATE: 0x0a,
  TIME: 0x0b,
  DATETIME: 0x0c,
  NEWDATE: 0x0e,
  JSON: 0xf5,
  NEWDECIMAL: 0xf6,
} as const;

/**
 * Dates, 64-bit integers and decimals arrive as strings (dateStrings / bigNumberStrings) and are typed here
 */
export function decodeMysqlCell(raw: unknown, field: Pick<FieldPacket, 'type' | 'columnType'>): Value {
  if (raw === null || raw === undefined) {
    return Value.null();
  }
  if (typeof raw !== 'string') {
    return decodeCell(raw);
  }
  switch (field.columnType ?? field.type) {
    case MYSQL_TYPES.LONGLONG:
      return decodeCell(BigInt(raw));
    case MYSQL_TYPES.DECIMAL:
    case MYSQL_TYPES.NEWDECIMAL:
      return Value.decimal(raw);
    case MYSQL_TYPES.DATE:
    case MYSQL_TYPES.NEWDATE:
      return Value.date(parseNaiveDate(raw));
    case MYSQL_TYPES.DATETIME:
    case MYSQL_TYPES.TIMESTAMP:
      return Value.dateTime(parseNaiveDateTime(raw));
    case MYSQL_TYPES.TIME:
      return Value.time(parseNaiveTime(raw));
    case MYSQL_TYPES.JSON: {
      const parsed: unknown = JSON.parse(raw);
      return Value.json(parsed);
    }
    default:
      return Value.text(raw);
  }
}

class MysqlConnection extends BaseConnection {
  constructor(private readonly connection: PoolConnection) {
    super();
  }

  async query(sql: string, params: readonly Value[]): Promise<Rows> {
    try {
      const [rows, fields] = await this.connection.query<RowDataPacket[][]>(
        { sql, rowsAsArray: true },
        toDriverParams(params, Platform.MySQL),
      );
      const columns = fields.map(field => field.name);
      return Rows.of(columns, rows.map(row => fields.map((field, i) => decodeMysqlCell(row[i], field))));
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  protected async run(sql: string, params: readonly Value[]): Promise<ExecuteOutcome> {
    try {
      const [header] = await this.connection.query<ResultSetHeader>(sql, toDriverParams(params, Platform.MySQL));
      return {
        affected: header.affectedRows,
        lastInsertId: header.insertId ? decodeCell(BigInt(header.insertId)) : undefined,
      };
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  async begin(): Promise<void> {
    try {
      await this.connection.beginTransaction();
    } catch (error) {
      throw toDatabaseError(error, 'BEGIN');
    }
  }

  async commit(): Promise<void> {
    try {
      await this.connection.commit();
    } catch (error) {
      throw toDatabaseError(error, 'COMMIT');
    }
  }

  async rollback(): Promise<void> {
    try {
      await this.connection.rollback();
    } catch (error) {
      throw toDatabaseError(error, 'ROLLBACK');
    }
  }

  async release(broken = false): Promise<void> {
    if (broken) {
      this.connection.destroy();
    } else {
      this.connection.release();
    }
  }
}

/**
 * MySQL and MariaDB through a mysql2 pool
 */
export class MysqlDriver extends DriverAdapter {
  readonly platform = Platform.MySQL;
  private readonly logger = new Logger(MysqlDriver.name);
  private readonly pool: Pool;
  private readonly target: string;

  constructor(private readonly config: DatabaseConfig) {
    super();
    this.target = describeTarget(config);
    this.pool = createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      connectionLimit: config.maxSize,
      maxIdle: Math.max(config.minIdle, 1),
      idleTimeout: config.idleTimeoutMs,
      connectTimeout: config.connectionTimeoutMs,
      dateStrings: true,
      supportBigNumbers: true,
      bigNumberStrings: true,
    });
    this.logger.log(`Pool created for ${this.target}`);
  }

  async acquire(): Promise<DriverConnection> {
    const connection = await withAcquireTimeout(
      this.pool.getConnection(),
      this.config.connectionTimeoutMs,
      this.target,
      async late => late.release(),
    );
    if (this.config.testOnCheckout) {
      try {
        await connection.ping();
      } catch (error) {
        connection.destroy();
        throw toDatabaseError(error, 'PING');
      }
    }
    return new MysqlConnection(connection);
  }

  async close(): Promise<void> {
    this.logger.log(`Closing pool for ${this.target}`);
    await this.pool.end();
  }
}
