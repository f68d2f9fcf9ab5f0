import { Logger } from '@nestjs/common';
import { ConnectionPool, Request, Transaction, type IColumnMetadata, type IResult } from 'mssql';
import { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import { Rows } from '../data/rows';
import type { Value } from '../value/value';
import { decodeCell } from './decode';
import { BaseConnection, DriverAdapter, describeTarget, toDatabaseError, withAcquireTimeout, type DriverConnection, type ExecuteOutcome } from './driver';
import { toDriverParams } from './parameters';

type MssqlRecord = Record<string, unknown>;

/**
 * Column names of a result set in select-list order
 */
export function orderedColumns(metadata: IColumnMetadata | undefined): string[] {
  if (!metadata) {
    return [];
  }
  return Object.values(metadata)
    .sort((a, b) => a.index - b.index)
    .map(column => column.name);
}

class MssqlConnection extends BaseConnection {
  private transaction?: Transaction;

  constructor(private readonly pool: ConnectionPool) {
    super();
  }

  async query(sql: string, params: readonly Value[]): Promise<Rows> {
    const result = await this.send(sql, params);
    const recordset = result.recordset;
    if (!recordset) {
      return new Rows();
    }
    const columns = orderedColumns(recordset.columns);
    return Rows.of(columns, recordset.map(record => columns.map(column => decodeCell(record[column]))));
  }

  protected async run(sql: string, params: readonly Value[]): Promise<ExecuteOutcome> {
    const result = await this.send(sql, params);
    return { affected: result.rowsAffected.reduce((sum, count) => sum + count, 0) };
  }

  async begin(): Promise<void> {
    const transaction = new Transaction(this.pool);
    try {
      await transaction.begin();
    } catch (error) {
      throw toDatabaseError(error, 'BEGIN TRANSACTION');
    }
    this.transaction = transaction;
  }

  async commit(): Promise<void> {
    const transaction = this.takeTransaction();
    if (!transaction) {
      return;
    }
    try {
      await transaction.commit();
    } catch (error) {
      throw toDatabaseError(error, 'COMMIT');
    }
  }

  async rollback(): Promise<void> {
    const transaction = this.takeTransaction();
    if (!transaction) {
      return;
    }
    try {
      await transaction.rollback();
    } catch (error) {
      throw toDatabaseError(error, 'ROLLBACK');
    }
  }

  async release(): Promise<void> {
    if (this.transaction) {
      this.logger.warn('Connection released inside an open transaction, rolling back');
      await this.rollback();
    }
  }

  private takeTransaction(): Transaction | undefined {
    const transaction = this.transaction;
    this.transaction = undefined;
    return transaction;
  }

  // Statements run on the pool, or on the reserved transaction connection while one is open
  private async send(sql: string, params: readonly Value[]): Promise<IResult<MssqlRecord>> {
    const request = this.transaction ? new Request(this.transaction) : new Request(this.pool);
    toDriverParams(params, Platform.MSSQL).forEach((param, i) => {
      request.input(`p${i + 1}`, param);
    });
    try {
      return await request.query<MssqlRecord>(sql);
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }
}

/**
 * SQL Server through an mssql (tedious) connection pool
 */
export class MssqlDriver extends DriverAdapter {
  readonly platform = Platform.MSSQL;
  private readonly logger = new Logger(MssqlDriver.name);
  private readonly pool: ConnectionPool;
  private readonly target: string;
  private connecting?: Promise<ConnectionPool>;

  constructor(private readonly config: DatabaseConfig) {
    super();
    this.target = describeTarget(config);
    this.pool = new ConnectionPool({
      server: config.host ?? 'localhost',
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      connectionTimeout: config.connectionTimeoutMs,
      pool: {
        max: config.maxSize,
        min: config.minIdle,
        idleTimeoutMillis: config.idleTimeoutMs,
      },
      options: {
        trustServerCertificate: true,
      },
    });
    this.pool.on('error', (error: Error) => this.logger.error(`Pool error: ${error.message}`));
    this.logger.log(`Pool created for ${this.target}`);
  }

  async acquire(): Promise<DriverConnection> {
    this.connecting ??= this.pool.connect().catch((error: unknown) => {
      this.connecting = undefined;
      throw error;
    });
    const pool = await withAcquireTimeout(this.connecting, this.config.connectionTimeoutMs, this.target);
    const connection = new MssqlConnection(pool);
    if (this.config.testOnCheckout) {
      await connection.query('SELECT 1', []);
    }
    return connection;
  }

  async close(): Promise<void> {
    this.logger.log(`Closing pool for ${this.target}`);
    await this.pool.close();
  }
}
