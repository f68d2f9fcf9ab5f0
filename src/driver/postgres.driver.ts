import { Logger } from '@nestjs/common';
import { Pool, type PoolClient } from 'pg';
import { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import { Rows } from '../data/rows';
import type { Value } from '../value/value';
import { BaseConnection, DriverAdapter, describeTarget, toDatabaseError, withAcquireTimeout, type DriverConnection, type ExecuteOutcome } from './driver';
import { toDriverParams } from './parameters';
import { decodePgCell } from './pg-type-map';

class PostgresConnection extends BaseConnection {
  constructor(private readonly client: PoolClient) {
    super();
  }

  async query(sql: string, params: readonly Value[]): Promise<Rows> {
    try {
      const result = await this.client.query<unknown[]>({
        text: sql,
        values: toDriverParams(params, Platform.Postgres),
        rowMode: 'array',
      });
      const columns = result.fields.map(field => field.name);
      const oids = result.fields.map(field => field.dataTypeID);
      return Rows.of(columns, result.rows.map(row => row.map((cell, i) => decodePgCell(cell, oids[i]))));
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  protected async run(sql: string, params: readonly Value[]): Promise<ExecuteOutcome> {
    try {
      const result = await this.client.query(sql, toDriverParams(params, Platform.Postgres));
      return { affected: result.rowCount ?? 0 };
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  async begin(): Promise<void> {
    await this.command('BEGIN');
  }

  async commit(): Promise<void> {
    await this.command('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.command('ROLLBACK');
  }

  async release(broken = false): Promise<void> {
    this.client.release(broken);
  }

  private async command(sql: string): Promise<void> {
    try {
      await this.client.query(sql);
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }
}

/**
 * PostgreSQL through a pg Pool
 */
export class PostgresDriver extends DriverAdapter {
  readonly platform = Platform.Postgres;
  private readonly logger = new Logger(PostgresDriver.name);
  private readonly pool: Pool;
  private readonly target: string;

  constructor(private readonly config: DatabaseConfig) {
    super();
    this.target = describeTarget(config);
    this.pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: config.maxSize,
      idleTimeoutMillis: config.idleTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      maxLifetimeSeconds: Math.ceil(config.maxLifetimeMs / 1000),
    });
    this.pool.on('error', error => this.logger.error(`Idle client error: ${error.message}`));
    this.logger.log(`Pool created for ${this.target}`);
  }

  async acquire(): Promise<DriverConnection> {
    const client = await withAcquireTimeout(
      this.pool.connect(),
      this.config.connectionTimeoutMs,
      this.target,
      async late => late.release(),
    );
    const connection = new PostgresConnection(client);
    if (this.config.testOnCheckout) {
      try {
        await connection.query('SELECT 1', []);
      } catch (error) {
        await connection.release(true);
        throw error;
      }
    }
    return connection;
  }

  async close(): Promise<void> {
    this.logger.log(`Closing pool for ${this.target}`);
    await this.pool.end();
  }
}
