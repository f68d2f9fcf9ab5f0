import { Logger } from '@nestjs/common';
import oracledb, { type BindParameter, type Connection, type Pool } from 'oracledb';
import { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import { Rows } from '../data/rows';
import type { Value } from '../value/value';
import { decodeCell } from './decode';
import { BaseConnection, DriverAdapter, describeTarget, toDatabaseError, withAcquireTimeout, type DriverConnection, type ExecuteOutcome } from './driver';
import { toDriverParams } from './parameters';

const RETURNING_INTO = /\bINTO\s+:(\d+)\s*$/i;

/**
 * Positional binds for a statement; a trailing `RETURNING ... INTO :n` numbered past the values gets an out-bind
 */
export function oracleBinds(sql: string, params: readonly Value[]): { binds: BindParameter[]; returning: boolean } {
  const binds: BindParameter[] = toDriverParams(params, Platform.Oracle).map(val => ({ val }));
  const match = RETURNING_INTO.exec(sql);
  const returning = match !== null && Number(match[1]) === params.length + 1;
  if (returning) {
    binds.push({ dir: oracledb.BIND_OUT, type: oracledb.NUMBER });
  }
  return { binds, returning };
}

function firstOutBind(outBinds: unknown): Value | undefined {
  if (!Array.isArray(outBinds)) {
    return undefined;
  }
  const first: unknown = outBinds[0];
  // RETURNING INTO yields one array per out-bind, one entry per inserted row
  const cell: unknown = Array.isArray(first) ? first[0] : first;
  return cell === undefined ? undefined : decodeCell(cell);
}

class OracleConnection extends BaseConnection {
  // Oracle opens transactions implicitly; outside one every statement commits on its own
  private inTransaction = false;

  constructor(private readonly connection: Connection) {
    super();
  }

  async query(sql: string, params: readonly Value[]): Promise<Rows> {
    try {
      const result = await this.connection.execute<unknown[]>(sql, oracleBinds(sql, params).binds, {
        outFormat: oracledb.OUT_FORMAT_ARRAY,
        autoCommit: !this.inTransaction,
      });
      const columns = (result.metaData ?? []).map(column => column.name);
      return Rows.of(columns, (result.rows ?? []).map(row => columns.map((_, i) => decodeCell(row[i]))));
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  protected async run(sql: string, params: readonly Value[]): Promise<ExecuteOutcome> {
    try {
      const { binds, returning } = oracleBinds(sql, params);
      const result = await this.connection.execute<unknown[]>(sql, binds, { autoCommit: !this.inTransaction });
      return {
        affected: result.rowsAffected ?? 0,
        lastInsertId: returning ? firstOutBind(result.outBinds) : undefined,
      };
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  async begin(): Promise<void> {
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    try {
      await this.connection.commit();
    } catch (error) {
      throw toDatabaseError(error, 'COMMIT');
    } finally {
      this.inTransaction = false;
    }
  }

  async rollback(): Promise<void> {
    try {
      await this.connection.rollback();
    } catch (error) {
      throw toDatabaseError(error, 'ROLLBACK');
    } finally {
      this.inTransaction = false;
    }
  }

  async release(broken = false): Promise<void> {
    try {
      await this.connection.close({ drop: broken });
    } catch (error) {
      throw toDatabaseError(error);
    }
  }
}

/**
 * Oracle through a node-oracledb pool (thin mode, no client libraries)
 */
export class OracleDriver extends DriverAdapter {
  readonly platform = Platform.Oracle;
  private readonly logger = new Logger(OracleDriver.name);
  private readonly target: string;
  private pool?: Promise<Pool>;

  constructor(private readonly config: DatabaseConfig) {
    super();
    this.target = describeTarget(config);
    oracledb.fetchAsString = [oracledb.CLOB];
    oracledb.fetchAsBuffer = [oracledb.BLOB];
  }

  private getPool(): Promise<Pool> {
    if (!this.pool) {
      const { config } = this;
      this.pool = oracledb.createPool({
        user: config.user,
        password: config.password,
        connectString: `${config.host}:${config.port}/${config.database}`,
        poolMax: config.maxSize,
        poolMin: config.minIdle,
        poolTimeout: Math.ceil(config.idleTimeoutMs / 1000),
        queueTimeout: config.connectionTimeoutMs,
        poolPingInterval: config.testOnCheckout ? 0 : 60,
      });
      this.logger.log(`Pool created for ${this.target}`);
    }
    return this.pool;
  }

  async acquire(): Promise<DriverConnection> {
    const connection = await withAcquireTimeout(
      this.getPool().then(pool => pool.getConnection()),
      this.config.connectionTimeoutMs,
      this.target,
      async late => late.close(),
    );
    return new OracleConnection(connection);
  }

  async close(): Promise<void> {
    if (!this.pool) {
      return;
    }
    this.logger.log(`Closing pool for ${this.target}`);
    const pool = await this.pool;
    await pool.close(10);
  }
}
