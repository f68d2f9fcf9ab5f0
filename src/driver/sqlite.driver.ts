import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { Mutex } from '../common/mutex';
import { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import { Rows } from '../data/rows';
import { Value } from '../value/value';
import { decodeCell } from './decode';
import { BaseConnection, DriverAdapter, toDatabaseError, withAcquireTimeout, type DriverConnection, type ExecuteOutcome } from './driver';
import { toDriverParams } from './parameters';

/**
 * SQLite stores booleans as integers; the declared column type tells them apart
 */
export function decodeSqliteCell(raw: unknown, declaredType: string | null): Value {
  const cell = decodeCell(raw);
  if (declaredType && /BOOL/i.test(declaredType) && (cell.kind === 'Int' || cell.kind === 'Bigint')) {
    return Value.bool(cell.kind === 'Int' ? cell.value !== 0 : cell.value !== 0n);
  }
  return cell;
}

class SqliteConnection extends BaseConnection {
  private released = false;

  constructor(private readonly db: Database.Database, private readonly unlock: () => void) {
    super();
  }

  async query(sql: string, params: readonly Value[]): Promise<Rows> {
    try {
      const statement = this.db.prepare(sql).safeIntegers(true);
      const bound = toDriverParams(params, Platform.SQLite);
      if (!statement.reader) {
        statement.run(...bound);
        return new Rows();
      }
      const definitions = statement.columns();
      const records = statement.raw(true).all(...bound);
      return Rows.of(
        definitions.map(definition => definition.name),
        records.map(record => {
          const cells: unknown[] = Array.isArray(record) ? record : [];
          return definitions.map((definition, i) => decodeSqliteCell(cells[i], definition.type));
        }),
      );
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  protected async run(sql: string, params: readonly Value[]): Promise<ExecuteOutcome> {
    try {
      const result = this.db.prepare(sql).safeIntegers(true).run(...toDriverParams(params, Platform.SQLite));
      return {
        affected: result.changes,
        lastInsertId: result.changes > 0 ? decodeCell(result.lastInsertRowid) : undefined,
      };
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }

  async begin(): Promise<void> {
    this.command('BEGIN');
  }

  async commit(): Promise<void> {
    this.command('COMMIT');
  }

  async rollback(): Promise<void> {
    if (this.db.inTransaction) {
      this.command('ROLLBACK');
    }
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    if (this.db.inTransaction) {
      this.logger.warn('Connection released inside an open transaction, rolling back');
      this.command('ROLLBACK');
    }
    this.unlock();
  }

  private command(sql: string): void {
    try {
      this.db.exec(sql);
    } catch (error) {
      throw toDatabaseError(error, sql);
    }
  }
}

/**
 * SQLite through better-sqlite3
 * One synchronous handle shared by every caller; a mutex hands it out one holder at a time
 */
export class SqliteDriver extends DriverAdapter {
  readonly platform = Platform.SQLite;
  private readonly logger = new Logger(SqliteDriver.name);
  private readonly db: Database.Database;
  private readonly mutex = new Mutex();

  constructor(private readonly config: DatabaseConfig) {
    super();
    try {
      this.db = new Database(config.database, { timeout: config.connectionTimeoutMs });
    } catch (error) {
      throw toDatabaseError(error);
    }
    this.logger.log(`Opened SQLite database ${config.database}`);
  }

  async acquire(): Promise<DriverConnection> {
    const unlock = await withAcquireTimeout(
      this.mutex.acquire(),
      this.config.connectionTimeoutMs,
      `sqlite:${this.config.database}`,
      async late => late(),
    );
    return new SqliteConnection(this.db, unlock);
  }

  async close(): Promise<void> {
    this.logger.log(`Closing SQLite database ${this.config.database}`);
    this.db.close();
  }
}
