import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ConnectionError, DatabaseError, MapperError, errorMessage } from '../common/errors';
import type { Platform } from '../common/types';
import type { DatabaseConfig } from '../config/database.config';
import type { Rows } from '../data/rows';
import type { Value } from '../value/value';

/**
 * Outcome of a statement without a result set
 */
export interface ExecuteOutcome {
  affected: number;
  lastInsertId?: Value;
}

/**
 * One reserved backend connection
 * Outside a transaction every statement autocommits
 */
export interface DriverConnection {
  readonly id: string;
  query(sql: string, params: readonly Value[]): Promise<Rows>;
  execute(sql: string, params: readonly Value[]): Promise<ExecuteOutcome>;
  begin(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  /** Rows touched by the last execute() */
  affectedRows(): number;
  /** Generated key reported by the last execute(), if any */
  lastInsertId(): Value | undefined;
  /**
   * Hand the connection back; a broken connection is destroyed instead of pooled
   */
  release(broken?: boolean): Promise<void>;
}

/**
 * Pool of connections to one backend
 * Also the injection token for the active adapter
 */
export abstract class DriverAdapter {
  abstract readonly platform: Platform;

  abstract acquire(): Promise<DriverConnection>;

  abstract close(): Promise<void>;
}

/**
 * Bookkeeping shared by the concrete connections: id, last outcome and error wrapping
 */
export abstract class BaseConnection implements DriverConnection {
  readonly id = uuidv4();
  protected readonly logger = new Logger(this.constructor.name);
  private lastOutcome: ExecuteOutcome = { affected: 0 };

  abstract query(sql: string, params: readonly Value[]): Promise<Rows>;

  abstract begin(): Promise<void>;

  abstract commit(): Promise<void>;

  abstract rollback(): Promise<void>;

  abstract release(broken?: boolean): Promise<void>;

  protected abstract run(sql: string, params: readonly Value[]): Promise<ExecuteOutcome>;

  async execute(sql: string, params: readonly Value[]): Promise<ExecuteOutcome> {
    this.lastOutcome = await this.run(sql, params);
    return this.lastOutcome;
  }

  affectedRows(): number {
    return this.lastOutcome.affected;
  }

  lastInsertId(): Value | undefined {
    return this.lastOutcome.lastInsertId;
  }
}

const logger = new Logger('DriverAdapter');

/**
 * Reject with ConnectionError when acquisition outlasts `timeoutMs`
 * A connection that arrives after the deadline is handed to `discard`
 */
export async function withAcquireTimeout<T>(
  acquire: Promise<T>,
  timeoutMs: number,
  target: string,
  discard?: (late: T) => Promise<void>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new ConnectionError(`Timed out after ${timeoutMs}ms acquiring a connection to ${target}`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([acquire, timeout]);
  } catch (error) {
    if (timedOut && discard) {
      void acquire
        .then(discard)
        .catch(lateError => logger.warn(`Failed to discard a late connection: ${errorMessage(lateError)}`));
    }
    if (error instanceof MapperError) {
      throw error;
    }
    throw new ConnectionError(`Failed to acquire a connection to ${target}: ${errorMessage(error)}`, { cause: error });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wrap a driver failure; mapper errors pass through unchanged
 */
export function toDatabaseError(error: unknown, sql?: string): MapperError {
  if (error instanceof MapperError) {
    return error;
  }
  return new DatabaseError(errorMessage(error), { sql, cause: error });
}

/**
 * Human-readable target for logs; never includes the password
 */
export function describeTarget(config: DatabaseConfig): string {
  return config.host
    ? `${config.platform}://${config.host}${config.port ? `:${config.port}` : ''}/${config.database}`
    : `${config.platform}:${config.database}`;
}
