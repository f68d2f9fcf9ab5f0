import { InvalidStateError, TransactionBrokenError, errorMessage } from '../common/errors';
import { Mutex } from '../common/mutex';
import type { DriverAdapter, DriverConnection } from '../driver/driver';
import { BaseMapper } from '../mapper/base-mapper';
import type { MapperRuntime } from '../mapper/mapper.types';

export enum TransactionState {
  Active = 'Active',
  Committed = 'Committed',
  RolledBack = 'RolledBack',
  /** Closed without commit or rollback */
  Dropped = 'Dropped',
  /** Commit or rollback failed; the connection was discarded */
  Broken = 'Broken',
}

/**
 * Mapper bound to one connection with an open transaction
 * Statements run one at a time in call order; once finished, every operation fails
 */
export class Transaction extends BaseMapper {
  private readonly lock = new Mutex();
  private current = TransactionState.Active;

  private constructor(runtime: MapperRuntime, private readonly connection: DriverConnection) {
    super(runtime);
  }

  /**
   * Acquire a connection and open a transaction on it
   */
  static async begin(runtime: MapperRuntime, driver: DriverAdapter): Promise<Transaction> {
    const connection = await driver.acquire();
    try {
      await connection.begin();
    } catch (error) {
      await connection.release(true);
      throw error;
    }
    return new Transaction(runtime, connection);
  }

  get state(): TransactionState {
    return this.current;
  }

  get isActive(): boolean {
    return this.current === TransactionState.Active;
  }

  get connectionId(): string {
    return this.connection.id;
  }

  async commit(): Promise<void> {
    await this.finish('commit', TransactionState.Committed, () => this.connection.commit());
  }

  async rollback(): Promise<void> {
    await this.finish('rollback', TransactionState.RolledBack, () => this.connection.rollback());
  }

  /**
   * Give the connection back; an open transaction is rolled back first
   */
  async close(): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.current !== TransactionState.Active) {
        return;
      }
      this.logger.warn(`Transaction on connection ${this.connection.id} closed while active, rolling back`);
      this.current = TransactionState.Dropped;
      try {
        await this.connection.rollback();
        await this.connection.release();
      } catch (error) {
        this.logger.warn(`Rollback on close failed: ${errorMessage(error)}`);
        await this.connection.release(true);
      }
    });
  }

  protected async withConnection<T>(work: (connection: DriverConnection) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      this.assertActive();
      return work(this.connection);
    });
  }

  protected async atomically<T>(work: (mapper: BaseMapper) => Promise<T>): Promise<T> {
    return work(this);
  }

  private async finish(action: string, next: TransactionState, end: () => Promise<void>): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.assertActive(action);
      try {
        await end();
      } catch (error) {
        this.current = TransactionState.Broken;
        await this.connection.release(true);
        throw error;
      }
      this.current = next;
      await this.connection.release();
    });
  }

  private assertActive(action = 'execute'): void {
    if (this.current === TransactionState.Broken) {
      throw new TransactionBrokenError(`Cannot ${action}: transaction is broken`);
    }
    if (this.current !== TransactionState.Active) {
      throw new InvalidStateError(`Cannot ${action}: transaction is already ${this.current}`);
    }
  }
}
