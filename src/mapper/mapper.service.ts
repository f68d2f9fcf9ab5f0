import { Inject, Injectable, type OnModuleDestroy } from '@nestjs/common';
import { ConnectionError, errorMessage } from '../common/errors';
import { DriverAdapter, type DriverConnection } from '../driver/driver';
import type { Interceptor } from '../interceptor/interceptor';
import { Transaction } from '../transaction/transaction';
import { BaseMapper } from './base-mapper';
import type { MapperRuntime } from './mapper.types';

export const MAPPER_RUNTIME = Symbol('MAPPER_RUNTIME');

/**
 * Mapper facade over the connection pool
 * Each operation draws its own connection; use transaction() to group statements
 */
@Injectable()
export class MapperService extends BaseMapper implements OnModuleDestroy {
  constructor(
    private readonly driver: DriverAdapter,
    @Inject(MAPPER_RUNTIME) runtime: MapperRuntime,
  ) {
    super(runtime);
  }

  static create(driver: DriverAdapter, runtime: MapperRuntime): MapperService {
    return new MapperService(driver, runtime);
  }

  /**
   * Same pool and settings with one more interceptor; this service is left unchanged
   */
  withInterceptor(interceptor: Interceptor): MapperService {
    const pipeline = this.runtime.pipeline.withChain(this.runtime.pipeline.chain.with(interceptor));
    return new MapperService(this.driver, { ...this.runtime, pipeline });
  }

  /**
   * Open a transaction the caller must commit, roll back or close
   */
  async startTransaction(): Promise<Transaction> {
    return Transaction.begin(this.runtime, this.driver);
  }

  /**
   * Run `work` in a transaction: committed when it resolves, rolled back when it throws
   */
  async transaction<T>(work: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = await this.startTransaction();
    try {
      const result = await work(tx);
      if (tx.isActive) {
        await tx.commit();
      }
      return result;
    } catch (error) {
      if (tx.isActive) {
        await tx.rollback().catch((rollbackError: unknown) => {
          this.logger.warn(`Rollback failed: ${errorMessage(rollbackError)}`);
        });
      }
      throw error;
    } finally {
      await tx.close();
    }
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing database driver');
    await this.driver.close();
  }

  protected async withConnection<T>(work: (connection: DriverConnection) => Promise<T>): Promise<T> {
    const connection = await this.driver.acquire();
    let broken = false;
    try {
      return await work(connection);
    } catch (error) {
      broken = error instanceof ConnectionError;
      throw error;
    } finally {
      await connection.release(broken);
    }
  }

  protected async atomically<T>(work: (mapper: BaseMapper) => Promise<T>): Promise<T> {
    return this.transaction(work);
  }
}
