import { InvalidStateError, TransactionBrokenError } from '../common/errors';
import { Platform } from '../common/types';
import { loadDatabaseConfig } from '../config/database.config';
import { loadMapperConfig } from '../config/mapper.config';
import type { DriverAdapter, DriverConnection } from '../driver/driver';
import { SqliteDriver } from '../driver/sqlite.driver';
import { createRuntime } from '../mapper/mapper.runtime';
import { MapperService } from '../mapper/mapper.service';
import type { MapperRuntime } from '../mapper/mapper.types';
import { Table, TableField, TableId } from '../metadata/decorators';
import { Transaction, TransactionState } from './transaction';

@Table()
class Account {
  @TableId()
  id?: number;

  @TableField()
  owner?: string;

  @TableField()
  balance?: number;
}

function account(owner: string, balance: number): Account {
  return Object.assign(new Account(), { owner, balance });
}

function runtime(): MapperRuntime {
  return createRuntime(Platform.SQLite, loadMapperConfig({}));
}

describe('Transaction', () => {
  describe('on SQLite', () => {
    let mapper: MapperService;

    beforeEach(async () => {
      mapper = MapperService.create(new SqliteDriver(loadDatabaseConfig({ DATABASE_PLATFORM: 'sqlite' })), runtime());
      await mapper.execDrop('CREATE TABLE account (id INTEGER PRIMARY KEY AUTOINCREMENT, owner TEXT, balance INTEGER)');
    });

    afterEach(async () => {
      await mapper.onModuleDestroy();
    });

    it('should commit when the callback resolves', async () => {
      const id = await mapper.transaction(async tx => {
        const saved = await tx.save(account('ada', 100));
        await tx.updateById(Object.assign(new Account(), { id: saved, balance: 150 }));
        return saved;
      });

      expect(id).toBe(1);
      expect((await mapper.selectById(Account, 1))?.balance).toBe(150);
    });

    it('should roll back and rethrow when the callback throws', async () => {
      await expect(
        mapper.transaction(async tx => {
          await tx.save(account('ada', 100));
          throw new Error('insufficient funds');
        }),
      ).rejects.toThrow('insufficient funds');

      await expect(mapper.count(Account)).resolves.toBe(0);
    });

    it('should leave a transaction the callback finished itself', async () => {
      await mapper.transaction(async tx => {
        await tx.save(account('ada', 100));
        await tx.rollback();
      });

      await expect(mapper.count(Account)).resolves.toBe(0);
    });

    it('should refuse work after commit', async () => {
      const tx = await mapper.startTransaction();
      await tx.save(account('ada', 100));
      await tx.commit();

      expect(tx.state).toBe(TransactionState.Committed);
      expect(tx.isActive).toBe(false);
      await expect(tx.count(Account)).rejects.toBeInstanceOf(InvalidStateError);
      await expect(tx.commit()).rejects.toThrow('Cannot commit: transaction is already Committed');
      await expect(mapper.count(Account)).resolves.toBe(1);
    });

    it('should roll back on close while still active', async () => {
      const tx = await mapper.startTransaction();
      await tx.save(account('ada', 100));

      await tx.close();

      expect(tx.state).toBe(TransactionState.Dropped);
      await expect(mapper.count(Account)).resolves.toBe(0);
    });

    it('should run batch operations inside the open transaction', async () => {
      const tx = await mapper.startTransaction();
      await tx.saveBatch([account('a', 1), account('b', 2)]);
      await expect(tx.count(Account)).resolves.toBe(2);
      await tx.rollback();

      expect(tx.state).toBe(TransactionState.RolledBack);
      await expect(mapper.count(Account)).resolves.toBe(0);
    });
  });

  describe('with a failing connection', () => {
    let connection: jest.Mocked<DriverConnection>;
    let driver: DriverAdapter;

    beforeEach(() => {
      connection = {
        id: 'conn-7',
        query: jest.fn(),
        execute: jest.fn(),
        begin: jest.fn().mockResolvedValue(undefined),
        commit: jest.fn().mockResolvedValue(undefined),
        rollback: jest.fn().mockResolvedValue(undefined),
        release: jest.fn().mockResolvedValue(undefined),
        affectedRows: jest.fn().mockReturnValue(0),
        lastInsertId: jest.fn().mockReturnValue(undefined),
      };
      driver = {
        platform: Platform.SQLite,
        acquire: jest.fn().mockResolvedValue(connection),
        close: jest.fn().mockResolvedValue(undefined),
      };
    });

    it('should discard the connection when begin fails', async () => {
      connection.begin.mockRejectedValueOnce(new Error('database is locked'));

      await expect(Transaction.begin(runtime(), driver)).rejects.toThrow('database is locked');
      expect(connection.release).toHaveBeenCalledWith(true);
    });

    it('should turn broken when commit fails', async () => {
      connection.commit.mockRejectedValueOnce(new Error('disk I/O error'));
      const tx = await Transaction.begin(runtime(), driver);

      await expect(tx.commit()).rejects.toThrow('disk I/O error');

      expect(tx.state).toBe(TransactionState.Broken);
      expect(tx.connectionId).toBe('conn-7');
      expect(connection.release).toHaveBeenCalledWith(true);
      await expect(tx.count(Account)).rejects.toBeInstanceOf(TransactionBrokenError);
    });

    it('should still release when the rollback on close fails', async () => {
      connection.rollback.mockRejectedValueOnce(new Error('connection reset'));
      const tx = await Transaction.begin(runtime(), driver);

      await tx.close();

      expect(tx.state).toBe(TransactionState.Dropped);
      expect(connection.release).toHaveBeenCalledTimes(1);
      expect(connection.release).toHaveBeenCalledWith(true);
    });
  });
});
