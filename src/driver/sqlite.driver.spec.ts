import { ConnectionError, DatabaseError } from '../common/errors';
import { loadDatabaseConfig } from '../config/database.config';
import { Value } from '../value/value';
import { decodeSqliteCell, SqliteDriver } from './sqlite.driver';

describe('SqliteDriver', () => {
  let driver: SqliteDriver;

  beforeEach(async () => {
    driver = new SqliteDriver(loadDatabaseConfig({ DATABASE_PLATFORM: 'sqlite', DATABASE_CONNECTION_TIMEOUT_MS: '200' }));
    const connection = await driver.acquire();
    await connection.execute('CREATE TABLE notes (id INTEGER PRIMARY KEY AUTOINCREMENT, body TEXT, pinned BOOLEAN)', []);
    await connection.release();
  });

  afterEach(async () => {
    await driver.close();
  });

  it('should report affected rows and the generated rowid', async () => {
    const connection = await driver.acquire();

    const first = await connection.execute('INSERT INTO notes (body, pinned) VALUES (?, ?)', [Value.text('a'), Value.bool(true)]);
    const second = await connection.execute('INSERT INTO notes (body, pinned) VALUES (?, ?)', [Value.text('b'), Value.bool(false)]);

    expect(first).toEqual({ affected: 1, lastInsertId: Value.int(1) });
    expect(second).toEqual({ affected: 1, lastInsertId: Value.int(2) });
    expect(connection.affectedRows()).toBe(1);
    expect(connection.lastInsertId()).toEqual(Value.int(2));
    await connection.release();
  });

  it('should decode result sets by declared column type', async () => {
    const connection = await driver.acquire();
    await connection.execute('INSERT INTO notes (body, pinned) VALUES (?, ?)', [Value.text('a'), Value.bool(true)]);

    const rows = await connection.query('SELECT id, body, pinned FROM notes', []);

    expect(rows.length).toBe(1);
    expect(rows.first()?.columns).toEqual(['id', 'body', 'pinned']);
    expect(rows.first()?.data).toEqual([Value.int(1), Value.text('a'), Value.bool(true)]);
    await connection.release();
  });

  it('should return no rows for a statement without a result set', async () => {
    const connection = await driver.acquire();

    const rows = await connection.query('DELETE FROM notes', []);

    expect(rows.length).toBe(0);
    await connection.release();
  });

  it('should keep writes only when the transaction commits', async () => {
    const connection = await driver.acquire();

    await connection.begin();
    await connection.execute("INSERT INTO notes (body) VALUES ('kept')", []);
    await connection.commit();
    await connection.begin();
    await connection.execute("INSERT INTO notes (body) VALUES ('dropped')", []);
    await connection.rollback();

    const rows = await connection.query('SELECT body FROM notes', []);
    expect(rows.data.map(row => row.getValue('body'))).toEqual([Value.text('kept')]);
    await connection.release();
  });

  it('should roll back a transaction left open at release', async () => {
    const connection = await driver.acquire();
    await connection.begin();
    await connection.execute("INSERT INTO notes (body) VALUES ('orphan')", []);

    await connection.release();

    const next = await driver.acquire();
    const rows = await next.query('SELECT COUNT(*) AS n FROM notes', []);
    expect(rows.first()?.getValue('n')).toEqual(Value.int(0));
    await next.release();
  });

  it('should hand the handle to one holder at a time', async () => {
    const holder = await driver.acquire();

    await expect(driver.acquire()).rejects.toBeInstanceOf(ConnectionError);

    await holder.release();
    const next = await driver.acquire();
    expect(next.id).not.toBe(holder.id);
    await next.release();
  });

  it('should wrap SQLite failures with the statement', async () => {
    const connection = await driver.acquire();

    await expect(connection.query('SELECT * FROM missing', [])).rejects.toMatchObject({
      name: 'DatabaseError',
      sql: 'SELECT * FROM missing',
    });
    await expect(connection.execute('INSERT INTO missing VALUES (1)', [])).rejects.toBeInstanceOf(DatabaseError);
    await connection.release();
  });
});

describe('decodeSqliteCell', () => {
  it('should turn integers in boolean columns into booleans', () => {
    expect(decodeSqliteCell(1n, 'BOOLEAN')).toEqual(Value.bool(true));
    expect(decodeSqliteCell(0n, 'bool')).toEqual(Value.bool(false));
  });

  it('should leave other columns alone', () => {
    expect(decodeSqliteCell(1n, 'INTEGER')).toEqual(Value.int(1));
    expect(decodeSqliteCell('t', 'BOOLEAN')).toEqual(Value.text('t'));
    expect(decodeSqliteCell(2n, null)).toEqual(Value.int(2));
  });
});
