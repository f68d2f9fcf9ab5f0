import { Test, type TestingModule } from '@nestjs/testing';
import { AppModule } from '../src/app.module';
import { SqlInjectionDetectedError } from '../src/common/errors';
import { OperationType } from '../src/common/types';
import { MapperService } from '../src/mapper/mapper.service';
import { Table, TableField, TableId } from '../src/metadata/decorators';
import { Value } from '../src/value/value';

@Table('users')
class User {
  @TableId()
  id?: number;

  @TableField()
  name?: string;

  @TableField()
  age?: number;

  @TableField()
  status?: number;

  @TableField({ name: 'created_at', fill: { mode: 'insert', value: Value.raw('CURRENT_TIMESTAMP') } })
  createdAt?: string;
}

@Table('profiles')
class Profile {
  @TableId()
  id?: number;

  @TableField()
  settings?: Map<string, Value>;
}

function user(name: string, fields: Partial<User> = {}): User {
  return Object.assign(new User(), { name, ...fields });
}

describe('Mapper (e2e)', () => {
  const originalEnv = process.env;
  let module: TestingModule;
  let mapper: MapperService;

  beforeEach(async () => {
    process.env = {
      ...originalEnv,
      DATABASE_PLATFORM: 'sqlite',
      DATABASE_NAME: ':memory:',
      MAPPER_SQL_SECURITY: 'deny',
      LOG_LEVEL: 'error',
    };
    module = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();
    mapper = module.get(MapperService);

    await mapper.execDrop(
      'CREATE TABLE users (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT NOT NULL, age INTEGER, status INTEGER, created_at TEXT)',
    );
    await mapper.execDrop('CREATE TABLE profiles (id INTEGER PRIMARY KEY AUTOINCREMENT, settings TEXT)');
  });

  afterEach(async () => {
    await module.close();
    process.env = originalEnv;
  });

  it('should save an entity and read it back by its generated key', async () => {
    const jack = user('Jack', { id: 0, age: 30 });

    const id = await mapper.save(jack);

    expect(typeof id).toBe('number');
    expect(id).toBeGreaterThan(0);
    expect(jack.id).toBe(id);
    const loaded = await mapper.selectById(User, jack.id);
    expect(loaded?.name).toBe('Jack');
    expect(loaded?.age).toBe(30);
  });

  it('should page through matching rows with the unpaged total', async () => {
    // every sixth row is inactive: 25 of 30 match
    await mapper.saveBatch(Array.from({ length: 30 }, (_, i) => user(`user-${i + 1}`, { status: i % 6 === 5 ? 0 : 1 })));

    const page = await mapper.page(User, 2, 10, mapper.wrapper().eq('status', 1).orderByAsc('id'));

    expect(page.current).toBe(2);
    expect(page.size).toBe(10);
    expect(page.total).toBe(25);
    expect(page.records).toHaveLength(10);
    const active = await mapper.list(User, mapper.wrapper().eq('status', 1).orderByAsc('id'));
    expect(page.records[0].id).toBe(active[10].id);
    expect(page.records[0].id).toBe(13);
  });

  it('should fill the insert timestamp on every row of a batch', async () => {
    const batch = [user('u1'), user('u2'), user('u3')];

    await expect(mapper.saveBatch(batch)).resolves.toBe(3);

    const rows = await mapper.list(User, mapper.wrapper().orderByAsc('id'));
    expect(rows.map(row => row.name)).toEqual(['u1', 'u2', 'u3']);
    const stamps = rows.map(row => row.createdAt);
    expect(stamps[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(new Set(stamps).size).toBe(1);
  });

  it('should refuse an injected raw predicate and keep the table', async () => {
    await mapper.save(user('alice'));

    const failure = mapper.list(User, mapper.wrapper().raw('1=1; DROP TABLE users'));

    await expect(failure).rejects.toBeInstanceOf(SqlInjectionDetectedError);
    await expect(failure).rejects.toMatchObject({ operation: OperationType.Select });
    await expect(mapper.count(User)).resolves.toBe(1);
  });

  it('should discard earlier writes when a transaction rolls back', async () => {
    const tx = await mapper.startTransaction();
    const first = user('first');
    await tx.save(first);
    // name is NOT NULL
    await expect(tx.save(new User())).rejects.toMatchObject({ name: 'DatabaseError', operation: OperationType.Insert });

    await tx.rollback();

    await expect(mapper.count(User, mapper.wrapper().eq('id', first.id))).resolves.toBe(0);
  });

  it('should round-trip an object column in key order', async () => {
    const settings = new Map<string, Value>([
      ['k', Value.text('v')],
      ['n', Value.int(42)],
      ['z', Value.bool(true)],
      ['10', Value.text('ten')],
    ]);
    const profile = Object.assign(new Profile(), { settings });

    await mapper.save(profile);
    const loaded = await mapper.selectById(Profile, profile.id);

    expect(loaded?.settings).toEqual(settings);
    expect(Array.from(loaded?.settings?.keys() ?? [])).toEqual(['k', 'n', 'z', '10']);
    await expect(mapper.execFirst('SELECT settings FROM profiles')).resolves.toEqual({ settings: '{"k":"v","n":42,"z":true,"10":"ten"}' });
  });
});
