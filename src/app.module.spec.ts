import { Test } from '@nestjs/testing';
import { AppModule } from './app.module';
import { Platform } from './common/types';
import { DriverAdapter } from './driver/driver';
import { SqliteDriver } from './driver/sqlite.driver';
import { MapperService } from './mapper/mapper.service';

describe('AppModule', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, DATABASE_PLATFORM: 'sqlite', DATABASE_NAME: ':memory:' };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should be defined', () => {
    expect(AppModule).toBeDefined();
  });

  it('should wire the configured driver into the mapper', async () => {
    const module = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    const driver = module.get(DriverAdapter);
    expect(driver).toBeInstanceOf(SqliteDriver);
    expect(driver.platform).toBe(Platform.SQLite);

    const mapper = module.get(MapperService);
    expect(mapper.dialect.platform).toBe(Platform.SQLite);
    await expect(mapper.execFirst('SELECT 1 AS ok')).resolves.toEqual({ ok: 1 });

    await module.close();
  });

  it('should fail to start without a database platform', async () => {
    delete process.env.DATABASE_PLATFORM;
    delete process.env.DATABASE_URL;

    await expect(
      Test.createTestingModule({
        imports: [AppModule],
      }).compile(),
    ).rejects.toThrow('Database platform not configured');
  });
});
