import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ConfigError } from '../common/errors';
import databaseConfig, { type DatabaseConfig } from '../config/database.config';
import mapperConfig, { type MapperConfig } from '../config/mapper.config';
import { DriverAdapter } from '../driver/driver';
import { createDriver } from '../driver/driver.factory';
import { MAPPER_RUNTIME, MapperService } from './mapper.service';
import { createRuntime, type RuntimeOptions } from './mapper.runtime';

function requireConfig<T>(configService: ConfigService, key: string): T {
  const config = configService.get<T>(key);
  if (!config) {
    throw new ConfigError(`Configuration '${key}' not found`);
  }
  return config;
}

/**
 * Registers the driver for the configured backend and a MapperService over it
 */
@Module({})
export class MapperModule {
  static forRoot(options: RuntimeOptions = {}): DynamicModule {
    return {
      module: MapperModule,
      global: true,
      imports: [ConfigModule.forFeature(databaseConfig), ConfigModule.forFeature(mapperConfig)],
      providers: [
        {
          provide: DriverAdapter,
          inject: [ConfigService],
          useFactory: (configService: ConfigService): DriverAdapter =>
            createDriver(requireConfig<DatabaseConfig>(configService, 'database')),
        },
        {
          provide: MAPPER_RUNTIME,
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            createRuntime(
              requireConfig<DatabaseConfig>(configService, 'database').platform,
              requireConfig<MapperConfig>(configService, 'mapper'),
              options,
            ),
        },
        MapperService,
      ],
      exports: [MapperService, DriverAdapter],
    };
  }
}
