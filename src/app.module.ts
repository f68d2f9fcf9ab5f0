import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import databaseConfig from './config/database.config';
import mapperConfig from './config/mapper.config';
import { MapperModule } from './mapper/mapper.module';

/**
 * Standalone application context: configuration, then the mapper over the configured database
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [databaseConfig, mapperConfig],
    }),
    MapperModule.forRoot(),
  ],
})
export class AppModule {}
