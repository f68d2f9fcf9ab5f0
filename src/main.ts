/**
 * relmap entry point - connects to the configured database and checks it answers
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { getLogLevels, truncateForLog } from './common/logging.utils';
import { Platform } from './common/types';
import { MapperService } from './mapper/mapper.service';

async function bootstrap() {
  const logger = new Logger('relmap');

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
    process.exit(1);
  });

  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: getLogLevels(process.env.LOG_LEVEL),
    });
    app.enableShutdownHooks();

    const mapper = app.get(MapperService);
    const probe = mapper.dialect.platform === Platform.Oracle ? 'SELECT 1 AS ok FROM DUAL' : 'SELECT 1 AS ok';
    const result = await mapper.execFirst(probe);
    logger.log(`Database reachable (${mapper.dialect.platform}): ${truncateForLog(result)}`);

    await app.close();
  } catch (error) {
    logger.error('relmap failed to start');
    console.error(error);
    process.exit(1);
  }
}

void bootstrap();
