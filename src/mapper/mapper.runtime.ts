import type { Platform } from '../common/types';
import type { MapperConfig } from '../config/mapper.config';
import { createDialect } from '../dialect/dialect.factory';
import { ExecutionPipeline } from '../execution/pipeline';
import { defaultIdentifierGenerator, type IdentifierGenerator } from '../identifier/snowflake';
import { InterceptorBuilder } from '../interceptor/interceptor.builder';
import { SqlInjectionDetector } from '../security/sql-injection.detector';
import type { MapperRuntime } from './mapper.types';

export interface RuntimeOptions {
  /** Replaces the default chain, which only logs statements */
  interceptors?: InterceptorBuilder;
  identifierGenerator?: IdentifierGenerator;
}

/**
 * Dialect, interceptor chain, injection detector and id generator for one backend
 */
export function createRuntime(platform: Platform, config: MapperConfig, options: RuntimeOptions = {}): MapperRuntime {
  const builder =
    options.interceptors ??
    new InterceptorBuilder({ level: config.logLevel, slowQueryThresholdMs: config.slowQueryThresholdMs });

  return {
    dialect: createDialect(platform, { oracleRownumPaging: config.oracleRownumPaging }),
    pipeline: new ExecutionPipeline({
      chain: builder.build(),
      detector: new SqlInjectionDetector({ platform }),
      policy: config.sqlSecurity,
    }),
    ids: options.identifierGenerator ?? defaultIdentifierGenerator(),
    strictConversion: config.strictConversion,
    defaultBatchSize: config.defaultBatchSize,
  };
}
