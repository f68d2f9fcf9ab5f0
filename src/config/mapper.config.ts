import { registerAs } from '@nestjs/config';
import { IsBoolean, IsEnum, IsInt, Min } from 'class-validator';
import { ConfigError } from '../common/errors';
import { parseMapperLogLevel } from '../common/logging.utils';
import { MapperLogLevel, SqlSecurityPolicy } from '../common/types';
import { definedOnly, parseFlag, validateConfig } from './config-validation';

/**
 * Mapper behaviour: statement logging, conversion strictness, injection policy and batching
 */
export class MapperConfig {
  @IsEnum(MapperLogLevel)
  logLevel: MapperLogLevel = MapperLogLevel.Debug;

  @IsInt()
  @Min(0)
  slowQueryThresholdMs: number = 1000;

  /** Surface row conversion failures instead of falling back to the field default */
  @IsBoolean()
  strictConversion: boolean = false;

  @IsEnum(SqlSecurityPolicy)
  sqlSecurity: SqlSecurityPolicy = SqlSecurityPolicy.Deny;

  @IsInt()
  @Min(1)
  defaultBatchSize: number = 500;

  /** Oracle paging through the ROWNUM envelope rather than OFFSET / FETCH */
  @IsBoolean()
  oracleRownumPaging: boolean = true;
}

function parseLogLevel(value: string | undefined): MapperLogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const level = parseMapperLogLevel(value);
  if (level === undefined) {
    throw new ConfigError(`Invalid MAPPER_LOG_LEVEL: '${value}'`);
  }
  return level;
}

export function loadMapperConfig(env: NodeJS.ProcessEnv = process.env): MapperConfig {
  const rawConfig = definedOnly({
    logLevel: parseLogLevel(env.MAPPER_LOG_LEVEL),
    slowQueryThresholdMs: env.MAPPER_SLOW_QUERY_THRESHOLD_MS || undefined,
    strictConversion: parseFlag(env.MAPPER_STRICT_CONVERSION),
    sqlSecurity: env.MAPPER_SQL_SECURITY ? env.MAPPER_SQL_SECURITY.trim().toLowerCase() : undefined,
    defaultBatchSize: env.MAPPER_DEFAULT_BATCH_SIZE || undefined,
    oracleRownumPaging: parseFlag(env.ORACLE_ROWNUM_PAGING),
  });

  return validateConfig(rawConfig, 'mapper', MapperConfig);
}

/**
 * Mapper configuration factory
 */
export default registerAs('mapper', (): MapperConfig => loadMapperConfig());
