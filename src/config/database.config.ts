import { registerAs } from '@nestjs/config';
import { IsBoolean, IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { ConfigError } from '../common/errors';
import { Platform } from '../common/types';
import { definedOnly, parseFlag, validateConfig } from './config-validation';

export const DEFAULT_PORTS: Record<Platform, number | undefined> = {
  [Platform.MySQL]: 3306,
  [Platform.Postgres]: 5432,
  [Platform.SQLite]: undefined,
  [Platform.Oracle]: 1521,
  [Platform.MSSQL]: 1433,
};

const URL_SCHEMES: Record<string, Platform> = {
  mysql: Platform.MySQL,
  mariadb: Platform.MySQL,
  postgres: Platform.Postgres,
  postgresql: Platform.Postgres,
  sqlite: Platform.SQLite,
  oracle: Platform.Oracle,
  mssql: Platform.MSSQL,
  sqlserver: Platform.MSSQL,
};

/**
 * Database connection and pool configuration
 * Validated using class-validator decorators
 */
export class DatabaseConfig {
  @IsEnum(Platform)
  platform!: Platform;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  host?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  port?: number;

  @IsOptional()
  @IsString()
  user?: string;

  @IsOptional()
  @IsString()
  password?: string;

  /** Database, schema or service name; the file path for SQLite */
  @IsString()
  @IsNotEmpty()
  database!: string;

  @IsInt()
  @Min(1)
  maxSize: number = 16;

  @IsInt()
  @Min(0)
  minIdle: number = 0;

  @IsInt()
  @Min(1)
  connectionTimeoutMs: number = 6000;

  @IsInt()
  @Min(1)
  idleTimeoutMs: number = 600000;

  @IsInt()
  @Min(1)
  maxLifetimeMs: number = 1800000;

  @IsBoolean()
  testOnCheckout: boolean = false;
}

function platformFromScheme(protocol: string): Platform {
  const scheme = protocol.replace(/:$/, '').split('+')[0].toLowerCase();
  const platform = URL_SCHEMES[scheme];
  if (!platform) {
    throw new ConfigError(`Unsupported database URL scheme: '${scheme}'`);
  }
  return platform;
}

function parsePlatform(name: string): Platform {
  const platform = Object.values(Platform).find(candidate => candidate === name.trim().toLowerCase());
  return platform ?? platformFromScheme(name);
}

export interface DatabaseUrlParts {
  platform: Platform;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
}

/**
 * Connection fields carried by a database URL
 */
export function parseDatabaseUrl(url: string): DatabaseUrlParts {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Invalid database URL: '${url}'`);
  }
  const platform = platformFromScheme(parsed.protocol);
  if (platform === Platform.SQLite) {
    const path = decodeURIComponent(`${parsed.host}${parsed.pathname}`);
    return { platform, database: path || ':memory:' };
  }
  return {
    platform,
    host: parsed.hostname || undefined,
    port: parsed.port ? Number(parsed.port) : undefined,
    user: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    database: decodeURIComponent(parsed.pathname.replace(/^\//, '')) || undefined,
  };
}

/**
 * Build the database configuration from environment variables; DATABASE_URL wins over the structured fields
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const fromUrl: Partial<DatabaseUrlParts> = env.DATABASE_URL ? parseDatabaseUrl(env.DATABASE_URL) : {};
  const structured = env.DATABASE_URL ? {} : definedOnly({
    host: env.DATABASE_HOST || undefined,
    port: env.DATABASE_PORT || undefined,
    user: env.DATABASE_USER,
    password: env.DATABASE_PASSWORD,
    database: env.DATABASE_NAME || undefined,
  });

  const platform = env.DATABASE_PLATFORM ? parsePlatform(env.DATABASE_PLATFORM) : fromUrl.platform;
  if (platform === undefined) {
    throw new ConfigError('Database platform not configured: set DATABASE_PLATFORM or DATABASE_URL');
  }

  const rawConfig: Record<string, unknown> = {
    ...structured,
    ...definedOnly({ ...fromUrl }),
    platform,
    ...definedOnly({
      maxSize: env.DATABASE_MAX_SIZE || undefined,
      minIdle: env.DATABASE_MIN_IDLE || undefined,
      connectionTimeoutMs: env.DATABASE_CONNECTION_TIMEOUT_MS || undefined,
      idleTimeoutMs: env.DATABASE_IDLE_TIMEOUT_MS || undefined,
      maxLifetimeMs: env.DATABASE_MAX_LIFETIME_MS || undefined,
      testOnCheckout: parseFlag(env.DATABASE_TEST_ON_CHECKOUT),
    }),
  };
  if (platform === Platform.SQLite && rawConfig.database === undefined) {
    rawConfig.database = ':memory:';
  }
  if (platform !== Platform.SQLite && rawConfig.host === undefined) {
    throw new ConfigError('Database host not configured: set DATABASE_URL or DATABASE_HOST');
  }
  if (rawConfig.port === undefined) {
    rawConfig.port = DEFAULT_PORTS[platform];
  }

  return validateConfig(definedOnly(rawConfig), 'database', DatabaseConfig);
}

/**
 * Database configuration factory
 */
export default registerAs('database', (): DatabaseConfig => loadDatabaseConfig());
