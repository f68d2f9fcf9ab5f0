/**
 * Truncate data for logging to avoid huge log entries
 */
import { LogLevel } from '@nestjs/common';
import { MapperLogLevel } from './types';

const DEFAULT_TRUNCATE_LENGTH = 100;

export function truncateForLog(data: unknown, maxLength: number = DEFAULT_TRUNCATE_LENGTH): string {
  const str = typeof data === 'string'
    ? data
    : JSON.stringify(data, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)) ?? String(data);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + '...';
}

/**
 * Get enabled log levels based on minimum level.
 * NestJS uses cumulative log levels, so 'debug' includes error, warn, log, and debug.
 */
export function getLogLevels(minLevel: string = 'log'): LogLevel[] {
  const levels: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];
  const index = levels.findIndex(level => level === minLevel);
  return index >= 0 ? levels.slice(0, index + 1) : ['error', 'warn', 'log'];
}

const MAPPER_TO_NEST_LEVEL: Record<MapperLogLevel, LogLevel> = {
  [MapperLogLevel.Trace]: 'verbose',
  [MapperLogLevel.Debug]: 'debug',
  [MapperLogLevel.Info]: 'log',
  [MapperLogLevel.Warn]: 'warn',
  [MapperLogLevel.Error]: 'error',
};

/**
 * Nest logger method used for a mapper log level
 */
export function toNestLogLevel(level: MapperLogLevel): LogLevel {
  return MAPPER_TO_NEST_LEVEL[level];
}

/**
 * Parse a mapper log level name (trace, debug, info, warn, error), case-insensitive
 */
export function parseMapperLogLevel(name: string): MapperLogLevel | undefined {
  switch (name.trim().toLowerCase()) {
    case 'trace':
      return MapperLogLevel.Trace;
    case 'debug':
      return MapperLogLevel.Debug;
    case 'info':
      return MapperLogLevel.Info;
    case 'warn':
      return MapperLogLevel.Warn;
    case 'error':
      return MapperLogLevel.Error;
    default:
      return undefined;
  }
}
