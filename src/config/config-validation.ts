import { validateSync, type ValidationError } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';
import { ConfigError } from '../common/errors';

const logger = new Logger('ConfigValidation');

function describeErrors(errors: ValidationError[]): string {
  return errors
    .map(error => Object.values(error.constraints ?? {}).join(', '))
    .join('; ');
}

/**
 * Convert a plain object into the validation class and check its decorators
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  envVariablesKey: string,
  validationClass: new () => T,
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
    exposeDefaultValues: true,
  });
  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    logger.error(`Configuration validation failed for ${envVariablesKey}`);
    throw new ConfigError(`Invalid configuration for ${envVariablesKey}: ${describeErrors(errors)}`);
  }

  return validatedConfig;
}

/**
 * Drop keys whose value is undefined so class defaults apply
 */
export function definedOnly(config: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config).filter(([, value]) => value !== undefined));
}

/**
 * Parse a boolean environment flag; unset yields undefined
 */
export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new ConfigError(`Invalid boolean flag: '${value}'`);
  }
}
