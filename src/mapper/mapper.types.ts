import type { Dialect } from '../dialect/dialect';
import type { ExecutionPipeline } from '../execution/pipeline';
import type { IdentifierGenerator } from '../identifier/snowflake';
import { valueToText } from '../value/format';
import type { Value, ValueInput } from '../value/value';

/**
 * Primary key as handed back to callers
 */
export type EntityId = number | bigint | string;

/**
 * Parameters of a raw statement: positional for `?`, named for `:name`
 */
export type RawParams = readonly ValueInput[] | Readonly<Record<string, ValueInput>>;

/**
 * One page of results
 */
export interface IPage<E> {
  /** 1-based page number */
  current: number;
  size: number;
  total: number;
  records: E[];
}

/**
 * Everything a mapper needs besides a connection
 */
export interface MapperRuntime {
  readonly dialect: Dialect;
  readonly pipeline: ExecutionPipeline;
  readonly ids: IdentifierGenerator;
  /** Surface row conversion failures instead of keeping the field default */
  readonly strictConversion: boolean;
  readonly defaultBatchSize: number;
}

export function toEntityId(value: Value): EntityId | undefined {
  switch (value.kind) {
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Bigint':
      return value.value;
    case 'Float':
    case 'Double':
      return Number.isInteger(value.value) ? value.value : undefined;
    case 'BigDecimal':
      return /^-?\d+$/.test(value.value) ? BigInt(value.value) : value.value;
    case 'Null':
    case 'RawSql':
      return undefined;
    default:
      return valueToText(value);
  }
}

/**
 * Whether a key still needs to be assigned: absent, zero or empty
 */
export function isUnsetId(value: Value): boolean {
  switch (value.kind) {
    case 'Null':
      return true;
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Float':
    case 'Double':
      return value.value === 0;
    case 'Bigint':
      return value.value === 0n;
    case 'Char':
    case 'Text':
      return value.value === '';
    default:
      return false;
  }
}
