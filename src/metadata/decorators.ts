import 'reflect-metadata';
import { InvalidArgumentError } from '../common/errors';
import { Converters, type Converter } from '../value/convert';
import { toValue, type ValueInput } from '../value/value';
import { IdentifierType, type FieldName, type FillMode } from './field-name';
import { TableName } from './table-name';

export const TABLE_METADATA = 'relmap:table';
export const FIELDS_METADATA = 'relmap:fields';

export interface TableOptions {
  name?: string;
  schema?: string;
  alias?: string;
  /** Interceptors that never run for statements on this table */
  ignoreInterceptors?: string[];
}

export interface TableFieldOptions {
  /** Column name; defaults to the property name */
  name?: string;
  exist?: boolean;
  select?: boolean;
  fill?: { mode: FillMode; value: ValueInput };
  converter?: Converter<unknown>;
}

export interface TableIdOptions extends Omit<TableFieldOptions, 'exist' | 'fill'> {
  type?: IdentifierType;
}

/**
 * Default converter for a property, chosen from its emitted design type
 */
function converterFor(designType: unknown): Converter<unknown> {
  switch (designType) {
    case Number:
      return Converters.number;
    case String:
      return Converters.string;
    case Boolean:
      return Converters.bool;
    case BigInt:
      return Converters.bigint;
    case Date:
      return Converters.timestamp;
    case Map:
      return Converters.object;
    case Uint8Array:
    case Buffer:
      return Converters.blob;
    default:
      return Converters.auto;
  }
}

function isFieldName(entry: unknown): entry is FieldName {
  return typeof entry === 'object' && entry !== null && 'name' in entry && 'fieldType' in entry;
}

/**
 * Fields declared on a class and its ancestors, in declaration order
 */
export function readFieldMetadata(target: object): FieldName[] {
  const stored: unknown = Reflect.getMetadata(FIELDS_METADATA, target);
  return Array.isArray(stored) ? stored.filter(isFieldName) : [];
}

export function readTableMetadata(target: object): TableName | undefined {
  const stored: unknown = Reflect.getMetadata(TABLE_METADATA, target);
  return stored instanceof TableName ? stored : undefined;
}

function defineField(target: object, field: FieldName): void {
  const owner = target.constructor;
  const fields = readFieldMetadata(owner).filter(existing => existing.name !== field.name);
  Reflect.defineMetadata(FIELDS_METADATA, [...fields, field], owner);
}

function propertyName(propertyKey: string | symbol): string {
  if (typeof propertyKey === 'symbol') {
    throw new TypeError(`Entity fields must have string keys, got ${propertyKey.toString()}`);
  }
  return propertyKey;
}

/**
 * Mark a class as an entity stored in `name` (default: the class name in snake_case)
 */
export function Table(nameOrOptions: string | TableOptions = {}): ClassDecorator {
  const options = typeof nameOrOptions === 'string' ? { name: nameOrOptions } : nameOrOptions;
  return target => {
    const parsed = options.name ? TableName.parse(options.name) : new TableName(toSnakeCase(target.name));
    const table = new TableName(
      parsed.name,
      options.schema ?? parsed.schema,
      options.alias ?? parsed.alias,
      options.ignoreInterceptors ?? [],
    );
    Reflect.defineMetadata(TABLE_METADATA, table, target);
  };
}

// snowflake ids pass 2^53 and cannot be held exactly by these
const INEXACT_ID_CONVERTERS: ReadonlySet<string> = new Set(['tinyint', 'smallint', 'int', 'number', 'float', 'double']);

/**
 * Primary key column
 */
export function TableId(options: TableIdOptions = {}): PropertyDecorator {
  return (target, propertyKey) => {
    const name = propertyName(propertyKey);
    const idType = options.type ?? IdentifierType.Auto;
    const converter = options.converter ?? converterFor(Reflect.getMetadata('design:type', target, propertyKey));
    if (idType === IdentifierType.AssignId && INEXACT_ID_CONVERTERS.has(converter.name)) {
      throw new InvalidArgumentError(
        `${target.constructor.name}.${name}: AssignId keys need a bigint or string property, not ${converter.name}`,
      );
    }
    defineField(target, {
      name,
      alias: options.name && options.name !== name ? options.name : undefined,
      exist: true,
      select: options.select ?? true,
      fieldType: { kind: 'TableId', idType },
      converter,
    });
  };
}

/**
 * Regular column; `exist: false` keeps the property out of every statement
 */
export function TableField(options: TableFieldOptions = {}): PropertyDecorator {
  return (target, propertyKey) => {
    const name = propertyName(propertyKey);
    defineField(target, {
      name,
      alias: options.name && options.name !== name ? options.name : undefined,
      exist: options.exist ?? true,
      select: options.select ?? true,
      fill: options.fill ? { mode: options.fill.mode, value: toValue(options.fill.value) } : undefined,
      fieldType: { kind: 'TableField' },
      converter: options.converter ?? converterFor(Reflect.getMetadata('design:type', target, propertyKey)),
    });
  };
}

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}
