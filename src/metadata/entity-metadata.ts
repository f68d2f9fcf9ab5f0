import { Logger } from '@nestjs/common';
import { MissingFieldError, MissingTableError } from '../common/errors';
import type { Row } from '../data/row';
import { Converters } from '../value/convert';
import { Value, type ObjectValue } from '../value/value';
import { readFieldMetadata, readTableMetadata } from './decorators';
import { columnOf, isIdField, type FieldName } from './field-name';
import type { TableName } from './table-name';

/**
 * Entity class with a no-argument constructor
 */
export type EntityClass<E extends object = object> = new () => E;

const logger = new Logger('EntityMetadata');

/**
 * Table and field metadata of one entity class
 */
export interface EntityMetadata {
  /** Class name, used in logs and error messages */
  type: string;
  table: TableName;
  fields: FieldName[];
  idField?: FieldName;
}

const metadataCache = new WeakMap<object, EntityMetadata>();

function describe(target: object, type: string): EntityMetadata {
  const cached = metadataCache.get(target);
  if (cached) {
    return cached;
  }
  const table = readTableMetadata(target);
  if (!table) {
    throw new MissingTableError(`${type} is not decorated with @Table`);
  }
  const declared = readFieldMetadata(target);
  if (declared.length === 0) {
    throw new MissingFieldError(`${type} declares no @TableId or @TableField properties`);
  }
  const fields = declared.map(field => ({ ...field, table: table.name }));
  const metadata: EntityMetadata = { type, table, fields, idField: fields.find(isIdField) };
  metadataCache.set(target, metadata);
  return metadata;
}

export function describeEntity(entity: EntityClass): EntityMetadata {
  return describe(entity, entity.name);
}

/**
 * Metadata of the class an entity instance was constructed from
 */
export function describeInstance(entity: object): EntityMetadata {
  return describe(entity.constructor, entity.constructor.name);
}

export function getTableName(entity: EntityClass): TableName {
  return describeEntity(entity).table;
}

export function getFields(entity: EntityClass): FieldName[] {
  return describeEntity(entity).fields;
}

export function getIdField(entity: EntityClass): FieldName | undefined {
  return describeEntity(entity).idField;
}

export function requireIdField(metadata: EntityMetadata): FieldName {
  if (!metadata.idField) {
    throw new MissingFieldError(`${metadata.type} has no @TableId property`);
  }
  return metadata.idField;
}

export function readProperty(entity: object, field: FieldName): unknown {
  return Reflect.get(entity, field.name);
}

export function writeProperty(entity: object, field: FieldName, value: unknown): void {
  Reflect.set(entity, field.name, value);
}

/**
 * Property value as a Value; null and undefined become Null
 */
export function fieldValue(entity: object, field: FieldName): Value {
  const raw = readProperty(entity, field);
  return raw === null || raw === undefined ? Value.null() : field.converter.toValue(raw);
}

/**
 * Object value keyed by column for every persisted field
 */
export function entityToValue(entity: object, fields: FieldName[]): ObjectValue {
  return Value.object(
    fields.filter(field => field.exist).map((field): [string, Value] => [columnOf(field), fieldValue(entity, field)]),
  );
}

/**
 * Materialize one row; columns the row lacks leave the property at its constructor default
 * In lax mode a failed conversion also keeps the default and logs a warning
 */
export function rowToEntity<E extends object>(entity: EntityClass<E>, fields: FieldName[], row: Row, strict: boolean): E {
  const target = new entity();
  for (const field of fields) {
    if (!field.exist || !field.select) {
      continue;
    }
    const value = row.findValue(columnOf(field)) ?? row.findValue(field.name);
    if (value === undefined) {
      continue;
    }
    if (value.kind === 'Null') {
      writeProperty(target, field, null);
      continue;
    }
    const result = field.converter.fromValueOpt(value);
    if (result.ok) {
      writeProperty(target, field, result.value);
    } else if (strict) {
      throw result.error;
    } else {
      logger.warn(`Failed to convert column '${columnOf(field)}' of ${entity.name}: ${result.error.message}`);
    }
  }
  return target;
}

/**
 * Plain record view of a row, used by raw queries without an entity
 */
export function rowToRecord(row: Row): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  row.columns.forEach((column, i) => {
    record[column] = Converters.auto.fromValue(row.data[i]);
  });
  return record;
}
