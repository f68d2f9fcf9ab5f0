import type { Converter } from '../value/convert';
import type { Value } from '../value/value';

export enum IdentifierType {
  /** Generated by the database */
  Auto = 'Auto',
  /** Supplied by the caller */
  Input = 'Input',
  /** Snowflake id */
  AssignId = 'AssignId',
  /** Hyphen-less UUID */
  AssignUuid = 'AssignUuid',
}

export type FieldType =
  | { kind: 'TableId'; idType: IdentifierType }
  | { kind: 'TableField' };

export type FillMode = 'insert' | 'update' | 'always';

/**
 * Value written automatically on insert and/or update; RawSql values are spliced verbatim
 */
export interface Fill {
  mode: FillMode;
  value: Value;
}

/**
 * Column metadata of one entity property
 */
export interface FieldName {
  /** Property name on the entity */
  name: string;
  table?: string;
  /** Column name when it differs from the property */
  alias?: string;
  exist: boolean;
  select: boolean;
  fill?: Fill;
  fieldType: FieldType;
  converter: Converter<unknown>;
}

export function columnOf(field: FieldName): string {
  return field.alias ?? field.name;
}

export function isIdField(field: FieldName): field is FieldName & { fieldType: { kind: 'TableId'; idType: IdentifierType } } {
  return field.fieldType.kind === 'TableId';
}

export function idTypeOf(field: FieldName): IdentifierType | undefined {
  return field.fieldType.kind === 'TableId' ? field.fieldType.idType : undefined;
}

/**
 * Whether the field's fill rule fires for the given statement kind
 */
export function fillApplies(field: FieldName, phase: 'insert' | 'update'): boolean {
  return field.fill !== undefined && (field.fill.mode === 'always' || field.fill.mode === phase);
}
