import type { Value } from '../value/value';
import type { Wrapper } from './wrapper';

export enum SqlKeyword {
  EQ = '=',
  NE = '<>',
  GT = '>',
  GE = '>=',
  LT = '<',
  LE = '<=',
  LIKE = 'LIKE',
  NOT_LIKE = 'NOT LIKE',
  LIKE_LEFT = 'LIKE_LEFT',
  LIKE_RIGHT = 'LIKE_RIGHT',
  IN = 'IN',
  NOT_IN = 'NOT IN',
  BETWEEN = 'BETWEEN',
  NOT_BETWEEN = 'NOT BETWEEN',
  IS_NULL = 'IS NULL',
  IS_NOT_NULL = 'IS NOT NULL',
}

export type Connector = 'AND' | 'OR';

export type SqlSegment =
  | { kind: 'condition'; connector: Connector; column: string; keyword: SqlKeyword; values: Value[] }
  | { kind: 'nested'; connector: Connector; wrapper: Wrapper }
  | { kind: 'exists'; connector: Connector; negated: boolean; sql: string; params: Value[] }
  | { kind: 'raw'; connector: Connector; sql: string; params: Value[] };

/**
 * Rendered SQL with `?` placeholders
 * `trusted` lists spliced RawSql expressions that came from values rather than raw fragments
 */
export interface SqlFragment {
  sql: string;
  params: Value[];
  trusted: string[];
}

export interface IdentifierQuoter {
  quoteIdentifier(identifier: string): string;
}

const SIMPLE_COLUMN = /^[A-Za-z_][\w$]*(\.[A-Za-z_][\w$]*)?$/;

/**
 * Quote plain `column` or `table.column` names; expressions pass through untouched
 */
export function quoteColumn(quoter: IdentifierQuoter, column: string): string {
  if (!SIMPLE_COLUMN.test(column)) {
    return column;
  }
  return column.split('.').map(part => quoter.quoteIdentifier(part)).join('.');
}

export class FragmentBuilder {
  private readonly parts: string[] = [];
  readonly params: Value[] = [];
  readonly trusted: string[] = [];

  text(sql: string): this {
    this.parts.push(sql);
    return this;
  }

  /**
   * A bound value, or its SQL text when it is RawSql
   */
  value(value: Value): this {
    if (value.kind === 'RawSql') {
      this.parts.push(value.sql);
      this.trusted.push(value.sql);
    } else {
      this.parts.push('?');
      this.params.push(value);
    }
    return this;
  }

  append(fragment: SqlFragment): this {
    this.parts.push(fragment.sql);
    this.params.push(...fragment.params);
    this.trusted.push(...fragment.trusted);
    return this;
  }

  build(): SqlFragment {
    return { sql: this.parts.join(''), params: [...this.params], trusted: [...this.trusted] };
  }
}

export function emptyFragment(): SqlFragment {
  return { sql: '', params: [], trusted: [] };
}
