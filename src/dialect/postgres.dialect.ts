import { Platform } from '../common/types';
import type { TableName } from '../metadata/table-name';
import type { Value } from '../value/value';
import type { SqlFragment } from '../wrapper/segment';
import { Dialect, IdStrategy } from './dialect';
import reservedKeywords from './postgres-reserved.json';

const RESERVED = new Set<string>(reservedKeywords);
const UNQUOTED_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;

export class PostgresDialect extends Dialect {
  readonly platform = Platform.Postgres;
  readonly idStrategy = IdStrategy.Returning;
  readonly maxBindParameters = 65535;

  placeholder(index: number): string {
    return `$${index}`;
  }

  /**
   * Quote only identifiers that would otherwise fold case or collide with a keyword
   */
  quoteIdentifier(identifier: string): string {
    if (UNQUOTED_IDENTIFIER.test(identifier) && !RESERVED.has(identifier)) {
      return identifier;
    }
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  applyPaging(sql: string, limit: number | undefined, offset: number | undefined): string {
    const limitClause = limit === undefined ? '' : ` LIMIT ${limit}`;
    const offsetClause = offset ? ` OFFSET ${offset}` : '';
    return `${sql}${limitClause}${offsetClause}`;
  }

  protected insertSuffixClause(returning: string | undefined): string {
    return returning ? ` RETURNING ${this.quoteIdentifier(returning)}` : '';
  }

  renderUpsert(table: TableName, columns: readonly string[], values: readonly Value[], keyColumns: readonly string[]): SqlFragment {
    return this.renderOnConflict(table, columns, values, keyColumns);
  }
}
