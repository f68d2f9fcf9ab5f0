import { Platform } from '../common/types';
import type { TableName } from '../metadata/table-name';
import type { Value } from '../value/value';
import type { SqlFragment } from '../wrapper/segment';
import { Dialect, IdStrategy } from './dialect';

export class SqliteDialect extends Dialect {
  readonly platform = Platform.SQLite;
  readonly idStrategy = IdStrategy.LastInsertId;
  // SQLITE_MAX_VARIABLE_NUMBER since 3.32
  readonly maxBindParameters = 32766;

  placeholder(): string {
    return '?';
  }

  quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  applyPaging(sql: string, limit: number | undefined, offset: number | undefined): string {
    if (limit === undefined) {
      return offset ? `${sql} LIMIT -1 OFFSET ${offset}` : sql;
    }
    return offset ? `${sql} LIMIT ${limit} OFFSET ${offset}` : `${sql} LIMIT ${limit}`;
  }

  renderUpsert(table: TableName, columns: readonly string[], values: readonly Value[], keyColumns: readonly string[]): SqlFragment {
    return this.renderOnConflict(table, columns, values, keyColumns);
  }
}
