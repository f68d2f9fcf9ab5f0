import { Platform } from '../common/types';
import type { TableName } from '../metadata/table-name';
import type { Value } from '../value/value';
import type { SqlFragment } from '../wrapper/segment';
import { Dialect, IdStrategy } from './dialect';

export class MssqlDialect extends Dialect {
  readonly platform = Platform.MSSQL;
  readonly idStrategy = IdStrategy.Output;
  readonly maxBindParameters = 2100;

  placeholder(index: number): string {
    return `@p${index}`;
  }

  quoteIdentifier(identifier: string): string {
    return `[${identifier.replace(/]/g, ']]')}]`;
  }

  /**
   * TOP for a bare limit; OFFSET / FETCH otherwise, which requires an ORDER BY
   */
  applyPaging(sql: string, limit: number | undefined, offset: number | undefined, hasOrderBy: boolean): string {
    if (!offset) {
      if (limit === undefined) {
        return sql;
      }
      return sql.replace(/^SELECT(\s+DISTINCT)?/i, match => `${match} TOP (${limit})`);
    }
    const ordered = hasOrderBy ? sql : `${sql} ORDER BY (SELECT NULL)`;
    const fetch = limit === undefined ? '' : ` FETCH NEXT ${limit} ROWS ONLY`;
    return `${ordered} OFFSET ${offset} ROWS${fetch}`;
  }

  protected insertPrefixClause(returning: string | undefined): string {
    return returning ? ` OUTPUT INSERTED.${this.quoteIdentifier(returning)}` : '';
  }

  renderUpsert(table: TableName, columns: readonly string[], values: readonly Value[], keyColumns: readonly string[]): SqlFragment {
    return this.renderMerge(table, columns, values, keyColumns, '', ';');
  }
}
