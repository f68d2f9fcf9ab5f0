import { Platform } from '../common/types';
import type { TableName } from '../metadata/table-name';
import type { Value } from '../value/value';
import type { SqlFragment } from '../wrapper/segment';
import { Dialect, IdStrategy } from './dialect';

// Largest LIMIT MySQL accepts; used when only an offset is given
const MAX_ROWS = '18446744073709551615';

export class MySqlDialect extends Dialect {
  readonly platform = Platform.MySQL;
  readonly idStrategy = IdStrategy.LastInsertId;
  readonly maxBindParameters = 65535;

  placeholder(): string {
    return '?';
  }

  quoteIdentifier(identifier: string): string {
    return `\`${identifier.replace(/`/g, '``')}\``;
  }

  applyPaging(sql: string, limit: number | undefined, offset: number | undefined): string {
    if (limit === undefined) {
      return offset ? `${sql} LIMIT ${MAX_ROWS} OFFSET ${offset}` : sql;
    }
    return offset ? `${sql} LIMIT ${limit} OFFSET ${offset}` : `${sql} LIMIT ${limit}`;
  }

  renderUpsert(table: TableName, columns: readonly string[], values: readonly Value[], keyColumns: readonly string[]): SqlFragment {
    const insert = this.renderInsert(table, columns, values);
    const updates = columns.filter(column => !keyColumns.includes(column));
    const assignments = (updates.length > 0 ? updates : keyColumns.slice(0, 1))
      .map(column => `${this.quoteIdentifier(column)} = VALUES(${this.quoteIdentifier(column)})`)
      .join(', ');
    return { ...insert, sql: `${insert.sql} ON DUPLICATE KEY UPDATE ${assignments}` };
  }
}
