import { Platform } from '../common/types';
import type { TableName } from '../metadata/table-name';
import type { Value } from '../value/value';
import { FragmentBuilder, type SqlFragment } from '../wrapper/segment';
import { Dialect, IdStrategy } from './dialect';

/** Row-number column added by the ROWNUM envelope */
export const ORACLE_ROW_NUMBER_COLUMN = 'rn__';

export class OracleDialect extends Dialect {
  readonly platform = Platform.Oracle;
  readonly idStrategy = IdStrategy.ReturningInto;
  readonly maxBindParameters = 65535;

  /**
   * @param rownumPaging envelope queries in ROWNUM filters instead of 12c OFFSET / FETCH
   */
  constructor(private readonly rownumPaging = true) {
    super();
  }

  placeholder(index: number): string {
    return `:${index}`;
  }

  /**
   * Identifiers are upper-cased so quoted and unquoted references agree
   */
  quoteIdentifier(identifier: string): string {
    return `"${identifier.toUpperCase().replace(/"/g, '""')}"`;
  }

  applyPaging(sql: string, limit: number | undefined, offset: number | undefined): string {
    const skip = offset ?? 0;
    if (!this.rownumPaging) {
      const fetch = limit === undefined ? '' : ` FETCH NEXT ${limit} ROWS ONLY`;
      return `${sql} OFFSET ${skip} ROWS${fetch}`;
    }
    // The envelope is applied even when the query has its own ROWNUM; the inner query keeps its meaning
    const upper = limit === undefined ? '' : ` WHERE ROWNUM <= ${skip + limit}`;
    return `SELECT * FROM (SELECT t__.*, ROWNUM ${ORACLE_ROW_NUMBER_COLUMN} FROM (${sql}) t__${upper}) WHERE ${ORACLE_ROW_NUMBER_COLUMN} > ${skip}`;
  }

  /**
   * The out-bind placeholder is numbered after the values; the driver appends the bind itself
   */
  protected insertSuffixClause(returning: string | undefined): string {
    return returning ? ` RETURNING ${this.quoteIdentifier(returning)} INTO ?` : '';
  }

  /**
   * Oracle has no multi-row VALUES; several rows go through INSERT ALL
   */
  renderBatchInsert(table: TableName, columns: readonly string[], rows: readonly (readonly Value[])[], returning?: string): SqlFragment {
    if (rows.length === 1) {
      return super.renderBatchInsert(table, columns, rows, returning);
    }
    const target = `${this.tableReference(table, false)} (${this.quoteColumns(columns)})`;
    const builder = new FragmentBuilder().text('INSERT ALL');
    for (const row of rows) {
      builder.text(` INTO ${target} VALUES `);
      this.valuesTuple(builder, row);
    }
    return builder.text(' SELECT 1 FROM DUAL').build();
  }

  renderUpsert(table: TableName, columns: readonly string[], values: readonly Value[], keyColumns: readonly string[]): SqlFragment {
    return this.renderMerge(table, columns, values, keyColumns, ' FROM DUAL', '');
  }
}
