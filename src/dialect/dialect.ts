import { InvalidArgumentError } from '../common/errors';
import type { Platform } from '../common/types';
import type { TableName } from '../metadata/table-name';
import { toValue, type Value, type ValueInput } from '../value/value';
import { FragmentBuilder, quoteColumn, type IdentifierQuoter, type SqlFragment } from '../wrapper/segment';
import type { Wrapper } from '../wrapper/wrapper';

/**
 * How a backend reports generated keys after INSERT
 */
export enum IdStrategy {
  /** Driver reports the last generated id (MySQL, SQLite) */
  LastInsertId = 'LastInsertId',
  /** INSERT ... RETURNING id (Postgres) */
  Returning = 'Returning',
  /** INSERT ... RETURNING id INTO :out (Oracle) */
  ReturningInto = 'ReturningInto',
  /** INSERT ... OUTPUT INSERTED.id (SQL Server) */
  Output = 'Output',
}

type ScanState = 'code' | 'single' | 'double' | 'backtick' | 'line-comment' | 'block-comment';

/**
 * Walk `sql` and hand every character outside quotes and comments to `onCode`
 * Returning a string from `onCode` replaces the character(s) it consumed
 */
export function scanSql(sql: string, onCode: (sql: string, index: number) => { text: string; consumed: number } | undefined): string {
  let out = '';
  let state: ScanState = 'code';
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];
    switch (state) {
      case 'code': {
        if (ch === "'") {
          state = 'single';
        } else if (ch === '"') {
          state = 'double';
        } else if (ch === '`') {
          state = 'backtick';
        } else if (ch === '-' && next === '-') {
          state = 'line-comment';
        } else if (ch === '/' && next === '*') {
          state = 'block-comment';
          out += '/*';
          i += 2;
          continue;
        } else {
          const replaced = onCode(sql, i);
          if (replaced) {
            out += replaced.text;
            i += replaced.consumed;
            continue;
          }
        }
        break;
      }
      case 'single':
        if (ch === "'") {
          if (next === "'") {
            out += "''";
            i += 2;
            continue;
          }
          state = 'code';
        }
        break;
      case 'double':
        if (ch === '"') {
          state = 'code';
        }
        break;
      case 'backtick':
        if (ch === '`') {
          state = 'code';
        }
        break;
      case 'line-comment':
        if (ch === '\n') {
          state = 'code';
        }
        break;
      case 'block-comment':
        if (ch === '*' && next === '/') {
          out += '*/';
          i += 2;
          state = 'code';
          continue;
        }
        break;
    }
    out += ch;
    i += 1;
  }
  return out;
}

const NAMED_PARAMETER = /^:([A-Za-z_]\w*)/;

/**
 * Backend-specific SQL emission
 * Statements are assembled with `?` placeholders; processPlaceholders rewrites them last
 */
export abstract class Dialect implements IdentifierQuoter {
  abstract readonly platform: Platform;
  abstract readonly idStrategy: IdStrategy;
  /** Upper bound on bind parameters in one statement */
  abstract readonly maxBindParameters: number;

  /**
   * Placeholder for the 1-based parameter `index`
   */
  abstract placeholder(index: number): string;

  abstract quoteIdentifier(identifier: string): string;

  /**
   * Apply LIMIT / OFFSET to a finished SELECT
   */
  abstract applyPaging(sql: string, limit: number | undefined, offset: number | undefined, hasOrderBy: boolean): string;

  currentTimestamp(): string {
    return 'CURRENT_TIMESTAMP';
  }

  /**
   * Rewrite `?` placeholders outside literals and comments to this dialect's style
   */
  processPlaceholders(sql: string): string {
    let index = 0;
    return scanSql(sql, (text, i) => {
      if (text[i] !== '?') {
        return undefined;
      }
      index += 1;
      return { text: this.placeholder(index), consumed: 1 };
    });
  }

  /**
   * Replace `:name` references with positional placeholders and order the values to match
   */
  bindNamedParameters(sql: string, named: Record<string, ValueInput>): { sql: string; params: Value[] } {
    const params: Value[] = [];
    const positional = scanSql(sql, (text, i) => {
      if (text[i] !== ':' || text[i - 1] === ':' || text[i + 1] === ':') {
        return undefined;
      }
      const match = NAMED_PARAMETER.exec(text.slice(i));
      if (!match) {
        return undefined;
      }
      const name = match[1];
      if (!Object.prototype.hasOwnProperty.call(named, name)) {
        throw new InvalidArgumentError(`Missing value for named parameter ':${name}'`);
      }
      params.push(toValue(named[name]));
      return { text: '?', consumed: match[0].length };
    });
    return { sql: this.processPlaceholders(positional), params };
  }

  tableReference(table: TableName, withAlias = true): string {
    const name = table.schema
      ? `${this.quoteIdentifier(table.schema)}.${this.quoteIdentifier(table.name)}`
      : this.quoteIdentifier(table.name);
    return withAlias && table.alias ? `${name} ${table.alias}` : name;
  }

  quoteColumns(columns: readonly string[]): string {
    return columns.map(column => quoteColumn(this, column)).join(', ');
  }

  /**
   * Effective table: the wrapper's override when it names one, else the entity table with the wrapper alias
   */
  resolveTable(table: TableName, wrapper: Wrapper): TableName {
    const override = wrapper.tableName;
    if (!override) {
      return table;
    }
    if (override.name) {
      return override;
    }
    return table.withAlias(override.alias);
  }

  whereClause(wrapper: Wrapper): SqlFragment {
    const where = wrapper.renderWhere(this);
    return where.sql ? { ...where, sql: ` WHERE ${where.sql}` } : where;
  }

  /**
   * SELECT without paging: projection, joins, predicates, grouping, having and ordering
   */
  protected renderQuery(table: TableName, columns: readonly string[], wrapper: Wrapper, ordered: boolean): SqlFragment {
    const projection = wrapper.renderSelectList(this) ?? (columns.length > 0 ? this.quoteColumns(columns) : '*');
    return new FragmentBuilder()
      .text(`SELECT ${wrapper.isDistinct ? 'DISTINCT ' : ''}${projection} FROM ${this.tableReference(this.resolveTable(table, wrapper))}`)
      .append(wrapper.renderJoins())
      .append(this.whereClause(wrapper))
      .text(wrapper.renderGroupBy(this))
      .append(wrapper.renderHaving())
      .text(ordered ? wrapper.renderOrderBy(this) : '')
      .build();
  }

  renderSelect(table: TableName, columns: readonly string[], wrapper: Wrapper): SqlFragment {
    const query = this.renderQuery(table, columns, wrapper, true);
    let sql = query.sql;
    if (wrapper.limitCount !== undefined || wrapper.offsetCount !== undefined) {
      sql = this.applyPaging(sql, wrapper.limitCount, wrapper.offsetCount, wrapper.orderings.length > 0);
    }
    if (wrapper.lastClause) {
      sql = `${sql} ${wrapper.lastClause}`;
    }
    return { ...query, sql };
  }

  /**
   * COUNT over the same FROM / WHERE / GROUP / HAVING; grouped or distinct queries are wrapped
   */
  renderCount(table: TableName, wrapper: Wrapper): SqlFragment {
    if (wrapper.groupings.length > 0 || wrapper.isDistinct) {
      const inner = this.renderQuery(table, wrapper.groupings, wrapper, false);
      return { ...inner, sql: `SELECT COUNT(*) FROM (${inner.sql}) t_count` };
    }
    return new FragmentBuilder()
      .text(`SELECT COUNT(*) FROM ${this.tableReference(this.resolveTable(table, wrapper))}`)
      .append(wrapper.renderJoins())
      .append(this.whereClause(wrapper))
      .build();
  }

  protected valuesTuple(builder: FragmentBuilder, values: readonly Value[]): FragmentBuilder {
    builder.text('(');
    values.forEach((value, i) => {
      if (i > 0) {
        builder.text(', ');
      }
      builder.value(value);
    });
    return builder.text(')');
  }

  /**
   * Clause placed between the column list and VALUES (SQL Server OUTPUT)
   */
  protected insertPrefixClause(_returning: string | undefined): string {
    return '';
  }

  /**
   * Clause appended after VALUES (RETURNING variants)
   */
  protected insertSuffixClause(_returning: string | undefined): string {
    return '';
  }

  renderInsert(table: TableName, columns: readonly string[], values: readonly Value[], returning?: string): SqlFragment {
    return this.renderBatchInsert(table, columns, [values], returning);
  }

  renderBatchInsert(table: TableName, columns: readonly string[], rows: readonly (readonly Value[])[], returning?: string): SqlFragment {
    if (rows.length === 0) {
      throw new InvalidArgumentError('Cannot render an INSERT without rows');
    }
    const builder = new FragmentBuilder()
      .text(`INSERT INTO ${this.tableReference(table, false)} (${this.quoteColumns(columns)})${this.insertPrefixClause(returning)} VALUES `);
    rows.forEach((row, i) => {
      if (i > 0) {
        builder.text(', ');
      }
      this.valuesTuple(builder, row);
    });
    return builder.text(this.insertSuffixClause(returning)).build();
  }

  renderUpdate(table: TableName, sets: SqlFragment, where: SqlFragment): SqlFragment {
    return new FragmentBuilder()
      .text(`UPDATE ${this.tableReference(table, false)} SET `)
      .append(sets)
      .append(where)
      .build();
  }

  renderDelete(table: TableName, where: SqlFragment): SqlFragment {
    return new FragmentBuilder()
      .text(`DELETE FROM ${this.tableReference(table, false)}`)
      .append(where)
      .build();
  }

  /**
   * Insert, or update the non-key columns when a row with the same key exists
   */
  abstract renderUpsert(table: TableName, columns: readonly string[], values: readonly Value[], keyColumns: readonly string[]): SqlFragment;

  /**
   * Rows per multi-row INSERT given the column count and the configured batch size
   */
  batchChunkSize(columnCount: number, batchSize: number): number {
    const byParameters = Math.floor(this.maxBindParameters / Math.max(columnCount, 1));
    return Math.max(1, Math.min(batchSize, byParameters));
  }

  /**
   * `INSERT ... ON CONFLICT` upsert shared by Postgres and SQLite
   */
  protected renderOnConflict(
    table: TableName,
    columns: readonly string[],
    values: readonly Value[],
    keyColumns: readonly string[],
  ): SqlFragment {
    const insert = this.renderInsert(table, columns, values);
    const updates = columns.filter(column => !keyColumns.includes(column));
    const action = updates.length > 0
      ? `DO UPDATE SET ${updates.map(c => `${this.quoteIdentifier(c)} = EXCLUDED.${this.quoteIdentifier(c)}`).join(', ')}`
      : 'DO NOTHING';
    return { ...insert, sql: `${insert.sql} ON CONFLICT (${this.quoteColumns(keyColumns)}) ${action}` };
  }

  /**
   * MERGE-based upsert shared by Oracle and SQL Server
   */
  protected renderMerge(
    table: TableName,
    columns: readonly string[],
    values: readonly Value[],
    keyColumns: readonly string[],
    sourceSuffix: string,
    terminator: string,
  ): SqlFragment {
    const target = this.tableReference(table, false);
    const builder = new FragmentBuilder().text(`MERGE INTO ${target} t USING (SELECT `);
    columns.forEach((column, i) => {
      if (i > 0) {
        builder.text(', ');
      }
      builder.value(values[i]).text(` ${this.quoteIdentifier(column)}`);
    });
    const on = keyColumns.map(key => `t.${this.quoteIdentifier(key)} = s.${this.quoteIdentifier(key)}`).join(' AND ');
    const updates = columns.filter(column => !keyColumns.includes(column));
    builder.text(`${sourceSuffix}) s ON (${on})`);
    if (updates.length > 0) {
      builder.text(` WHEN MATCHED THEN UPDATE SET ${updates.map(c => `t.${this.quoteIdentifier(c)} = s.${this.quoteIdentifier(c)}`).join(', ')}`);
    }
    builder.text(
      ` WHEN NOT MATCHED THEN INSERT (${this.quoteColumns(columns)}) VALUES (${columns.map(c => `s.${this.quoteIdentifier(c)}`).join(', ')})${terminator}`,
    );
    return builder.build();
  }
}
