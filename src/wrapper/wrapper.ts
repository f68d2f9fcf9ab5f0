import { InvalidArgumentError } from '../common/errors';
import { TableName } from '../metadata/table-name';
import { Value, isEmptyValue, toValue, type ValueInput } from '../value/value';
import { valueToText } from '../value/format';
import {
  FragmentBuilder,
  SqlKeyword,
  emptyFragment,
  quoteColumn,
  type Connector,
  type IdentifierQuoter,
  type SqlFragment,
  type SqlSegment,
} from './segment';

export type OrderDirection = 'ASC' | 'DESC';
export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL';

export interface OrderBy {
  column: string;
  direction: OrderDirection;
}

export interface Join {
  type: JoinType;
  table: string;
  on: string;
  params: Value[];
}

export interface Assignment {
  column: string;
  value: Value;
}

/**
 * Query builder: predicates, projection, grouping, ordering, paging and UPDATE assignments
 * Conditions on Null, empty text or empty lists are dropped; IS NULL / IS NOT NULL always render
 */
export class Wrapper {
  private tableOverride?: TableName;
  private selects: string[] = [];
  private distinct = false;
  private segments: SqlSegment[] = [];
  private joins: Join[] = [];
  private groupColumns: string[] = [];
  private havingFragments: { sql: string; params: Value[] }[] = [];
  private orders: OrderBy[] = [];
  private limitValue?: number;
  private offsetValue?: number;
  private assignments: Assignment[] = [];
  private lastSql?: string;
  private pendingConnector: Connector = 'AND';
  private skipNextCall = false;
  private emptyAllowed = false;

  static create(): Wrapper {
    return new Wrapper();
  }

  // ---- table and projection ----

  table(name: string | TableName): this {
    if (this.accept()) {
      this.tableOverride = typeof name === 'string' ? TableName.parse(name) : name;
    }
    return this;
  }

  alias(alias: string): this {
    if (this.accept()) {
      const base = this.tableOverride;
      this.tableOverride = base
        ? new TableName(base.name, base.schema, alias, base.ignoreInterceptors)
        : new TableName('', undefined, alias);
    }
    return this;
  }

  select(...columns: string[]): this {
    if (this.accept()) {
      this.selects.push(...columns);
    }
    return this;
  }

  selectDistinct(...columns: string[]): this {
    if (this.accept()) {
      this.distinct = true;
      this.selects.push(...columns);
    }
    return this;
  }

  // ---- comparisons ----

  eq(column: string, value: ValueInput): this {
    return this.compare(column, SqlKeyword.EQ, value);
  }

  ne(column: string, value: ValueInput): this {
    return this.compare(column, SqlKeyword.NE, value);
  }

  gt(column: string, value: ValueInput): this {
    return this.compare(column, SqlKeyword.GT, value);
  }

  ge(column: string, value: ValueInput): this {
    return this.compare(column, SqlKeyword.GE, value);
  }

  lt(column: string, value: ValueInput): this {
    return this.compare(column, SqlKeyword.LT, value);
  }

  le(column: string, value: ValueInput): this {
    return this.compare(column, SqlKeyword.LE, value);
  }

  like(column: string, value: ValueInput): this {
    return this.pattern(column, SqlKeyword.LIKE, value, text => `%${text}%`);
  }

  notLike(column: string, value: ValueInput): this {
    return this.pattern(column, SqlKeyword.NOT_LIKE, value, text => `%${text}%`);
  }

  /** Matches values ending with `value` */
  likeLeft(column: string, value: ValueInput): this {
    return this.pattern(column, SqlKeyword.LIKE_LEFT, value, text => `%${text}`);
  }

  /** Matches values starting with `value` */
  likeRight(column: string, value: ValueInput): this {
    return this.pattern(column, SqlKeyword.LIKE_RIGHT, value, text => `${text}%`);
  }

  in(column: string, values: ValueInput[] | Value): this {
    return this.membership(column, SqlKeyword.IN, values);
  }

  notIn(column: string, values: ValueInput[] | Value): this {
    return this.membership(column, SqlKeyword.NOT_IN, values);
  }

  between(column: string, from: ValueInput, to: ValueInput): this {
    return this.range(column, SqlKeyword.BETWEEN, from, to);
  }

  notBetween(column: string, from: ValueInput, to: ValueInput): this {
    return this.range(column, SqlKeyword.NOT_BETWEEN, from, to);
  }

  isNull(column: string): this {
    return this.condition(column, SqlKeyword.IS_NULL, []);
  }

  isNotNull(column: string): this {
    return this.condition(column, SqlKeyword.IS_NOT_NULL, []);
  }

  // ---- grouping and connectors ----

  /**
   * Without an argument the next predicate joins with OR; with one, the group is OR-ed in
   */
  or(group?: (wrapper: Wrapper) => void): this {
    if (!this.accept()) {
      return this;
    }
    if (!group) {
      this.pendingConnector = 'OR';
      return this;
    }
    this.pendingConnector = 'OR';
    return this.pushNested(group);
  }

  and(group: (wrapper: Wrapper) => void): this {
    if (!this.accept()) {
      return this;
    }
    this.pendingConnector = 'AND';
    return this.pushNested(group);
  }

  /**
   * Parenthesized group joined with the pending connector
   */
  nested(group: (wrapper: Wrapper) => void): this {
    if (!this.accept()) {
      return this;
    }
    return this.pushNested(group);
  }

  exists(subquery: string, ...params: ValueInput[]): this {
    return this.pushExists(false, subquery, params);
  }

  notExists(subquery: string, ...params: ValueInput[]): this {
    return this.pushExists(true, subquery, params);
  }

  /**
   * Verbatim predicate with `?` placeholders; the fragment is not escaped
   */
  raw(fragment: string, ...params: ValueInput[]): this {
    if (!this.accept()) {
      return this;
    }
    if (fragment.trim() === '') {
      this.pendingConnector = 'AND';
      return this;
    }
    this.segments.push({ kind: 'raw', connector: this.takeConnector(), sql: fragment, params: params.map(toValue) });
    return this;
  }

  apply(fragment: string, ...params: ValueInput[]): this {
    return this.raw(fragment, ...params);
  }

  // ---- joins, grouping, ordering, paging ----

  innerJoin(table: string, on: string, ...params: ValueInput[]): this {
    return this.join('INNER', table, on, params);
  }

  leftJoin(table: string, on: string, ...params: ValueInput[]): this {
    return this.join('LEFT', table, on, params);
  }

  rightJoin(table: string, on: string, ...params: ValueInput[]): this {
    return this.join('RIGHT', table, on, params);
  }

  fullJoin(table: string, on: string, ...params: ValueInput[]): this {
    return this.join('FULL', table, on, params);
  }

  groupBy(...columns: string[]): this {
    if (this.accept()) {
      this.groupColumns.push(...columns);
    }
    return this;
  }

  having(sql: string, ...params: ValueInput[]): this {
    if (this.accept()) {
      this.havingFragments.push({ sql, params: params.map(toValue) });
    }
    return this;
  }

  orderByAsc(...columns: string[]): this {
    return this.orderBy('ASC', columns);
  }

  orderByDesc(...columns: string[]): this {
    return this.orderBy('DESC', columns);
  }

  limit(limit: number): this {
    if (this.accept()) {
      this.limitValue = nonNegative('limit', limit);
    }
    return this;
  }

  offset(offset: number): this {
    if (this.accept()) {
      this.offsetValue = nonNegative('offset', offset);
    }
    return this;
  }

  /**
   * 1-based page of `size` rows
   */
  page(page: number, size: number): this {
    if (!this.accept()) {
      return this;
    }
    if (!Number.isInteger(page) || page < 1) {
      throw new InvalidArgumentError(`page must be >= 1, got ${page}`);
    }
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidArgumentError(`size must be >= 1, got ${size}`);
    }
    this.limitValue = size;
    this.offsetValue = (page - 1) * size;
    return this;
  }

  /**
   * Append SQL after every other clause, e.g. `FOR UPDATE`
   */
  last(sql: string): this {
    if (this.accept()) {
      this.lastSql = sql;
    }
    return this;
  }

  // ---- update assignments ----

  set(column: string, value: ValueInput): this {
    if (this.accept()) {
      this.assignments.push({ column, value: toValue(value) });
    }
    return this;
  }

  setMultiple(values: AssignmentInput): this {
    if (!this.accept()) {
      return this;
    }
    const entries = isEntryIterable(values) ? Array.from(values) : Object.entries(values);
    for (const [column, value] of entries) {
      this.assignments.push({ column, value: toValue(value) });
    }
    return this;
  }

  // ---- flow control ----

  /**
   * Apply the next builder call only when `condition` holds
   */
  when(condition: boolean): this {
    this.skipNextCall = !condition;
    return this;
  }

  unless(condition: boolean): this {
    this.skipNextCall = condition;
    return this;
  }

  skipNext(): this {
    this.skipNextCall = true;
    return this;
  }

  /**
   * Permit UPDATE / DELETE without predicates
   */
  allowEmpty(allow = true): this {
    this.emptyAllowed = allow;
    return this;
  }

  clone(): Wrapper {
    const copy = new Wrapper();
    copy.tableOverride = this.tableOverride;
    copy.selects = [...this.selects];
    copy.distinct = this.distinct;
    copy.segments = this.segments.map(segment =>
      segment.kind === 'nested' ? { ...segment, wrapper: segment.wrapper.clone() } : { ...segment },
    );
    copy.joins = this.joins.map(join => ({ ...join, params: [...join.params] }));
    copy.groupColumns = [...this.groupColumns];
    copy.havingFragments = this.havingFragments.map(h => ({ ...h, params: [...h.params] }));
    copy.orders = this.orders.map(order => ({ ...order }));
    copy.limitValue = this.limitValue;
    copy.offsetValue = this.offsetValue;
    copy.assignments = this.assignments.map(a => ({ ...a }));
    copy.lastSql = this.lastSql;
    copy.pendingConnector = this.pendingConnector;
    copy.skipNextCall = this.skipNextCall;
    copy.emptyAllowed = this.emptyAllowed;
    return copy;
  }

  /**
   * Copy without ORDER BY, LIMIT and OFFSET; the shape counted by page()
   */
  withoutPaging(): Wrapper {
    const copy = this.clone();
    copy.orders = [];
    copy.limitValue = undefined;
    copy.offsetValue = undefined;
    copy.lastSql = undefined;
    return copy;
  }

  // ---- inspection ----

  get tableName(): TableName | undefined {
    return this.tableOverride;
  }

  get selectColumns(): readonly string[] {
    return this.selects;
  }

  get isDistinct(): boolean {
    return this.distinct;
  }

  get limitCount(): number | undefined {
    return this.limitValue;
  }

  get offsetCount(): number | undefined {
    return this.offsetValue;
  }

  get orderings(): readonly OrderBy[] {
    return this.orders;
  }

  get groupings(): readonly string[] {
    return this.groupColumns;
  }

  get updates(): readonly Assignment[] {
    return this.assignments;
  }

  get lastClause(): string | undefined {
    return this.lastSql;
  }

  get isEmptyAllowed(): boolean {
    return this.emptyAllowed;
  }

  hasPredicates(): boolean {
    return this.segments.some(segment => segment.kind !== 'nested' || segment.wrapper.hasPredicates());
  }

  // ---- rendering ----

  /**
   * Predicate list without the WHERE keyword; empty when there is nothing to filter on
   */
  renderWhere(quoter: IdentifierQuoter): SqlFragment {
    const builder = new FragmentBuilder();
    let first = true;
    for (const segment of this.segments) {
      const rendered = this.renderSegment(segment, quoter);
      if (!rendered) {
        continue;
      }
      if (!first) {
        builder.text(` ${segment.connector} `);
      }
      builder.append(rendered);
      first = false;
    }
    return builder.build();
  }

  renderSelectList(quoter: IdentifierQuoter): string | undefined {
    return this.selects.length > 0 ? this.selects.map(column => quoteColumn(quoter, column)).join(', ') : undefined;
  }

  renderJoins(): SqlFragment {
    const builder = new FragmentBuilder();
    for (const join of this.joins) {
      builder.append({ sql: ` ${join.type} JOIN ${join.table} ON ${join.on}`, params: join.params, trusted: [] });
    }
    return builder.build();
  }

  renderGroupBy(quoter: IdentifierQuoter): string {
    return this.groupColumns.length > 0
      ? ` GROUP BY ${this.groupColumns.map(column => quoteColumn(quoter, column)).join(', ')}`
      : '';
  }

  renderHaving(): SqlFragment {
    if (this.havingFragments.length === 0) {
      return emptyFragment();
    }
    const builder = new FragmentBuilder().text(' HAVING ');
    this.havingFragments.forEach((having, i) => {
      if (i > 0) {
        builder.text(' AND ');
      }
      builder.append({ sql: having.sql, params: having.params, trusted: [] });
    });
    return builder.build();
  }

  renderOrderBy(quoter: IdentifierQuoter): string {
    return this.orders.length > 0
      ? ` ORDER BY ${this.orders.map(order => `${quoteColumn(quoter, order.column)} ${order.direction}`).join(', ')}`
      : '';
  }

  /**
   * `col = ?` pairs for UPDATE, in declaration order
   */
  renderSets(quoter: IdentifierQuoter): SqlFragment {
    const builder = new FragmentBuilder();
    this.assignments.forEach((assignment, i) => {
      if (i > 0) {
        builder.text(', ');
      }
      builder.text(`${quoteColumn(quoter, assignment.column)} = `).value(assignment.value);
    });
    return builder.build();
  }

  private renderSegment(segment: SqlSegment, quoter: IdentifierQuoter): SqlFragment | undefined {
    switch (segment.kind) {
      case 'condition':
        return renderCondition(segment.column, segment.keyword, segment.values, quoter);
      case 'nested': {
        const inner = segment.wrapper.renderWhere(quoter);
        return inner.sql ? { ...inner, sql: `(${inner.sql})` } : undefined;
      }
      case 'exists':
        return {
          sql: `${segment.negated ? 'NOT EXISTS' : 'EXISTS'} (${segment.sql})`,
          params: segment.params,
          trusted: [],
        };
      case 'raw':
        return { sql: segment.sql, params: segment.params, trusted: [] };
    }
  }

  // ---- internals ----

  private accept(): boolean {
    if (this.skipNextCall) {
      this.skipNextCall = false;
      return false;
    }
    return true;
  }

  private takeConnector(): Connector {
    const connector = this.pendingConnector;
    this.pendingConnector = 'AND';
    return connector;
  }

  private condition(column: string, keyword: SqlKeyword, values: Value[]): this {
    if (!this.accept()) {
      return this;
    }
    const connector = this.takeConnector();
    const skipped = keyword !== SqlKeyword.IS_NULL && keyword !== SqlKeyword.IS_NOT_NULL && values.some(isEmptyValue);
    if (!skipped) {
      this.segments.push({ kind: 'condition', connector, column, keyword, values });
    }
    return this;
  }

  private compare(column: string, keyword: SqlKeyword, value: ValueInput): this {
    return this.condition(column, keyword, [toValue(value)]);
  }

  private pattern(column: string, keyword: SqlKeyword, value: ValueInput, shape: (text: string) => string): this {
    const resolved = toValue(value);
    const pattern = isEmptyValue(resolved) ? resolved : Value.text(shape(valueToText(resolved)));
    return this.condition(column, keyword, [pattern]);
  }

  private membership(column: string, keyword: SqlKeyword, values: ValueInput[] | Value): this {
    const list = Array.isArray(values) ? Value.list(values.map(toValue)) : values;
    return this.condition(column, keyword, [list]);
  }

  private range(column: string, keyword: SqlKeyword, from: ValueInput, to: ValueInput): this {
    return this.condition(column, keyword, [toValue(from), toValue(to)]);
  }

  private pushNested(group: (wrapper: Wrapper) => void): this {
    const inner = new Wrapper();
    group(inner);
    this.segments.push({ kind: 'nested', connector: this.takeConnector(), wrapper: inner });
    return this;
  }

  private pushExists(negated: boolean, sql: string, params: ValueInput[]): this {
    if (this.accept()) {
      this.segments.push({ kind: 'exists', connector: this.takeConnector(), negated, sql, params: params.map(toValue) });
    }
    return this;
  }

  private join(type: JoinType, table: string, on: string, params: ValueInput[]): this {
    if (this.accept()) {
      this.joins.push({ type, table, on, params: params.map(toValue) });
    }
    return this;
  }

  private orderBy(direction: OrderDirection, columns: string[]): this {
    if (this.accept()) {
      this.orders.push(...columns.map(column => ({ column, direction })));
    }
    return this;
  }
}

type AssignmentInput = Record<string, ValueInput> | Iterable<[string, ValueInput]>;

function isEntryIterable(values: AssignmentInput): values is Iterable<[string, ValueInput]> {
  return Symbol.iterator in values;
}

function nonNegative(name: string, n: number): number {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${n}`);
  }
  return n;
}

function renderCondition(column: string, keyword: SqlKeyword, values: Value[], quoter: IdentifierQuoter): SqlFragment {
  const builder = new FragmentBuilder().text(quoteColumn(quoter, column));
  switch (keyword) {
    case SqlKeyword.IS_NULL:
    case SqlKeyword.IS_NOT_NULL:
      return builder.text(` ${keyword}`).build();
    case SqlKeyword.LIKE_LEFT:
    case SqlKeyword.LIKE_RIGHT:
      return builder.text(' LIKE ').value(values[0]).build();
    case SqlKeyword.IN:
    case SqlKeyword.NOT_IN: {
      const list = values[0];
      const items = list.kind === 'List' || list.kind === 'Array' ? list.values : [list];
      builder.text(` ${keyword} (`);
      items.forEach((item, i) => {
        if (i > 0) {
          builder.text(', ');
        }
        builder.value(item);
      });
      return builder.text(')').build();
    }
    case SqlKeyword.BETWEEN:
    case SqlKeyword.NOT_BETWEEN:
      return builder.text(` ${keyword} `).value(values[0]).text(' AND ').value(values[1]).build();
    default:
      return builder.text(` ${keyword} `).value(values[0]).build();
  }
}
