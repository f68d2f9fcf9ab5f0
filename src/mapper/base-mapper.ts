import { Logger } from '@nestjs/common';
import { DataError, EmptyWhereError, InvalidArgumentError } from '../common/errors';
import { OperationType, Platform, detectOperationType } from '../common/types';
import type { Row } from '../data/row';
import type { Rows } from '../data/rows';
import { IdStrategy, type Dialect } from '../dialect/dialect';
import type { DriverConnection } from '../driver/driver';
import { ExecuteResult } from '../execution/execute-result';
import type { Statement } from '../execution/pipeline';
import {
  describeEntity,
  describeInstance,
  fieldValue,
  readProperty,
  requireIdField,
  rowToEntity,
  rowToRecord,
  writeProperty,
  type EntityClass,
  type EntityMetadata,
} from '../metadata/entity-metadata';
import { IdentifierType, columnOf, fillApplies, idTypeOf, type FieldName } from '../metadata/field-name';
import { TableName } from '../metadata/table-name';
import { Converters, type Converter } from '../value/convert';
import { Value, toValue, type ValueInput } from '../value/value';
import type { SqlFragment } from '../wrapper/segment';
import { Wrapper } from '../wrapper/wrapper';
import { EntityRepository } from '../repository/entity.repository';
import { QueryBuilder } from '../repository/query.builder';
import { UpdateBuilder } from '../repository/update.builder';
import { isUnsetId, toEntityId, type EntityId, type IPage, type MapperRuntime, type RawParams } from './mapper.types';

/**
 * Turns a result row into a caller type: a converter over the single cell (or the row object), or a function
 */
export type RowReader<T> = Converter<T> | ((row: Row) => T);

function readRow<T>(reader: RowReader<T>, row: Row): T {
  if (typeof reader === 'function') {
    return reader(row);
  }
  return reader.fromValue(row.length === 1 ? row.getValue(0) : row.asObject());
}

function isNamed(params: RawParams): params is Readonly<Record<string, ValueInput>> {
  return !Array.isArray(params);
}

/**
 * Every mapper operation, independent of where the connection comes from
 * MapperService draws a pooled connection per call; Transaction reuses its own
 */
export abstract class BaseMapper {
  protected readonly logger = new Logger(this.constructor.name);

  protected constructor(protected readonly runtime: MapperRuntime) {}

  get dialect(): Dialect {
    return this.runtime.dialect;
  }

  /**
   * Run `work` on one connection for its whole span
   */
  protected abstract withConnection<T>(work: (connection: DriverConnection) => Promise<T>): Promise<T>;

  /**
   * Run `work` all-or-nothing: inside the current transaction, or a new one
   */
  protected abstract atomically<T>(work: (mapper: BaseMapper) => Promise<T>): Promise<T>;

  wrapper(): Wrapper {
    return Wrapper.create();
  }

  repository<E extends object>(entity: EntityClass<E>): EntityRepository<E> {
    return new EntityRepository(this, entity);
  }

  queryBuilder<E extends object>(entity: EntityClass<E>): QueryBuilder<E> {
    return new QueryBuilder(this, entity);
  }

  updateBuilder<E extends object>(entity: EntityClass<E>): UpdateBuilder<E> {
    return new UpdateBuilder(this, entity);
  }

  /**
   * Row reader that materializes `entity`, honouring the strict conversion setting
   */
  entityReader<E extends object>(entity: EntityClass<E>): (row: Row) => E {
    const { fields } = describeEntity(entity);
    return row => rowToEntity(entity, fields, row, this.runtime.strictConversion);
  }

  // ---- insert ----

  /**
   * Insert one entity; the generated or assigned key is written back and returned
   */
  async save<E extends object>(entity: E): Promise<EntityId | undefined> {
    const metadata = describeInstance(entity);
    const fields = this.insertFields(metadata);
    const values = fields.map(field => this.insertValue(field, entity));
    const autoField = this.autoIdField(metadata);
    const returning = autoField && this.dialect.idStrategy !== IdStrategy.LastInsertId ? columnOf(autoField) : undefined;
    const keysInResultSet = returning !== undefined && this.returnsKeyRows();

    const fragment = this.dialect.renderInsert(metadata.table, fields.map(columnOf), values, returning);
    const result = await this.dispatch(this.statement(fragment, OperationType.Insert, keysInResultSet ? 'query' : 'execute', metadata));

    const idField = metadata.idField;
    if (!idField) {
      return undefined;
    }
    const id = autoField ? generatedKey(result) : values[fields.indexOf(idField)];
    if (id === undefined || id.kind === 'Null') {
      return undefined;
    }
    this.writeBack(entity, idField, id, metadata);
    return toEntityId(id);
  }

  /**
   * Multi-row INSERT in chunks, all inside one transaction; returns the number of rows written
   */
  async saveBatch<E extends object>(entities: Iterable<E>): Promise<number> {
    const list = Array.from(entities);
    if (list.length === 0) {
      return 0;
    }
    const metadata = describeInstance(list[0]);
    for (const entity of list) {
      if (describeInstance(entity) !== metadata) {
        throw new InvalidArgumentError(`saveBatch expects ${metadata.type} entities only, got ${entity.constructor.name}`);
      }
    }
    return this.atomically(mapper => mapper.insertBatch(metadata, list));
  }

  protected async insertBatch<E extends object>(metadata: EntityMetadata, entities: E[]): Promise<number> {
    const autoField = this.autoIdField(metadata);
    if (autoField && this.dialect.idStrategy === IdStrategy.ReturningInto) {
      // INSERT ALL cannot report keys, so each row goes on its own
      for (const entity of entities) {
        await this.save(entity);
      }
      return entities.length;
    }

    const fields = this.insertFields(metadata);
    const columns = fields.map(columnOf);
    const returning = autoField && this.returnsKeyRows() ? columnOf(autoField) : undefined;
    const chunkSize = this.dialect.batchChunkSize(columns.length, this.runtime.defaultBatchSize);
    let written = 0;

    for (let start = 0; start < entities.length; start += chunkSize) {
      const chunk = entities.slice(start, start + chunkSize);
      const rows = chunk.map(entity => fields.map(field => this.insertValue(field, entity)));
      const fragment = this.dialect.renderBatchInsert(metadata.table, columns, rows, returning);
      const result = await this.dispatch(
        this.statement(fragment, OperationType.Insert, returning ? 'query' : 'execute', metadata),
      );
      written += ExecuteResult.affectedOf(result);
      this.writeBackBatch(metadata, fields, chunk, rows, result);
    }
    return written;
  }

  /**
   * Update when the entity carries a key, insert otherwise
   */
  async saveOrUpdate<E extends object>(entity: E): Promise<EntityId | undefined> {
    const metadata = describeInstance(entity);
    const idField = metadata.idField;
    if (idField) {
      const id = fieldValue(entity, idField);
      if (!isUnsetId(id)) {
        await this.updateById(entity);
        return toEntityId(id);
      }
    }
    return this.save(entity);
  }

  /**
   * Insert, or overwrite the row with the same key; returns the backend's affected count
   */
  async upsert<E extends object>(entity: E): Promise<number> {
    const metadata = describeInstance(entity);
    const idField = requireIdField(metadata);
    if (idTypeOf(idField) === IdentifierType.Auto && isUnsetId(fieldValue(entity, idField))) {
      await this.save(entity);
      return 1;
    }
    const fields = metadata.fields.filter(field => field.exist);
    const values = fields.map(field => this.insertValue(field, entity));
    const fragment = this.dialect.renderUpsert(metadata.table, fields.map(columnOf), values, [columnOf(idField)]);
    const result = await this.dispatch(this.statement(fragment, OperationType.Insert, 'execute', metadata));
    this.writeBack(entity, idField, values[fields.indexOf(idField)], metadata);
    return ExecuteResult.affectedOf(result);
  }

  // ---- update ----

  /**
   * UPDATE rows matching `wrapper`; the SET list comes from the wrapper's assignments or else the entity
   * Properties left undefined are skipped; null writes NULL
   */
  async update<E extends object>(entity: E, wrapper: Wrapper): Promise<number> {
    const metadata = describeInstance(entity);
    const where = this.requireWhere(wrapper, OperationType.Update, metadata);
    const sets = this.assignments(metadata, entity, wrapper).renderSets(this.dialect);
    if (!sets.sql) {
      throw new InvalidArgumentError(`Nothing to update on ${metadata.table.completeName}`);
    }
    const fragment = this.dialect.renderUpdate(this.dialect.resolveTable(metadata.table, wrapper), sets, where);
    const result = await this.dispatch(this.statement(fragment, OperationType.Update, 'execute', metadata, wrapper));
    return ExecuteResult.affectedOf(result);
  }

  async updateById<E extends object>(entity: E): Promise<number> {
    const metadata = describeInstance(entity);
    const idField = requireIdField(metadata);
    const id = fieldValue(entity, idField);
    if (isUnsetId(id)) {
      throw new InvalidArgumentError(`updateById on ${metadata.type} requires a value for '${idField.name}'`);
    }
    return this.update(entity, Wrapper.create().eq(columnOf(idField), id));
  }

  /**
   * updateById for each entity inside one transaction; returns the summed affected count
   */
  async updateBatchById<E extends object>(entities: Iterable<E>): Promise<number> {
    const list = Array.from(entities);
    if (list.length === 0) {
      return 0;
    }
    return this.atomically(async mapper => {
      let affected = 0;
      for (const entity of list) {
        affected += await mapper.updateById(entity);
      }
      return affected;
    });
  }

  // ---- delete ----

  async remove<E extends object>(entity: EntityClass<E>, wrapper: Wrapper): Promise<number> {
    const metadata = describeEntity(entity);
    const where = this.requireWhere(wrapper, OperationType.Delete, metadata);
    const fragment = this.dialect.renderDelete(this.dialect.resolveTable(metadata.table, wrapper), where);
    const result = await this.dispatch(this.statement(fragment, OperationType.Delete, 'execute', metadata, wrapper));
    return ExecuteResult.affectedOf(result);
  }

  async removeById<E extends object>(entity: EntityClass<E>, id: ValueInput): Promise<number> {
    return this.remove(entity, this.idWrapper(describeEntity(entity), id));
  }

  async removeByIds<E extends object>(entity: EntityClass<E>, ids: Iterable<ValueInput>): Promise<number> {
    const values = Array.from(ids);
    if (values.length === 0) {
      return 0;
    }
    const idField = requireIdField(describeEntity(entity));
    return this.remove(entity, Wrapper.create().in(columnOf(idField), values));
  }

  // ---- select ----

  async selectById<E extends object>(entity: EntityClass<E>, id: ValueInput): Promise<E | undefined> {
    return this.selectOne(entity, this.idWrapper(describeEntity(entity), id));
  }

  /**
   * First matching row; the query is limited to one row
   */
  async selectOne<E extends object>(entity: EntityClass<E>, wrapper: Wrapper): Promise<E | undefined> {
    const records = await this.list(entity, wrapper.clone().limit(1));
    return records[0];
  }

  async list<E extends object>(entity: EntityClass<E>, wrapper: Wrapper = Wrapper.create()): Promise<E[]> {
    const metadata = describeEntity(entity);
    const rows = await this.withConnection(connection => this.selectRows(connection, metadata, wrapper));
    return rows.data.map(this.entityReader(entity));
  }

  async count<E extends object>(entity: EntityClass<E>, wrapper: Wrapper = Wrapper.create()): Promise<number> {
    const metadata = describeEntity(entity);
    return this.withConnection(connection => this.countRows(connection, metadata, wrapper));
  }

  /**
   * Count, then fetch one page, both on the same connection
   */
  async page<E extends object>(entity: EntityClass<E>, page: number, size: number, wrapper: Wrapper = Wrapper.create()): Promise<IPage<E>> {
    if (!Number.isInteger(page) || page < 1) {
      throw new InvalidArgumentError(`page must be >= 1, got ${page}`);
    }
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidArgumentError(`size must be >= 1, got ${size}`);
    }
    const metadata = describeEntity(entity);
    const reader = this.entityReader(entity);
    return this.withConnection(async connection => {
      const total = await this.countRows(connection, metadata, wrapper.withoutPaging());
      if (total === 0) {
        return { current: page, size, total, records: [] };
      }
      const rows = await this.selectRows(connection, metadata, wrapper.clone().page(page, size));
      return { current: page, size, total, records: rows.data.map(reader) };
    });
  }

  // ---- raw statements ----

  /**
   * Exactly one row; zero or several rows fail with DataError
   */
  execFirst(sql: string, params?: RawParams): Promise<Record<string, unknown>>;
  execFirst<T>(sql: string, params: RawParams, reader: RowReader<T>): Promise<T>;
  async execFirst<T>(sql: string, params: RawParams = [], reader?: RowReader<T>): Promise<T | Record<string, unknown>> {
    const rows = await this.rawQuery(sql, params);
    if (rows.length !== 1) {
      throw DataError.rowCount(rows.length);
    }
    const row = rows.data[0];
    return reader ? readRow(reader, row) : rowToRecord(row);
  }

  /**
   * At most one row; several rows fail with DataError
   */
  execFirstOpt(sql: string, params?: RawParams): Promise<Record<string, unknown> | undefined>;
  execFirstOpt<T>(sql: string, params: RawParams, reader: RowReader<T>): Promise<T | undefined>;
  async execFirstOpt<T>(sql: string, params: RawParams = [], reader?: RowReader<T>): Promise<T | Record<string, unknown> | undefined> {
    const rows = await this.rawQuery(sql, params);
    if (rows.length > 1) {
      throw DataError.rowCount(rows.length);
    }
    const row = rows.first();
    if (!row) {
      return undefined;
    }
    return reader ? readRow(reader, row) : rowToRecord(row);
  }

  execRaw(sql: string, params?: RawParams): Promise<Record<string, unknown>[]>;
  execRaw<T>(sql: string, params: RawParams, reader: RowReader<T>): Promise<T[]>;
  async execRaw<T>(sql: string, params: RawParams = [], reader?: RowReader<T>): Promise<(T | Record<string, unknown>)[]> {
    const rows = await this.rawQuery(sql, params);
    return rows.data.map(row => (reader ? readRow(reader, row) : rowToRecord(row)));
  }

  /**
   * Statement without a result set; returns the affected row count
   */
  async execDrop(sql: string, params: RawParams = []): Promise<number> {
    const result = await this.dispatch(this.rawStatement(sql, params, 'execute'));
    return ExecuteResult.affectedOf(result);
  }

  // ---- internals ----

  private async rawQuery(sql: string, params: RawParams): Promise<Rows> {
    return ExecuteResult.rowsOf(await this.dispatch(this.rawStatement(sql, params, 'query')));
  }

  private rawStatement(sql: string, params: RawParams, mode: Statement['mode']): Statement {
    const bound = isNamed(params)
      ? this.dialect.bindNamedParameters(sql, params)
      : { sql: this.dialect.processPlaceholders(sql), params: params.map(toValue) };
    return {
      sql: bound.sql,
      params: bound.params,
      operation: detectOperationType(sql),
      mode,
      table: TableName.fromSql(sql),
    };
  }

  private async dispatch(statement: Statement, connection?: DriverConnection): Promise<ExecuteResult> {
    if (connection) {
      return this.runtime.pipeline.run(connection, statement);
    }
    return this.withConnection(acquired => this.runtime.pipeline.run(acquired, statement));
  }

  private statement(
    fragment: SqlFragment,
    operation: OperationType,
    mode: Statement['mode'],
    metadata: EntityMetadata,
    wrapper?: Wrapper,
  ): Statement {
    return {
      sql: this.dialect.processPlaceholders(fragment.sql),
      params: fragment.params,
      trusted: fragment.trusted,
      operation,
      mode,
      table: metadata.table,
      entityType: metadata.type,
      wrapper,
    };
  }

  private async selectRows(connection: DriverConnection, metadata: EntityMetadata, wrapper: Wrapper): Promise<Rows> {
    const columns = metadata.fields.filter(field => field.exist && field.select).map(columnOf);
    const fragment = this.dialect.renderSelect(metadata.table, columns, wrapper);
    const result = await this.dispatch(this.statement(fragment, OperationType.Select, 'query', metadata, wrapper), connection);
    return ExecuteResult.rowsOf(result);
  }

  private async countRows(connection: DriverConnection, metadata: EntityMetadata, wrapper: Wrapper): Promise<number> {
    const fragment = this.dialect.renderCount(metadata.table, wrapper);
    const result = await this.dispatch(this.statement(fragment, OperationType.Select, 'query', metadata, wrapper), connection);
    const row = ExecuteResult.rowsOf(result).first();
    return row ? Converters.number.fromValue(row.getValue(0)) : 0;
  }

  private requireWhere(wrapper: Wrapper, operation: OperationType, metadata: EntityMetadata): SqlFragment {
    const where = this.dialect.whereClause(wrapper);
    if (!where.sql && !wrapper.isEmptyAllowed) {
      throw new EmptyWhereError(operation, metadata.table.completeName);
    }
    return where;
  }

  private idWrapper(metadata: EntityMetadata, id: ValueInput): Wrapper {
    const idField = requireIdField(metadata);
    const value = toValue(id);
    if (value.kind === 'Null') {
      throw new InvalidArgumentError(`An id value for ${metadata.type} is required`);
    }
    return Wrapper.create().eq(columnOf(idField), value);
  }

  /**
   * SET list: the wrapper's own assignments, or every persisted non-key property that is not undefined
   * Update fills are added for columns not assigned already
   */
  private assignments(metadata: EntityMetadata, entity: object, wrapper: Wrapper): Wrapper {
    const sets = Wrapper.create();
    const assigned = new Set<string>();
    for (const assignment of wrapper.updates) {
      sets.set(assignment.column, assignment.value);
      assigned.add(assignment.column);
    }
    for (const field of metadata.fields) {
      const column = columnOf(field);
      if (!field.exist || field.fieldType.kind === 'TableId' || assigned.has(column)) {
        continue;
      }
      if (field.fill && fillApplies(field, 'update')) {
        sets.set(column, field.fill.value);
      } else if (wrapper.updates.length === 0 && readProperty(entity, field) !== undefined) {
        sets.set(column, fieldValue(entity, field));
      }
    }
    return sets;
  }

  private insertFields(metadata: EntityMetadata): FieldName[] {
    const fields = metadata.fields.filter(field => field.exist && idTypeOf(field) !== IdentifierType.Auto);
    if (fields.length === 0) {
      throw new InvalidArgumentError(`${metadata.type} has no columns to insert`);
    }
    return fields;
  }

  /**
   * Bound value of one column on INSERT: an insert fill wins, then key assignment
   */
  private insertValue(field: FieldName, entity: object): Value {
    if (field.fill && fillApplies(field, 'insert')) {
      return field.fill.value;
    }
    const value = fieldValue(entity, field);
    switch (idTypeOf(field)) {
      case IdentifierType.AssignId: {
        if (!isUnsetId(value)) {
          return value;
        }
        const id = this.runtime.ids.nextId();
        // string-typed keys take the decimal text
        return field.converter.name === 'string' ? Value.text(id.toString()) : Value.bigint(id);
      }
      case IdentifierType.AssignUuid:
        return isUnsetId(value) ? Value.text(this.runtime.ids.nextUuid()) : value;
      default:
        return value;
    }
  }

  private autoIdField(metadata: EntityMetadata): FieldName | undefined {
    const idField = metadata.idField;
    return idField && idTypeOf(idField) === IdentifierType.Auto ? idField : undefined;
  }

  // RETURNING and OUTPUT hand keys back as a result set
  private returnsKeyRows(): boolean {
    return this.dialect.idStrategy === IdStrategy.Returning || this.dialect.idStrategy === IdStrategy.Output;
  }

  private writeBack(entity: object, field: FieldName, value: Value, metadata: EntityMetadata): void {
    const result = field.converter.fromValueOpt(value);
    if (result.ok) {
      writeProperty(entity, field, result.value);
    } else if (this.runtime.strictConversion) {
      throw result.error;
    } else {
      this.logger.warn(`Could not write key back into ${metadata.type}.${field.name}: ${result.error.message}`);
    }
  }

  /**
   * Keys of a multi-row INSERT: from the result set, or consecutive from the last insert id
   */
  private writeBackBatch(metadata: EntityMetadata, fields: FieldName[], chunk: object[], rows: Value[][], result: ExecuteResult): void {
    const idField = metadata.idField;
    if (!idField) {
      return;
    }
    if (idTypeOf(idField) !== IdentifierType.Auto) {
      const index = fields.indexOf(idField);
      chunk.forEach((entity, i) => this.writeBack(entity, idField, rows[i][index], metadata));
      return;
    }
    if (result.kind === 'rows') {
      result.rows.data.forEach((row, i) => {
        if (i < chunk.length) {
          this.writeBack(chunk[i], idField, row.getValue(0), metadata);
        }
      });
      return;
    }
    const last = result.kind === 'affected' ? result.lastInsertId : undefined;
    const lastId = last ? toEntityId(last) : undefined;
    if (lastId === undefined || typeof lastId === 'string') {
      return;
    }
    // MySQL reports the first key of the statement, SQLite the last
    const first = this.dialect.platform === Platform.MySQL ? BigInt(lastId) : BigInt(lastId) - BigInt(chunk.length - 1);
    chunk.forEach((entity, i) => this.writeBack(entity, idField, Value.bigint(first + BigInt(i)), metadata));
  }
}

/**
 * Key reported by an INSERT: the first cell of a RETURNING / OUTPUT row, or the driver's last insert id
 */
function generatedKey(result: ExecuteResult): Value | undefined {
  switch (result.kind) {
    case 'rows':
      return result.rows.first()?.getValue(0);
    case 'affected':
      return result.lastInsertId;
    case 'none':
      return undefined;
  }
}
