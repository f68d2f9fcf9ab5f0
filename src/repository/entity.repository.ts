import type { EntityClass } from '../metadata/entity-metadata';
import type { BaseMapper, RowReader } from '../mapper/base-mapper';
import type { EntityId, IPage, RawParams } from '../mapper/mapper.types';
import type { ValueInput } from '../value/value';
import { Wrapper } from '../wrapper/wrapper';
import { QueryBuilder } from './query.builder';
import { UpdateBuilder } from './update.builder';

/**
 * Mapper operations bound to one entity class
 */
export class EntityRepository<E extends object> {
  constructor(private readonly mapper: BaseMapper, private readonly entity: EntityClass<E>) {}

  query(): QueryBuilder<E> {
    return new QueryBuilder(this.mapper, this.entity);
  }

  updater(): UpdateBuilder<E> {
    return new UpdateBuilder(this.mapper, this.entity);
  }

  list(wrapper: Wrapper = Wrapper.create()): Promise<E[]> {
    return this.mapper.list(this.entity, wrapper);
  }

  selectOne(wrapper: Wrapper): Promise<E | undefined> {
    return this.mapper.selectOne(this.entity, wrapper);
  }

  selectById(id: ValueInput): Promise<E | undefined> {
    return this.mapper.selectById(this.entity, id);
  }

  page(page: number, size: number, wrapper: Wrapper = Wrapper.create()): Promise<IPage<E>> {
    return this.mapper.page(this.entity, page, size, wrapper);
  }

  count(wrapper: Wrapper = Wrapper.create()): Promise<number> {
    return this.mapper.count(this.entity, wrapper);
  }

  remove(wrapper: Wrapper): Promise<number> {
    return this.mapper.remove(this.entity, wrapper);
  }

  removeById(id: ValueInput): Promise<number> {
    return this.mapper.removeById(this.entity, id);
  }

  removeByIds(ids: Iterable<ValueInput>): Promise<number> {
    return this.mapper.removeByIds(this.entity, ids);
  }

  update(entity: E, wrapper: Wrapper): Promise<number> {
    return this.mapper.update(entity, wrapper);
  }

  updateById(entity: E): Promise<number> {
    return this.mapper.updateById(entity);
  }

  updateBatchById(entities: Iterable<E>): Promise<number> {
    return this.mapper.updateBatchById(entities);
  }

  save(entity: E): Promise<EntityId | undefined> {
    return this.mapper.save(entity);
  }

  saveBatch(entities: Iterable<E>): Promise<number> {
    return this.mapper.saveBatch(entities);
  }

  saveOrUpdate(entity: E): Promise<EntityId | undefined> {
    return this.mapper.saveOrUpdate(entity);
  }

  upsert(entity: E): Promise<number> {
    return this.mapper.upsert(entity);
  }

  /**
   * Raw query whose rows are materialized as this entity
   */
  execRaw(sql: string, params: RawParams = []): Promise<E[]> {
    return this.mapper.execRaw(sql, params, this.reader());
  }

  execFirst(sql: string, params: RawParams = []): Promise<E> {
    return this.mapper.execFirst(sql, params, this.reader());
  }

  execFirstOpt(sql: string, params: RawParams = []): Promise<E | undefined> {
    return this.mapper.execFirstOpt(sql, params, this.reader());
  }

  execDrop(sql: string, params: RawParams = []): Promise<number> {
    return this.mapper.execDrop(sql, params);
  }

  private reader(): RowReader<E> {
    return this.mapper.entityReader(this.entity);
  }
}
