import type { EntityClass } from '../metadata/entity-metadata';
import type { BaseMapper } from '../mapper/base-mapper';
import type { IPage } from '../mapper/mapper.types';
import type { ValueInput } from '../value/value';
import { ChainBuilder } from './chain.builder';

/**
 * Fluent SELECT over one entity
 *
 * @example
 * const admins = await mapper.queryBuilder(User).eq('role', 'admin').orderByDesc('created_at').list();
 */
export class QueryBuilder<E extends object> extends ChainBuilder {
  constructor(private readonly mapper: BaseMapper, private readonly entity: EntityClass<E>) {
    super();
  }

  select(...columns: string[]): this {
    this.conditions.select(...columns);
    return this;
  }

  orderByAsc(...columns: string[]): this {
    this.conditions.orderByAsc(...columns);
    return this;
  }

  orderByDesc(...columns: string[]): this {
    this.conditions.orderByDesc(...columns);
    return this;
  }

  limit(limit: number): this {
    this.conditions.limit(limit);
    return this;
  }

  list(): Promise<E[]> {
    return this.mapper.list(this.entity, this.wrapper);
  }

  selectOne(): Promise<E | undefined> {
    return this.mapper.selectOne(this.entity, this.wrapper);
  }

  /**
   * Lookup by key; accumulated conditions do not apply
   */
  selectById(id: ValueInput): Promise<E | undefined> {
    return this.mapper.selectById(this.entity, id);
  }

  page(page: number, size: number): Promise<IPage<E>> {
    return this.mapper.page(this.entity, page, size, this.wrapper);
  }

  count(): Promise<number> {
    return this.mapper.count(this.entity, this.wrapper);
  }
}
