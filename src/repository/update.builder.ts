import { InvalidArgumentError } from '../common/errors';
import type { EntityClass } from '../metadata/entity-metadata';
import type { BaseMapper } from '../mapper/base-mapper';
import type { ValueInput } from '../value/value';
import { ChainBuilder } from './chain.builder';

/**
 * Fluent UPDATE / DELETE over one entity
 * Without conditions, update and remove fail unless allowEmpty() was called
 */
export class UpdateBuilder<E extends object> extends ChainBuilder {
  constructor(private readonly mapper: BaseMapper, private readonly entity: EntityClass<E>) {
    super();
  }

  set(column: string, value: ValueInput): this {
    this.conditions.set(column, value);
    return this;
  }

  allowEmpty(allow = true): this {
    this.conditions.allowEmpty(allow);
    return this;
  }

  /**
   * UPDATE from `entity`; assignments made with set() take precedence over its properties
   */
  update(entity: E): Promise<number> {
    return this.mapper.update(entity, this.wrapper);
  }

  /**
   * UPDATE with only the set() assignments
   */
  async execute(): Promise<number> {
    if (this.conditions.updates.length === 0) {
      throw new InvalidArgumentError('execute() needs at least one set() assignment');
    }
    return this.mapper.update(new this.entity(), this.wrapper);
  }

  remove(): Promise<number> {
    return this.mapper.remove(this.entity, this.wrapper);
  }

  removeById(id: ValueInput): Promise<number> {
    return this.mapper.removeById(this.entity, id);
  }

  removeByIds(ids: Iterable<ValueInput>): Promise<number> {
    return this.mapper.removeByIds(this.entity, ids);
  }
}
