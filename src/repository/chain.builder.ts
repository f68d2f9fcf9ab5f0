import type { ValueInput } from '../value/value';
import { Wrapper } from '../wrapper/wrapper';

/**
 * Predicate half of the fluent builders; each call adds to one Wrapper
 */
export abstract class ChainBuilder {
  protected readonly conditions: Wrapper;

  protected constructor(wrapper: Wrapper = Wrapper.create()) {
    this.conditions = wrapper;
  }

  eq(column: string, value: ValueInput): this {
    this.conditions.eq(column, value);
    return this;
  }

  ne(column: string, value: ValueInput): this {
    this.conditions.ne(column, value);
    return this;
  }

  gt(column: string, value: ValueInput): this {
    this.conditions.gt(column, value);
    return this;
  }

  ge(column: string, value: ValueInput): this {
    this.conditions.ge(column, value);
    return this;
  }

  lt(column: string, value: ValueInput): this {
    this.conditions.lt(column, value);
    return this;
  }

  le(column: string, value: ValueInput): this {
    this.conditions.le(column, value);
    return this;
  }

  like(column: string, value: ValueInput): this {
    this.conditions.like(column, value);
    return this;
  }

  in(column: string, values: ValueInput[]): this {
    this.conditions.in(column, values);
    return this;
  }

  notIn(column: string, values: ValueInput[]): this {
    this.conditions.notIn(column, values);
    return this;
  }

  between(column: string, from: ValueInput, to: ValueInput): this {
    this.conditions.between(column, from, to);
    return this;
  }

  isNull(column: string): this {
    this.conditions.isNull(column);
    return this;
  }

  isNotNull(column: string): this {
    this.conditions.isNotNull(column);
    return this;
  }

  or(group?: (wrapper: Wrapper) => void): this {
    this.conditions.or(group);
    return this;
  }

  /**
   * Anything the other methods do not cover, applied directly to the wrapper
   */
  where(apply: (wrapper: Wrapper) => void): this {
    apply(this.conditions);
    return this;
  }

  /**
   * Copy of the accumulated conditions
   */
  get wrapper(): Wrapper {
    return this.conditions.clone();
  }
}
