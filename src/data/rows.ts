import type { Converter } from '../value/convert';
import type { ObjectValue } from '../value/value';
import { Row } from './row';

/**
 * Ordered result set, optionally carrying a total row count
 */
export class Rows implements Iterable<Row> {
  readonly data: Row[];
  count?: number;

  constructor(data: Row[] = [], count?: number) {
    this.data = data;
    this.count = count;
  }

  /**
   * Build rows from a column header and positional values
   */
  static of(columns: string[], values: ConstructorParameters<typeof Row>[1][]): Rows {
    return new Rows(values.map(data => new Row(columns, data)));
  }

  get length(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  first(): Row | undefined {
    return this.data[0];
  }

  objects(): ObjectValue[] {
    return this.data.map(row => row.asObject());
  }

  /**
   * Convert every row through its object view
   */
  map<T>(converter: Converter<T>): T[] {
    return this.data.map(row => converter.fromValue(row.asObject()));
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.data[Symbol.iterator]();
  }
}
