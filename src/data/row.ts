import { DataError, InvalidArgumentError } from '../common/errors';
import type { ConversionResult, Converter } from '../value/convert';
import { Value, type ObjectValue } from '../value/value';

/**
 * Column reference: zero-based index or column name
 */
export type ColumnKey = number | string;

/**
 * One result row; `columns[i]` labels `data[i]`
 */
export class Row {
  readonly columns: string[];
  readonly data: Value[];

  constructor(columns: string[], data: Value[]) {
    if (columns.length !== data.length) {
      throw new InvalidArgumentError(`Row has ${columns.length} columns but ${data.length} values`);
    }
    this.columns = columns;
    this.data = data;
  }

  get length(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  containsColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  /**
   * Raw value at an index or column; throws when absent
   */
  getValue(key: ColumnKey): Value {
    return this.data[this.indexOf(key)];
  }

  getValueByColumn(name: string): Value | undefined {
    const index = this.columns.indexOf(name);
    return index < 0 ? undefined : this.data[index];
  }

  /**
   * Exact match first, then case-insensitive; Oracle reports unquoted columns upper-cased
   */
  findValue(name: string): Value | undefined {
    const exact = this.getValueByColumn(name);
    if (exact !== undefined) {
      return exact;
    }
    const lower = name.toLowerCase();
    const index = this.columns.findIndex(column => column.toLowerCase() === lower);
    return index < 0 ? undefined : this.data[index];
  }

  setValue(index: number, value: Value): void {
    this.checkIndex(index);
    this.data[index] = value;
  }

  get<T>(key: ColumnKey, converter: Converter<T>): T {
    return converter.fromValue(this.getValue(key));
  }

  getOpt<T>(key: ColumnKey, converter: Converter<T>): ConversionResult<T> {
    let value: Value;
    try {
      value = this.getValue(key);
    } catch (error) {
      if (error instanceof DataError) {
        return { ok: false, error };
      }
      throw error;
    }
    return converter.fromValueOpt(value);
  }

  /**
   * Move a value out of the row, leaving Null in its slot
   */
  take<T>(key: ColumnKey, converter: Converter<T>): T {
    const index = this.indexOf(key);
    const value = this.data[index];
    this.data[index] = Value.null();
    return converter.fromValue(value);
  }

  takeOpt<T>(key: ColumnKey, converter: Converter<T>): ConversionResult<T> {
    const result = this.getOpt(key, converter);
    if (result.ok) {
      this.data[this.indexOf(key)] = Value.null();
    }
    return result;
  }

  /**
   * Object view keyed by column in column order; a duplicated column keeps its last value
   */
  asObject(): ObjectValue {
    return Value.object(this.columns.map((column, i): [string, Value] => [column, this.data[i]]));
  }

  toRecord(): Record<string, Value> {
    const record: Record<string, Value> = {};
    this.columns.forEach((column, i) => {
      record[column] = this.data[i];
    });
    return record;
  }

  private indexOf(key: ColumnKey): number {
    if (typeof key === 'number') {
      this.checkIndex(key);
      return key;
    }
    const index = this.columns.indexOf(key);
    if (index < 0) {
      throw DataError.noSuchValue(`column '${key}'`);
    }
    return index;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
      throw DataError.indexOutOfBounds(index, this.data.length);
    }
  }
}
