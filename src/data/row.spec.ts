import { DataError } from '../common/errors';
import { Converters } from '../value/convert';
import { Value } from '../value/value';
import { Row } from './row';
import { Rows } from './rows';

describe('Row', () => {
  const makeRow = () => new Row(['id', 'name'], [Value.bigint(7n), Value.text('Jack')]);

  it('should read by index and by column', () => {
    const row = makeRow();
    expect(row.get(0, Converters.bigint)).toBe(7n);
    expect(row.get('name', Converters.string)).toBe('Jack');
    expect(row.getValueByColumn('missing')).toBeUndefined();
  });

  it('should leave null behind when taking a value', () => {
    const row = makeRow();
    expect(row.take('name', Converters.string)).toBe('Jack');
    expect(row.getValue('name')).toEqual({ kind: 'Null' });
    expect(row.takeOpt('name', Converters.optional(Converters.string))).toEqual({ ok: true, value: null });
  });

  it('should report out of range indexes', () => {
    const row = makeRow();
    expect(() => row.getValue(2)).toThrow('Index 2 out of bounds for length 2');
    expect(() => row.setValue(-1, Value.null())).toThrow(DataError);
    const result = row.getOpt('nope', Converters.string);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.reason).toBe('NoSuchValue');
    }
  });

  it('should reject mismatched column and value counts', () => {
    expect(() => new Row(['a'], [])).toThrow('Row has 1 columns but 0 values');
  });

  it('should expose an ordered object view', () => {
    const row = makeRow();
    expect([...row.asObject().entries.keys()]).toEqual(['id', 'name']);
    expect(row.toRecord()).toEqual({ id: Value.bigint(7n), name: Value.text('Jack') });
    expect(row.containsColumn('id')).toBe(true);
  });

  it('should fall back to a case-insensitive column match', () => {
    const row = new Row(['ID', 'NAME'], [Value.int(1), Value.text('Jack')]);
    expect(row.findValue('name')).toEqual(Value.text('Jack'));
    expect(row.findValue('age')).toBeUndefined();
  });
});

describe('Rows', () => {
  it('should iterate and convert rows', () => {
    const rows = Rows.of(['n'], [[Value.int(1)], [Value.int(2)]]);
    const seen: number[] = [];
    for (const row of rows) {
      seen.push(row.get(0, Converters.int));
    }
    expect(seen).toEqual([1, 2]);
    expect(rows.first()?.get('n', Converters.int)).toBe(1);
    expect(rows.map(Converters.record(Converters.int))).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should return undefined for the first row of an empty set', () => {
    expect(new Rows().first()).toBeUndefined();
  });
});
