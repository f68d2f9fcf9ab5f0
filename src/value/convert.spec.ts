import { DataError } from '../common/errors';
import { Converters } from './convert';
import { Value } from './value';

describe('Converters', () => {
  describe('bool', () => {
    it('should read integers and text', () => {
      expect(Converters.bool.fromValue(Value.int(0))).toBe(false);
      expect(Converters.bool.fromValue(Value.bigint(7n))).toBe(true);
      expect(Converters.bool.fromValue(Value.text('Yes'))).toBe(true);
      expect(Converters.bool.fromValue(Value.text(''))).toBe(false);
      expect(Converters.bool.fromValue(Value.null())).toBe(false);
    });

    it('should report unparseable text without throwing', () => {
      const result = Converters.bool.fromValueOpt(Value.text('maybe'));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('ParseError');
      }
    });
  });

  describe('integers', () => {
    it('should wrap on overflow', () => {
      expect(Converters.int.fromValue(Value.bigint(4294967301n))).toBe(5);
      expect(Converters.tinyint.fromValue(Value.text('200'))).toBe(-56);
    });

    it('should reject floating point sources', () => {
      expect(() => Converters.int.fromValue(Value.double(1.5))).toThrow('Type mismatch: expected int, found Double');
    });

    it('should reject wider integer variants for narrow targets', () => {
      expect(() => Converters.tinyint.fromValue(Value.int(1))).toThrow(DataError);
    });

    it('should parse driver text', () => {
      expect(Converters.int.fromValue(Value.text(' 42 '))).toBe(42);
      expect(Converters.bigint.fromValue(Value.text('9007199254740993'))).toBe(9007199254740993n);
      expect(() => Converters.bigint.fromValue(Value.text('12.5'))).toThrow(DataError);
    });

    it('should report non-finite sources as conversion errors', () => {
      for (const source of [Value.text('Infinity'), Value.decimal('1e400')]) {
        const result = Converters.int.fromValueOpt(source);
        expect(result.ok).toBe(false);
        if (!result.ok) {
          expect(result.error).toBeInstanceOf(DataError);
          expect(result.error.reason).toBe('ConversionError');
        }
      }
    });
  });

  it('should read any numeric variant as number', () => {
    expect(Converters.number.fromValue(Value.bigint(12n))).toBe(12);
    expect(Converters.number.fromValue(Value.decimal('1.25'))).toBe(1.25);
    expect(Converters.number.toValue(3)).toEqual({ kind: 'Int', value: 3 });
  });

  it('should produce normalized decimals', () => {
    expect(Converters.decimal.fromValue(Value.double(0.5))).toBe('0.5');
    expect(Converters.decimal.fromValue(Value.int(-3))).toBe('-3');
  });

  it('should render any variant as string', () => {
    expect(Converters.string.fromValue(Value.date({ year: 2024, month: 3, day: 5 }))).toBe('2024-03-05');
    expect(Converters.string.fromValue(Value.bigint(12n))).toBe('12');
  });

  it('should read uuids from 16-byte blobs', () => {
    const bytes = Uint8Array.from(Buffer.from('550e8400e29b41d4a716446655440000', 'hex'));
    expect(Converters.uuid.fromValue(Value.blob(bytes))).toBe('550e8400-e29b-41d4-a716-446655440000');
    expect(() => Converters.uuid.fromValue(Value.blob(new Uint8Array(3)))).toThrow(DataError);
  });

  describe('temporal', () => {
    it('should read naive text as UTC timestamps', () => {
      const instant = Converters.timestamp.fromValue(Value.text('2024-01-02 03:04:05'));
      expect(instant.getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
    });

    it('should keep microseconds of date-time text', () => {
      expect(Converters.dateTime.fromValue(Value.text('2024-01-02T03:04:05.123456'))).toEqual({
        date: { year: 2024, month: 1, day: 2 },
        time: { hour: 3, minute: 4, second: 5, microsecond: 123456 },
      });
    });

    it('should accept slashed dates', () => {
      expect(Converters.date.fromValue(Value.text('2024/03/05'))).toEqual({ year: 2024, month: 3, day: 5 });
    });

    it('should project timestamps onto the date part', () => {
      const value = Value.timestamp(new Date(Date.UTC(2024, 11, 31, 23, 0, 0)));
      expect(Converters.date.fromValue(value)).toEqual({ year: 2024, month: 12, day: 31 });
    });
  });

  describe('combinators', () => {
    it('should map null through optional', () => {
      const optionalInt = Converters.optional(Converters.int);
      expect(optionalInt.fromValue(Value.null())).toBeNull();
      expect(optionalInt.fromValue(Value.int(3))).toBe(3);
      expect(optionalInt.toValue(null)).toEqual({ kind: 'Null' });
    });

    it('should read homogeneous lists', () => {
      const ints = Converters.list(Converters.int);
      expect(ints.fromValue(Value.list([Value.int(1), Value.int(2)]))).toEqual([1, 2]);
      expect(() => ints.fromValue(Value.list([Value.int(1), Value.text('2')]))).toThrow(DataError);
    });

    it('should read tuples by position', () => {
      const pair = Converters.tuple(Converters.int, Converters.string);
      expect(pair.fromValue(Value.list([Value.int(1), Value.text('a')]))).toEqual([1, 'a']);
      expect(() => pair.fromValue(Value.list([Value.int(1)]))).toThrow('Type mismatch: expected 2-tuple, found 1 values');
    });

    it('should read records from objects', () => {
      const scores = Converters.record(Converters.int);
      expect(scores.fromValue(Value.object({ a: Value.int(1) }))).toEqual({ a: 1 });
    });
  });

  it('should parse object text keeping key order', () => {
    const entries = Converters.object.fromValue(Value.text('{"b":1,"a":2}'));
    expect([...entries.keys()]).toEqual(['b', 'a']);
    expect(entries.get('a')).toEqual({ kind: 'Int', value: 2 });
  });

  it('should keep integer-like object keys in order through text', () => {
    const settings = Value.object(
      new Map<string, Value>([
        ['z', Value.int(1)],
        ['10', Value.text('ten')],
      ]),
    );

    const text = Converters.string.fromValue(settings);
    const entries = Converters.object.fromValue(Value.text(text));

    expect(text).toBe('{"z":1,"10":"ten"}');
    expect([...entries.keys()]).toEqual(['z', '10']);
    expect(entries.get('10')).toEqual(Value.text('ten'));
  });

  it('should reject object text holding another JSON type', () => {
    expect(() => Converters.object.fromValue(Value.text('[1]'))).toThrow('Type mismatch: expected object, found List');
    expect(() => Converters.object.fromValue(Value.text('{"a":'))).toThrow(DataError);
  });

  it('should fall back to plain text for invalid json', () => {
    expect(Converters.json.fromValue(Value.text('not json'))).toBe('not json');
    expect(Converters.json.fromValue(Value.text('[1,2]'))).toEqual([1, 2]);
  });
});
