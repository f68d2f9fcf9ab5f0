import { DataError } from '../common/errors';
import { Value, isEmptyValue, isValue, normalizeDecimal } from './value';

describe('Value', () => {
  describe('integer factories', () => {
    it('should reject values outside the variant range', () => {
      expect(() => Value.int(2147483648)).toThrow(DataError);
      expect(() => Value.tinyint(128)).toThrow('Conversion error: 128 does not fit in Tinyint');
    });

    it('should wrap bigint to 64 bits', () => {
      expect(Value.bigint(2n ** 63n).value).toBe(-(2n ** 63n));
    });
  });

  describe('from', () => {
    it('should infer integer width from magnitude', () => {
      expect(Value.from(5)).toEqual({ kind: 'Int', value: 5 });
      expect(Value.from(2 ** 40)).toEqual({ kind: 'Bigint', value: 1099511627776n });
      expect(Value.from(1.5)).toEqual({ kind: 'Double', value: 1.5 });
    });

    it('should map structured inputs', () => {
      expect(Value.from(null)).toEqual({ kind: 'Null' });
      expect(Value.from([1, 'a'])).toEqual({
        kind: 'List',
        values: [{ kind: 'Int', value: 1 }, { kind: 'Text', value: 'a' }],
      });
      expect(Value.from({ a: 1 })).toEqual({ kind: 'Json', value: { a: 1 } });
      expect(Value.from(new Date(0)).kind).toBe('Timestamp');
    });

    it('should pass existing values through', () => {
      const raw = Value.raw('NOW()');
      expect(Value.from(raw)).toBe(raw);
      expect(isValue(raw)).toBe(true);
      expect(isValue({ kind: 'Nope' })).toBe(false);
    });
  });

  it('should canonicalize uuids', () => {
    expect(Value.uuid('550E8400E29B41D4A716446655440000').value).toBe('550e8400-e29b-41d4-a716-446655440000');
    expect(() => Value.uuid('not-a-uuid')).toThrow(DataError);
  });

  it('should normalize decimals', () => {
    expect(normalizeDecimal('+00012.3400')).toBe('12.34');
    expect(normalizeDecimal('-0.000')).toBe('0');
    expect(normalizeDecimal('.5')).toBe('0.5');
    expect(() => normalizeDecimal('12a')).toThrow(DataError);
  });

  it('should require a single code point for char', () => {
    expect(Value.char('é').value).toBe('é');
    expect(() => Value.char('ab')).toThrow(DataError);
  });

  it('should reject mixed arrays', () => {
    expect(() => Value.array('Int', [Value.int(1), Value.text('x')]))
      .toThrow('Type mismatch: expected Int, found Text');
  });

  it('should keep object entry order', () => {
    const object = Value.object([['b', Value.int(1)], ['a', Value.int(2)]]);
    expect([...object.entries.keys()]).toEqual(['b', 'a']);
  });

  it('should treat null, empty text and empty lists as empty', () => {
    expect(isEmptyValue(Value.null())).toBe(true);
    expect(isEmptyValue(Value.text(''))).toBe(true);
    expect(isEmptyValue(Value.list([]))).toBe(true);
    expect(isEmptyValue(Value.int(0))).toBe(false);
  });
});
