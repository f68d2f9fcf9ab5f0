import { DataError } from '../common/errors';
import { parseJsonText } from './json-text';
import { Value } from './value';

function keysOf(value: Value): string[] {
  return value.kind === 'Object' ? [...value.entries.keys()] : [];
}

describe('parseJsonText', () => {
  it('should lift nested text into values keeping object order', () => {
    const parsed = parseJsonText(' {"a" : [1, 2.5, "x\\"y", false, null], "b": {"9":1,"8":2} } ');

    expect(keysOf(parsed)).toEqual(['a', 'b']);
    if (parsed.kind !== 'Object') {
      throw new Error(`expected an object, got ${parsed.kind}`);
    }
    expect(parsed.entries.get('a')).toEqual(
      Value.list([Value.int(1), Value.double(2.5), Value.text('x"y'), Value.bool(false), Value.null()]),
    );
    const nested = parsed.entries.get('b');
    expect(nested && keysOf(nested)).toEqual(['9', '8']);
  });

  it('should keep the first position and the last value of a repeated key', () => {
    const parsed = parseJsonText('{"k":1,"j":2,"k":3}');

    expect(keysOf(parsed)).toEqual(['k', 'j']);
    expect(parsed).toEqual(Value.object({ k: Value.int(3), j: Value.int(2) }));
  });

  it('should size numbers the way plain values are inferred', () => {
    expect(parseJsonText('3000000000')).toEqual(Value.bigint(3000000000n));
    expect(parseJsonText('1e3')).toEqual(Value.int(1000));
    expect(parseJsonText('-0.25')).toEqual(Value.double(-0.25));
  });

  it('should decode escapes and empty containers', () => {
    expect(parseJsonText('"caf\\u00e9"')).toEqual(Value.text('café'));
    expect(parseJsonText('[]')).toEqual(Value.list([]));
    expect(keysOf(parseJsonText('{}'))).toEqual([]);
  });

  it('should report malformed text as a parse error', () => {
    expect(() => parseJsonText('{"a":1,}')).toThrow(DataError);
    expect(() => parseJsonText('')).toThrow('Parse error: Failed to parse JSON text');
  });
});
