import { DataError } from '../common/errors';
import { valueToJson, valueToText } from './format';
import { parseJsonText } from './json-text';
import {
  midnight,
  naiveToUtc,
  parseNaiveDate,
  parseNaiveDateTime,
  parseNaiveTime,
  parseTimestamp,
  utcDateTimeOf,
} from './temporal';
import {
  Value,
  isValue,
  normalizeDecimal,
  type Interval,
  type JsonValue,
  type NaiveDate,
  type NaiveDateTime,
  type NaiveTime,
} from './value';

export type ConversionResult<T> = { ok: true; value: T } | { ok: false; error: DataError };

/**
 * Two-way conversion between a typed field and a Value
 * fromValue throws on failure; fromValueOpt reports it
 */
export interface Converter<T> {
  readonly name: string;
  toValue(input: T): Value;
  fromValue(value: Value): T;
  fromValueOpt(value: Value): ConversionResult<T>;
}

type Parse<T> = (value: Value) => T;

function mismatch(expected: string, value: Value): DataError {
  return DataError.typeMismatch(expected, value.kind);
}

/**
 * Build a converter from a serializer and a parser that throws DataError
 */
export function createConverter<T>(name: string, toValue: (input: T) => Value, parse: Parse<T>): Converter<T> {
  return {
    name,
    toValue,
    fromValue: parse,
    fromValueOpt(value: Value): ConversionResult<T> {
      try {
        return { ok: true, value: parse(value) };
      } catch (error) {
        if (error instanceof DataError) {
          return { ok: false, error };
        }
        throw error;
      }
    },
  };
}

function parseNumericText(text: string, expected: string): number {
  const trimmed = text.trim();
  const n = Number(trimmed);
  if (trimmed === '' || Number.isNaN(n)) {
    throw DataError.parse(`Failed to parse '${text}' as ${expected}`);
  }
  return n;
}

function parseBigintText(text: string): bigint {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw DataError.parse(`Failed to parse '${text}' as bigint`);
  }
  return BigInt(trimmed);
}

function truncateFinite(n: number, expected: string): bigint {
  if (!Number.isFinite(n)) {
    throw DataError.conversion(`${n} does not fit ${expected}`);
  }
  return BigInt(Math.trunc(n));
}

/**
 * Integer reading with two's-complement wrap to `bits`
 */
function integerParser(expected: string, bits: number, accepts: ReadonlyArray<Value['kind']>): Parse<number> {
  return value => {
    let raw: bigint;
    switch (value.kind) {
      case 'Tinyint':
      case 'Smallint':
      case 'Int':
        if (!accepts.includes(value.kind)) {
          throw mismatch(expected, value);
        }
        raw = BigInt(value.value);
        break;
      case 'Bigint':
        if (!accepts.includes(value.kind)) {
          throw mismatch(expected, value);
        }
        raw = value.value;
        break;
      case 'BigDecimal':
        raw = truncateFinite(Number(value.value), expected);
        break;
      case 'Text':
        raw = truncateFinite(parseNumericText(value.value, expected), expected);
        break;
      default:
        throw mismatch(expected, value);
    }
    return Number(BigInt.asIntN(bits, raw));
  };
}

const bool = createConverter<boolean>('boolean', Value.bool, value => {
  switch (value.kind) {
    case 'Bool':
      return value.value;
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
      return value.value !== 0;
    case 'Bigint':
      return value.value !== 0n;
    case 'Null':
      return false;
    case 'Text': {
      const lower = value.value.trim().toLowerCase();
      if (lower === '' || ['false', '0', 'no', 'off'].includes(lower)) {
        return false;
      }
      if (['true', '1', 'yes', 'on'].includes(lower)) {
        return true;
      }
      throw DataError.parse(`Failed to parse '${value.value}' as bool`);
    }
    default:
      throw mismatch('boolean', value);
  }
});

const tinyint = createConverter<number>('tinyint', Value.tinyint, integerParser('tinyint', 8, ['Tinyint']));
const smallint = createConverter<number>('smallint', Value.smallint, integerParser('smallint', 16, ['Tinyint', 'Smallint']));
const int = createConverter<number>('int', Value.int, integerParser('int', 32, ['Tinyint', 'Smallint', 'Int', 'Bigint']));

const bigint = createConverter<bigint>('bigint', Value.bigint, value => {
  switch (value.kind) {
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
      return BigInt(value.value);
    case 'Bigint':
      return value.value;
    case 'BigDecimal':
      return parseBigintText(value.value.split('.')[0]);
    case 'Text':
      return parseBigintText(value.value);
    default:
      throw mismatch('bigint', value);
  }
});

const float = createConverter<number>('float', Value.float, value => {
  switch (value.kind) {
    case 'Float':
      return value.value;
    case 'BigDecimal':
      return Math.fround(Number(value.value));
    case 'Text':
      return Math.fround(parseNumericText(value.value, 'float'));
    default:
      throw mismatch('float', value);
  }
});

const double = createConverter<number>('double', Value.double, value => {
  switch (value.kind) {
    case 'Float':
    case 'Double':
      return value.value;
    case 'BigDecimal':
      return Number(value.value);
    case 'Text':
      return parseNumericText(value.value, 'double');
    default:
      throw mismatch('double', value);
  }
});

/**
 * Any numeric variant as a JS number; the default for `number` properties
 */
const number = createConverter<number>('number', n => Value.from(n), value => {
  switch (value.kind) {
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Float':
    case 'Double':
      return value.value;
    case 'Bigint':
      return Number(value.value);
    case 'BigDecimal':
      return Number(value.value);
    case 'Text':
      return parseNumericText(value.value, 'number');
    default:
      throw mismatch('number', value);
  }
});

const decimal = createConverter<string>('decimal', Value.decimal, value => {
  switch (value.kind) {
    case 'BigDecimal':
      return value.value;
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Bigint':
      return value.value.toString();
    case 'Float':
    case 'Double':
      if (!Number.isFinite(value.value)) {
        throw DataError.conversion(`Cannot convert ${value.value} to decimal`);
      }
      return normalizeDecimal(String(value.value));
    case 'Text':
      return normalizeDecimal(value.value);
    default:
      throw mismatch('decimal', value);
  }
});

const char = createConverter<string>('char', Value.char, value => {
  switch (value.kind) {
    case 'Char':
      return value.value;
    case 'Text':
      if (Array.from(value.value).length !== 1) {
        throw DataError.conversion(`String '${value.value}' is not a single character`);
      }
      return value.value;
    default:
      throw mismatch('char', value);
  }
});

/**
 * Every variant renders through its canonical text form
 */
const string = createConverter<string>('string', Value.text, valueToText);

const json = createConverter<JsonValue>('json', Value.json, value => {
  switch (value.kind) {
    case 'Json':
      return value.value;
    case 'Text':
      try {
        return Value.json(JSON.parse(value.value)).value;
      } catch {
        return value.value;
      }
    default:
      return valueToJson(value);
  }
});

const blob = createConverter<Uint8Array>('blob', Value.blob, value => {
  switch (value.kind) {
    case 'Blob':
      return value.value;
    case 'Text':
      return Buffer.from(value.value, 'utf-8');
    default:
      throw mismatch('blob', value);
  }
});

const uuid = createConverter<string>('uuid', Value.uuid, value => {
  switch (value.kind) {
    case 'Uuid':
      return value.value;
    case 'Text':
      return Value.uuid(value.value).value;
    case 'Blob':
      if (value.value.length !== 16) {
        throw DataError.conversion(`Expected 16 bytes for a UUID, found ${value.value.length}`);
      }
      return Value.uuid(Buffer.from(value.value).toString('hex')).value;
    default:
      throw mismatch('uuid', value);
  }
});

const date = createConverter<NaiveDate>('date', Value.date, value => {
  switch (value.kind) {
    case 'Date':
      return { ...value.value };
    case 'DateTime':
      return { ...value.value.date };
    case 'Timestamp':
      return utcDateTimeOf(value.value).date;
    case 'Text':
      return parseNaiveDate(value.value);
    default:
      throw mismatch('date', value);
  }
});

const time = createConverter<NaiveTime>('time', Value.time, value => {
  switch (value.kind) {
    case 'Time':
      return { ...value.value };
    case 'DateTime':
      return { ...value.value.time };
    case 'Timestamp':
      return utcDateTimeOf(value.value).time;
    case 'Text':
      return parseNaiveTime(value.value);
    default:
      throw mismatch('time', value);
  }
});

const dateTime = createConverter<NaiveDateTime>('dateTime', Value.dateTime, value => {
  switch (value.kind) {
    case 'DateTime':
      return { date: { ...value.value.date }, time: { ...value.value.time } };
    case 'Date':
      return midnight(value.value);
    case 'Timestamp':
      return utcDateTimeOf(value.value);
    case 'Text':
      return parseNaiveDateTime(value.value);
    default:
      throw mismatch('dateTime', value);
  }
});

/**
 * UTC instant as a JS Date; the default for `Date` properties
 */
const timestamp = createConverter<Date>('timestamp', Value.timestamp, value => {
  switch (value.kind) {
    case 'Timestamp':
      return new Date(value.value.getTime());
    case 'DateTime':
      return naiveToUtc(value.value);
    case 'Date':
      return naiveToUtc(midnight(value.value));
    case 'Text':
      return parseTimestamp(value.value);
    case 'Bigint':
      return new Date(Number(value.value));
    default:
      throw mismatch('timestamp', value);
  }
});

const interval = createConverter<Interval>('interval', Value.interval, value => {
  if (value.kind !== 'Interval') {
    throw mismatch('interval', value);
  }
  return { ...value.value };
});

/**
 * Identity: keep the dynamic value as-is
 */
const value = createConverter<Value>('value', v => v, v => v);

/**
 * Object values keyed in insertion order; stored as JSON text by drivers without a JSON type
 */
const object = createConverter<Map<string, Value>>('object', entries => Value.object(entries), v => {
  switch (v.kind) {
    case 'Object':
      return new Map(v.entries);
    case 'Json':
      return jsonObjectEntries(v.value);
    case 'Text': {
      const parsed = parseJsonText(v.value);
      if (parsed.kind !== 'Object') {
        throw DataError.typeMismatch('object', parsed.kind);
      }
      return parsed.entries;
    }
    default:
      throw mismatch('object', v);
  }
});

function jsonObjectEntries(tree: JsonValue): Map<string, Value> {
  if (tree === null || typeof tree !== 'object' || Array.isArray(tree)) {
    throw DataError.typeMismatch('object', Array.isArray(tree) ? 'array' : typeof tree);
  }
  return new Map(Object.entries(tree).map(([key, entry]) => [key, jsonToValue(entry)]));
}

/**
 * Lift a JSON tree into Values: arrays become Lists, objects become Objects
 */
export function jsonToValue(tree: JsonValue): Value {
  if (tree === null) {
    return Value.null();
  }
  if (Array.isArray(tree)) {
    return Value.list(tree.map(jsonToValue));
  }
  if (typeof tree === 'object') {
    return Value.object(Object.entries(tree).map(([key, entry]): [string, Value] => [key, jsonToValue(entry)]));
  }
  return Value.from(tree);
}

/**
 * Converter guessed from the runtime JS value; used when no explicit converter is declared
 */
const auto: Converter<unknown> = createConverter<unknown>('auto', input => (isValue(input) ? input : Value.from(input)), v => {
  switch (v.kind) {
    case 'Null':
      return null;
    case 'Json':
      return v.value;
    case 'Object':
      return v.entries;
    case 'List':
    case 'Array':
      return v.values.map(item => auto.fromValue(item));
    case 'Date':
    case 'Time':
    case 'DateTime':
    case 'Interval':
      return v.value;
    case 'RawSql':
      return v.sql;
    default:
      return v.value;
  }
});

function optional<T>(inner: Converter<T>): Converter<T | null> {
  return createConverter<T | null>(
    `${inner.name} | null`,
    input => (input === null || input === undefined ? Value.null() : inner.toValue(input)),
    v => (v.kind === 'Null' ? null : inner.fromValue(v)),
  );
}

function list<T>(inner: Converter<T>): Converter<T[]> {
  return createConverter<T[]>(
    `${inner.name}[]`,
    items => Value.list(items.map(item => inner.toValue(item))),
    v => {
      if (v.kind !== 'List' && v.kind !== 'Array') {
        throw mismatch(`${inner.name}[]`, v);
      }
      if (v.kind === 'List') {
        const kinds = new Set(v.values.map(item => item.kind));
        if (kinds.size > 1) {
          throw DataError.typeMismatch(`homogeneous list of ${inner.name}`, [...kinds].join('|'));
        }
      }
      return v.values.map(item => inner.fromValue(item));
    },
  );
}

/**
 * String-keyed map; insertion order is kept on the Object side only
 */
function record<T>(inner: Converter<T>): Converter<Record<string, T>> {
  return createConverter<Record<string, T>>(
    `Record<string, ${inner.name}>`,
    input => Value.object(Object.entries(input).map(([key, item]): [string, Value] => [key, inner.toValue(item)])),
    v => {
      const entries = object.fromValue(v);
      const result: Record<string, T> = {};
      entries.forEach((item, key) => {
        result[key] = inner.fromValue(item);
      });
      return result;
    },
  );
}

/**
 * Fixed-length tuple stored as a List
 */
function tuple<A>(a: Converter<A>): Converter<[A]>;
function tuple<A, B>(a: Converter<A>, b: Converter<B>): Converter<[A, B]>;
function tuple<A, B, C>(a: Converter<A>, b: Converter<B>, c: Converter<C>): Converter<[A, B, C]>;
function tuple<A, B, C, D>(a: Converter<A>, b: Converter<B>, c: Converter<C>, d: Converter<D>): Converter<[A, B, C, D]>;
function tuple(...parts: Converter<unknown>[]): Converter<unknown[]> {
  const name = `[${parts.map(c => c.name).join(', ')}]`;
  return createConverter<unknown[]>(
    name,
    input => Value.list(parts.map((c, i) => c.toValue(input[i]))),
    v => {
      if (v.kind !== 'List' && v.kind !== 'Array') {
        throw mismatch(name, v);
      }
      if (v.values.length !== parts.length) {
        throw DataError.typeMismatch(`${parts.length}-tuple`, `${v.values.length} values`);
      }
      return parts.map((c, i) => c.fromValue(v.values[i]));
    },
  );
}

export const Converters = {
  bool,
  tinyint,
  smallint,
  int,
  bigint,
  float,
  double,
  number,
  decimal,
  char,
  string,
  json,
  blob,
  uuid,
  date,
  time,
  dateTime,
  timestamp,
  interval,
  value,
  object,
  auto,
  optional,
  list,
  record,
  tuple,
};
