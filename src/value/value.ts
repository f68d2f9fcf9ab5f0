import { DataError } from '../common/errors';

/**
 * Parsed JSON tree as stored in a Json value
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Calendar date without a zone
 */
export interface NaiveDate {
  year: number;
  month: number;  // 1-12
  day: number;
}

/**
 * Wall-clock time without a zone
 */
export interface NaiveTime {
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
}

export interface NaiveDateTime {
  date: NaiveDate;
  time: NaiveTime;
}

export interface Interval {
  months: number;
  days: number;
  microseconds: number;
}

export interface NullValue { kind: 'Null' }
export interface BoolValue { kind: 'Bool'; value: boolean }
export interface TinyintValue { kind: 'Tinyint'; value: number }
export interface SmallintValue { kind: 'Smallint'; value: number }
export interface IntValue { kind: 'Int'; value: number }
export interface BigintValue { kind: 'Bigint'; value: bigint }
export interface FloatValue { kind: 'Float'; value: number }
export interface DoubleValue { kind: 'Double'; value: number }
export interface BigDecimalValue { kind: 'BigDecimal'; value: string }
export interface CharValue { kind: 'Char'; value: string }
export interface TextValue { kind: 'Text'; value: string }
export interface JsonTreeValue { kind: 'Json'; value: JsonValue }
export interface BlobValue { kind: 'Blob'; value: Uint8Array }
export interface UuidValue { kind: 'Uuid'; value: string }
export interface DateValue { kind: 'Date'; value: NaiveDate }
export interface TimeValue { kind: 'Time'; value: NaiveTime }
export interface DateTimeValue { kind: 'DateTime'; value: NaiveDateTime }
export interface TimestampValue { kind: 'Timestamp'; value: Date }
export interface IntervalValue { kind: 'Interval'; value: Interval }
export interface ArrayValue { kind: 'Array'; elementKind: ArrayElementKind; values: Value[] }
export interface ListValue { kind: 'List'; values: Value[] }
export interface ObjectValue { kind: 'Object'; entries: Map<string, Value> }
export interface RawSqlValue { kind: 'RawSql'; sql: string }

/**
 * Dynamic value exchanged with drivers and entities
 */
export type Value =
  | NullValue
  | BoolValue
  | TinyintValue
  | SmallintValue
  | IntValue
  | BigintValue
  | FloatValue
  | DoubleValue
  | BigDecimalValue
  | CharValue
  | TextValue
  | JsonTreeValue
  | BlobValue
  | UuidValue
  | DateValue
  | TimeValue
  | DateTimeValue
  | TimestampValue
  | IntervalValue
  | ArrayValue
  | ListValue
  | ObjectValue
  | RawSqlValue;

export type ValueKind = Value['kind'];

/**
 * Variants allowed as Array elements
 */
export type ArrayElementKind =
  | 'Bool'
  | 'Tinyint'
  | 'Smallint'
  | 'Int'
  | 'Bigint'
  | 'Float'
  | 'Double'
  | 'BigDecimal'
  | 'Char'
  | 'Text'
  | 'Uuid'
  | 'Date'
  | 'Time'
  | 'DateTime'
  | 'Timestamp';

/**
 * Plain inputs accepted wherever a Value is expected
 */
export type ValueInput = Value | string | number | bigint | boolean | Date | Uint8Array | null | undefined;

const VALUE_KINDS: ReadonlySet<string> = new Set<ValueKind>([
  'Null', 'Bool', 'Tinyint', 'Smallint', 'Int', 'Bigint', 'Float', 'Double', 'BigDecimal', 'Char',
  'Text', 'Json', 'Blob', 'Uuid', 'Date', 'Time', 'DateTime', 'Timestamp', 'Interval', 'Array',
  'List', 'Object', 'RawSql',
]);

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const UUID_PATTERN = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

const INT_RANGES = {
  Tinyint: [-128, 127],
  Smallint: [-32768, 32767],
  Int: [-2147483648, 2147483647],
} as const;

const NULL: NullValue = Object.freeze({ kind: 'Null' });

export function isValue(input: unknown): input is Value {
  return typeof input === 'object'
    && input !== null
    && 'kind' in input
    && typeof input.kind === 'string'
    && VALUE_KINDS.has(input.kind);
}

function checkedInt(kind: keyof typeof INT_RANGES, n: number): number {
  const [min, max] = INT_RANGES[kind];
  if (!Number.isInteger(n) || n < min || n > max) {
    throw DataError.conversion(`${n} does not fit in ${kind}`);
  }
  return n;
}

/**
 * Normalize a decimal literal: drop a leading plus sign and redundant zeros
 */
export function normalizeDecimal(text: string): string {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw DataError.parse(`'${text}' is not a decimal number`);
  }
  if (/[eE]/.test(trimmed)) {
    return trimmed.replace(/^\+/, '');
  }
  const negative = trimmed.startsWith('-');
  let body = trimmed.replace(/^[+-]/, '');
  if (body.startsWith('.')) {
    body = '0' + body;
  }
  let [whole, fraction = ''] = body.split('.');
  whole = whole.replace(/^0+(?=\d)/, '');
  fraction = fraction.replace(/0+$/, '');
  const digits = fraction ? `${whole}.${fraction}` : whole;
  return negative && /[1-9]/.test(digits) ? `-${digits}` : digits;
}

type ObjectEntries = Iterable<[string, Value]> | Record<string, Value>;

function isEntryIterable(entries: ObjectEntries): entries is Iterable<[string, Value]> {
  return Symbol.iterator in entries;
}

function fromObjectEntries(entries: ObjectEntries): Map<string, Value> {
  return isEntryIterable(entries) ? new Map(entries) : new Map(Object.entries(entries));
}

function jsonFromUnknown(input: unknown): JsonValue {
  return JSON.parse(JSON.stringify(input, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value)));
}

/**
 * Factories for every Value variant
 */
export const Value = {
  null(): NullValue {
    return NULL;
  },

  bool(value: boolean): BoolValue {
    return { kind: 'Bool', value };
  },

  tinyint(value: number): TinyintValue {
    return { kind: 'Tinyint', value: checkedInt('Tinyint', value) };
  },

  smallint(value: number): SmallintValue {
    return { kind: 'Smallint', value: checkedInt('Smallint', value) };
  },

  int(value: number): IntValue {
    return { kind: 'Int', value: checkedInt('Int', value) };
  },

  bigint(value: bigint | number): BigintValue {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      throw DataError.conversion(`${value} is not an integer`);
    }
    return { kind: 'Bigint', value: BigInt.asIntN(64, BigInt(value)) };
  },

  float(value: number): FloatValue {
    return { kind: 'Float', value: Math.fround(value) };
  },

  double(value: number): DoubleValue {
    return { kind: 'Double', value };
  },

  decimal(value: string | number | bigint): BigDecimalValue {
    return { kind: 'BigDecimal', value: normalizeDecimal(String(value)) };
  },

  char(value: string): CharValue {
    if (Array.from(value).length !== 1) {
      throw DataError.conversion(`'${value}' is not a single character`);
    }
    return { kind: 'Char', value };
  },

  text(value: string): TextValue {
    return { kind: 'Text', value };
  },

  json(value: unknown): JsonTreeValue {
    return { kind: 'Json', value: jsonFromUnknown(value) };
  },

  blob(value: Uint8Array): BlobValue {
    return { kind: 'Blob', value };
  },

  uuid(value: string): UuidValue {
    if (!UUID_PATTERN.test(value)) {
      throw DataError.parse(`'${value}' is not a UUID`);
    }
    const hex = value.replace(/-/g, '').toLowerCase();
    return {
      kind: 'Uuid',
      value: `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`,
    };
  },

  date(value: NaiveDate): DateValue {
    return { kind: 'Date', value: { ...value } };
  },

  time(value: NaiveTime): TimeValue {
    return { kind: 'Time', value: { ...value } };
  },

  dateTime(value: NaiveDateTime): DateTimeValue {
    return { kind: 'DateTime', value: { date: { ...value.date }, time: { ...value.time } } };
  },

  timestamp(value: Date): TimestampValue {
    if (Number.isNaN(value.getTime())) {
      throw DataError.conversion('invalid Date');
    }
    return { kind: 'Timestamp', value: new Date(value.getTime()) };
  },

  interval(value: Interval): IntervalValue {
    return { kind: 'Interval', value: { ...value } };
  },

  /**
   * Homogeneous array; every element must carry `elementKind`
   */
  array(elementKind: ArrayElementKind, values: Value[]): ArrayValue {
    const stray = values.find(v => v.kind !== elementKind);
    if (stray) {
      throw DataError.typeMismatch(elementKind, stray.kind);
    }
    return { kind: 'Array', elementKind, values: [...values] };
  },

  list(values: Value[]): ListValue {
    return { kind: 'List', values: [...values] };
  },

  object(entries: ObjectEntries = []): ObjectValue {
    return { kind: 'Object', entries: fromObjectEntries(entries) };
  },

  /**
   * Verbatim SQL expression, spliced into statements and never bound
   */
  raw(sql: string): RawSqlValue {
    return { kind: 'RawSql', sql };
  },

  /**
   * Infer a Value from a plain JavaScript value
   */
  from(input: unknown): Value {
    if (input === null || input === undefined) {
      return NULL;
    }
    if (isValue(input)) {
      return input;
    }
    switch (typeof input) {
      case 'boolean':
        return Value.bool(input);
      case 'bigint':
        return Value.bigint(input);
      case 'string':
        return Value.text(input);
      case 'number':
        if (Number.isInteger(input)) {
          if (input >= INT_RANGES.Int[0] && input <= INT_RANGES.Int[1]) {
            return Value.int(input);
          }
          if (Number.isSafeInteger(input)) {
            return Value.bigint(input);
          }
        }
        return Value.double(input);
      default:
        break;
    }
    if (input instanceof Date) {
      return Value.timestamp(input);
    }
    if (input instanceof Uint8Array) {
      return Value.blob(input);
    }
    if (Array.isArray(input)) {
      return Value.list(input.map(item => Value.from(item)));
    }
    if (input instanceof Map) {
      const entries: [string, Value][] = [];
      input.forEach((v: unknown, k: unknown) => entries.push([String(k), Value.from(v)]));
      return Value.object(entries);
    }
    if (typeof input === 'object') {
      return Value.json(input);
    }
    throw DataError.conversion(`cannot represent ${typeof input} as a value`);
  },

  isNull(value: Value): value is NullValue {
    return value.kind === 'Null';
  },
};

/**
 * Coerce builder input into a Value
 */
export function toValue(input: ValueInput): Value {
  return Value.from(input);
}

/**
 * Whether a condition on this value should be dropped from a wrapper
 */
export function isEmptyValue(value: Value): boolean {
  switch (value.kind) {
    case 'Null':
      return true;
    case 'Text':
      return value.value.length === 0;
    case 'List':
    case 'Array':
      return value.values.length === 0;
    default:
      return false;
  }
}
