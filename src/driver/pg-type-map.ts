import * as pgTypes from 'pg-types';
import { DataError } from '../common/errors';
import { naiveDateOf, naiveDateTimeOf, parseNaiveDate, parseNaiveDateTime, parseNaiveTime } from '../value/temporal';
import { Value, type Interval } from '../value/value';
import { decodeCell } from './decode';

type PgDecoder = (raw: unknown) => Value;

const MICROS_PER_SECOND = 1_000_000;

function text(raw: unknown): string {
  return raw instanceof Date ? raw.toISOString() : String(raw);
}

function numericField(source: object, key: string): number {
  const field: unknown = Reflect.get(source, key);
  return typeof field === 'number' ? field : 0;
}

/**
 * pg hands intervals back as { years, months, days, hours, minutes, seconds, milliseconds }
 */
function intervalOf(raw: unknown): Interval {
  if (raw === null || typeof raw !== 'object') {
    throw DataError.typeMismatch('interval', typeof raw);
  }
  const seconds = (numericField(raw, 'hours') * 60 + numericField(raw, 'minutes')) * 60 + numericField(raw, 'seconds');
  return {
    months: numericField(raw, 'years') * 12 + numericField(raw, 'months'),
    days: numericField(raw, 'days'),
    microseconds: Math.round(seconds * MICROS_PER_SECOND + numericField(raw, 'milliseconds') * 1000),
  };
}

/**
 * PostgreSQL OID to Value decoder, applied to what pg's default parsers return
 */
export const PG_DECODERS: Record<number, PgDecoder> = {
  [pgTypes.builtins.BOOL]: raw => Value.bool(raw === true || raw === 't'),
  [pgTypes.builtins.INT2]: raw => Value.smallint(Number(raw)),
  [pgTypes.builtins.INT4]: raw => Value.int(Number(raw)),
  [pgTypes.builtins.INT8]: raw => Value.bigint(BigInt(text(raw))), // pg returns int8 as a string
  [pgTypes.builtins.FLOAT4]: raw => Value.float(Number(raw)),
  [pgTypes.builtins.FLOAT8]: raw => Value.double(Number(raw)),
  [pgTypes.builtins.NUMERIC]: raw => Value.decimal(text(raw)),
  [pgTypes.builtins.TEXT]: raw => Value.text(text(raw)),
  [pgTypes.builtins.VARCHAR]: raw => Value.text(text(raw)),
  [pgTypes.builtins.CHAR]: raw => Value.text(text(raw)),
  [pgTypes.builtins.BPCHAR]: raw => Value.text(text(raw)), // "blank padded char" - PostgreSQL's internal name for CHAR
  [pgTypes.builtins.UUID]: raw => Value.uuid(text(raw)),
  [pgTypes.builtins.DATE]: raw => Value.date(raw instanceof Date ? naiveDateOf(raw) : parseNaiveDate(text(raw))),
  [pgTypes.builtins.TIMESTAMP]: raw => Value.dateTime(raw instanceof Date ? naiveDateTimeOf(raw) : parseNaiveDateTime(text(raw))),
  [pgTypes.builtins.TIMESTAMPTZ]: raw => (raw instanceof Date ? Value.timestamp(raw) : decodeCell(raw)),
  [pgTypes.builtins.TIME]: raw => Value.time(parseNaiveTime(text(raw))),
  [pgTypes.builtins.INTERVAL]: raw => Value.interval(intervalOf(raw)),
  [pgTypes.builtins.JSON]: raw => Value.json(raw),
  [pgTypes.builtins.JSONB]: raw => Value.json(raw),
  [pgTypes.builtins.BYTEA]: raw => (raw instanceof Uint8Array ? Value.blob(raw) : decodeCell(raw)),
};

/**
 * Decode one pg cell by its column OID; unknown types fall back to the runtime value
 */
export function decodePgCell(raw: unknown, oid: number): Value {
  if (raw === null || raw === undefined) {
    return Value.null();
  }
  const decoder = PG_DECODERS[oid];
  return decoder ? decoder(raw) : decodeCell(raw);
}
