import { InvalidArgumentError } from '../common/errors';
import { Platform } from '../common/types';
import { valueToJsonText, valueToText } from '../value/format';
import { formatInterval, formatNaiveDate, formatNaiveDateTime, formatNaiveTime } from '../value/temporal';
import type { NaiveDateTime, Value } from '../value/value';

/**
 * Plain JavaScript value handed to a driver as a bind parameter
 */
export type DriverParam = null | boolean | number | bigint | string | Buffer | Date | DriverParam[];

function localDate(dateTime: NaiveDateTime): Date {
  const { date, time } = dateTime;
  return new Date(date.year, date.month - 1, date.day, time.hour, time.minute, time.second, Math.floor(time.microsecond / 1000));
}

/**
 * Bind form of a value for one backend
 * RawSql never reaches a driver: it is spliced into the statement while rendering
 */
export function toDriverParam(value: Value, platform: Platform): DriverParam {
  switch (value.kind) {
    case 'Null':
      return null;
    case 'Bool':
      return platform === Platform.SQLite || platform === Platform.Oracle ? (value.value ? 1 : 0) : value.value;
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Float':
    case 'Double':
      return value.value;
    case 'Bigint':
      return platform === Platform.SQLite ? value.value : value.value.toString();
    case 'BigDecimal':
    case 'Char':
    case 'Text':
    case 'Uuid':
      return value.value;
    case 'Json':
      return JSON.stringify(value.value);
    case 'Blob':
      return Buffer.from(value.value);
    case 'Date':
      return platform === Platform.Oracle
        ? new Date(value.value.year, value.value.month - 1, value.value.day)
        : formatNaiveDate(value.value);
    case 'Time':
      return formatNaiveTime(value.value);
    case 'DateTime':
      return platform === Platform.Oracle ? localDate(value.value) : formatNaiveDateTime(value.value);
    case 'Timestamp':
      return platform === Platform.SQLite ? value.value.toISOString() : value.value;
    case 'Interval':
      return formatInterval(value.value);
    case 'Array':
    case 'List':
      return platform === Platform.Postgres
        ? value.values.map(element => toDriverParam(element, platform))
        : valueToJsonText(value);
    case 'Object':
      return valueToJsonText(value);
    case 'RawSql':
      throw new InvalidArgumentError(`Raw SQL cannot be bound as a parameter: ${valueToText(value)}`);
  }
}

export function toDriverParams(values: readonly Value[], platform: Platform): DriverParam[] {
  return values.map(value => toDriverParam(value, platform));
}
