import { DataError } from '../common/errors';
import { formatInterval, formatNaiveDate, formatNaiveDateTime, formatNaiveTime } from './temporal';
import type { JsonValue, Value } from './value';

const DESCRIBE_JSON_LIMIT = 100;
const DESCRIBE_BLOB_LIMIT = 20;

/**
 * Canonical string form of a value, used by the string converter
 */
export function valueToText(value: Value): string {
  switch (value.kind) {
    case 'Null':
      return '';
    case 'Bool':
      return String(value.value);
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Float':
    case 'Double':
      return String(value.value);
    case 'Bigint':
      return value.value.toString();
    case 'BigDecimal':
    case 'Char':
    case 'Text':
    case 'Uuid':
      return value.value;
    case 'Json':
      return JSON.stringify(value.value);
    case 'Blob':
      return new TextDecoder('utf-8', { fatal: false }).decode(value.value);
    case 'Date':
      return formatNaiveDate(value.value);
    case 'Time':
      return formatNaiveTime(value.value);
    case 'DateTime':
      return formatNaiveDateTime(value.value);
    case 'Timestamp':
      return value.value.toISOString();
    case 'Interval':
      return formatInterval(value.value);
    case 'Array':
    case 'List':
      return value.values.map(valueToText).join(',');
    case 'Object':
      return valueToJsonText(value);
    case 'RawSql':
      return value.sql;
  }
}

/**
 * JSON projection of a value; temporal values become strings, bigints stay exact as strings
 */
export function valueToJson(value: Value): JsonValue {
  switch (value.kind) {
    case 'Null':
      return null;
    case 'Bool':
      return value.value;
    case 'Tinyint':
    case 'Smallint':
    case 'Int':
    case 'Float':
    case 'Double':
      if (!Number.isFinite(value.value)) {
        throw DataError.conversion(`${value.value} is not a JSON number`);
      }
      return value.value;
    case 'Bigint':
      return Number.isSafeInteger(Number(value.value)) ? Number(value.value) : value.value.toString();
    case 'Json':
      return value.value;
    case 'Array':
    case 'List':
      return value.values.map(valueToJson);
    case 'Object': {
      const result: { [key: string]: JsonValue } = {};
      value.entries.forEach((entry, key) => {
        result[key] = valueToJson(entry);
      });
      return result;
    }
    case 'Blob':
      return Buffer.from(value.value).toString('base64');
    default:
      return valueToText(value);
  }
}

/**
 * JSON text of a value; object keys are written in entry order, integer-like keys included
 */
export function valueToJsonText(value: Value): string {
  switch (value.kind) {
    case 'Array':
    case 'List':
      return `[${value.values.map(valueToJsonText).join(',')}]`;
    case 'Object': {
      const members: string[] = [];
      value.entries.forEach((entry, key) => {
        members.push(`${JSON.stringify(key)}:${valueToJsonText(entry)}`);
      });
      return `{${members.join(',')}}`;
    }
    default:
      return JSON.stringify(valueToJson(value));
  }
}

/**
 * Short human-readable rendering for logs
 */
export function describeValue(value: Value): string {
  switch (value.kind) {
    case 'Null':
      return 'null';
    case 'Char':
    case 'Text':
      return `'${value.value.replace(/'/g, "''")}'`;
    case 'Uuid':
    case 'DateTime':
    case 'Timestamp':
      return `'${valueToText(value)}'`;
    case 'Date':
      return `DATE '${valueToText(value)}'`;
    case 'Time':
      return `TIME '${valueToText(value)}'`;
    case 'Json': {
      const json = JSON.stringify(value.value);
      return json.length > DESCRIBE_JSON_LIMIT ? 'JSON(truncated)' : json;
    }
    case 'Blob':
      return value.value.length > DESCRIBE_BLOB_LIMIT
        ? `BLOB(${value.value.length} bytes, truncated)`
        : valueToText(value);
    case 'Array':
      return `ARRAY(${value.values.map(describeValue).join(', ')})`;
    case 'List':
      return `[${value.values.map(describeValue).join(', ')}]`;
    case 'Object':
      return `OBJECT(${value.entries.size} fields)`;
    case 'RawSql':
      return `[RAW_SQL] ${value.sql}`;
    default:
      return valueToText(value);
  }
}

export function describeValues(values: Value[]): string {
  return values.map(describeValue).join(', ');
}
