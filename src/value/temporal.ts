import { isValid, parse, parseISO } from 'date-fns';
import { DataError } from '../common/errors';
import type { Interval, NaiveDate, NaiveDateTime, NaiveTime } from './value';

// Tried in order; the first format that consumes the whole string wins
const DATE_FORMATS = ['yyyy-MM-dd', 'yyyy/MM/dd', 'yyyyMMdd'];
const DATE_TIME_FORMATS = [
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  'yyyy/MM/dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  "yyyy-MM-dd'T'HH:mm",
  'yyyy-MM-dd',
];

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;
const FRACTION_PATTERN = /^(.*?)(?:\.(\d{1,9}))?$/;
const ZONE_PATTERN = /(Z|[+-]\d{2}(:?\d{2})?)$/i;
const REFERENCE_DATE = new Date(2000, 0, 1);

const MICROS_PER_SECOND = 1_000_000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function fractionToMicros(fraction: string | undefined): number {
  if (!fraction) {
    return 0;
  }
  return parseInt(fraction.padEnd(6, '0').slice(0, 6), 10);
}

function tryFormats(text: string, formats: string[]): Date | undefined {
  for (const format of formats) {
    const parsed = parse(text, format, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

export function formatNaiveDate(date: NaiveDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

export function formatNaiveTime(time: NaiveTime): string {
  const base = `${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
  return time.microsecond > 0 ? `${base}.${pad(time.microsecond, 6)}` : base;
}

export function formatNaiveDateTime(dateTime: NaiveDateTime): string {
  return `${formatNaiveDate(dateTime.date)} ${formatNaiveTime(dateTime.time)}`;
}

/**
 * ISO-8601 duration, e.g. P1M2DT3.5S
 */
export function formatInterval(interval: Interval): string {
  const seconds = interval.microseconds / MICROS_PER_SECOND;
  const timePart = interval.microseconds !== 0 ? `T${seconds}S` : '';
  const body = `${interval.months ? `${interval.months}M` : ''}${interval.days ? `${interval.days}D` : ''}${timePart}`;
  return `P${body || '0D'}`;
}

export function parseNaiveDate(text: string): NaiveDate {
  const parsed = tryFormats(text.trim(), DATE_FORMATS);
  if (!parsed) {
    throw DataError.parse(`Failed to parse '${text}' as a date`);
  }
  return naiveDateOf(parsed);
}

export function parseNaiveTime(text: string): NaiveTime {
  const match = TIME_PATTERN.exec(text.trim());
  if (!match) {
    throw DataError.parse(`Failed to parse '${text}' as a time`);
  }
  const time: NaiveTime = {
    hour: parseInt(match[1], 10),
    minute: parseInt(match[2], 10),
    second: match[3] ? parseInt(match[3], 10) : 0,
    microsecond: fractionToMicros(match[4]),
  };
  if (time.hour > 23 || time.minute > 59 || time.second > 59) {
    throw DataError.parse(`Failed to parse '${text}' as a time`);
  }
  return time;
}

export function parseNaiveDateTime(text: string): NaiveDateTime {
  const [, base, fraction] = FRACTION_PATTERN.exec(text.trim()) ?? [];
  const parsed = base ? tryFormats(base, DATE_TIME_FORMATS) : undefined;
  if (!parsed) {
    throw DataError.parse(`Failed to parse '${text}' as a date-time`);
  }
  const dateTime = naiveDateTimeOf(parsed);
  dateTime.time.microsecond = fractionToMicros(fraction);
  return dateTime;
}

/**
 * Parse an instant; text without a zone designator is read as UTC
 */
export function parseTimestamp(text: string): Date {
  const trimmed = text.trim();
  if (ZONE_PATTERN.test(trimmed) && /\d[T ]\d/.test(trimmed)) {
    const parsed = parseISO(trimmed.replace(' ', 'T'));
    if (isValid(parsed)) {
      return parsed;
    }
    throw DataError.parse(`Failed to parse '${text}' as a timestamp`);
  }
  return naiveToUtc(parseNaiveDateTime(trimmed));
}

export function naiveDateOf(date: Date): NaiveDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

export function naiveTimeOf(date: Date): NaiveTime {
  return {
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
    microsecond: date.getMilliseconds() * 1000,
  };
}

/**
 * Local wall-clock reading of a JS Date, the way drivers hand back zone-less columns
 */
export function naiveDateTimeOf(date: Date): NaiveDateTime {
  return { date: naiveDateOf(date), time: naiveTimeOf(date) };
}

export function utcDateTimeOf(instant: Date): NaiveDateTime {
  return {
    date: { year: instant.getUTCFullYear(), month: instant.getUTCMonth() + 1, day: instant.getUTCDate() },
    time: {
      hour: instant.getUTCHours(),
      minute: instant.getUTCMinutes(),
      second: instant.getUTCSeconds(),
      microsecond: instant.getUTCMilliseconds() * 1000,
    },
  };
}

export function naiveToUtc(dateTime: NaiveDateTime): Date {
  const { date, time } = dateTime;
  return new Date(Date.UTC(
    date.year,
    date.month - 1,
    date.day,
    time.hour,
    time.minute,
    time.second,
    Math.floor(time.microsecond / 1000),
  ));
}

export function midnight(date: NaiveDate): NaiveDateTime {
  return { date: { ...date }, time: { hour: 0, minute: 0, second: 0, microsecond: 0 } };
}
