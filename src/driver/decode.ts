import { Value } from '../value/value';

const INT32_MIN = -2147483648n;
const INT32_MAX = 2147483647n;

/**
 * Value for a cell handed back by a driver without column type information
 * 64-bit integers that fit 32 bits are narrowed to Int
 */
export function decodeCell(raw: unknown): Value {
  if (typeof raw === 'bigint') {
    return raw >= INT32_MIN && raw <= INT32_MAX ? Value.int(Number(raw)) : Value.bigint(raw);
  }
  return Value.from(raw);
}
