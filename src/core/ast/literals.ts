import type {
  BooleanLiteralNode,
  DateLiteralNode,
  DoubleLiteralNode,
  IntegerLiteralNode,
  LiteralNode,
  LongLiteralNode,
  StringLiteralNode
} from './expression-nodes.js';
import { ConfigError } from '../errors.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Plain values that are lifted to literal nodes
 */
export type LiteralValue = number | bigint | string | boolean | Date;

const toIsoDate = (value: string | Date): string => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ConfigError(String(value), 'invalid date');
    }
    const year = value.getUTCFullYear();
    if (year < 0 || year > 9999) {
      throw new ConfigError(String(year), 'date years must lie between 0000 and 9999');
    }
    return value.toISOString().slice(0, 10);
  }
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new ConfigError(value, 'dates must be written as YYYY-MM-DD');
  }
  const [, year, month, day] = match.map(Number);
  // setUTCFullYear keeps years 0-99 as written
  const calendar = new Date(0);
  calendar.setUTCFullYear(year, month - 1, day);
  if (calendar.getUTCFullYear() !== year || calendar.getUTCMonth() + 1 !== month || calendar.getUTCDate() !== day) {
    throw new ConfigError(value, 'not a calendar date');
  }
  return value;
};

/**
 * Typed literal constructors
 */
export const lit = {
  int: (value: number): IntegerLiteralNode => {
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw new ConfigError(String(value), 'integer literals must be 32-bit integers');
    }
    return { type: 'Literal', literalType: 'integer', value };
  },

  long: (value: bigint | number): LongLiteralNode => {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new ConfigError(String(value), 'long literals must be safe integers or bigints');
    }
    const long = BigInt(value);
    if (long < INT64_MIN || long > INT64_MAX) {
      throw new ConfigError(String(value), 'long literals must fit in 64 bits');
    }
    return { type: 'Literal', literalType: 'long', value: long };
  },

  double: (value: number): DoubleLiteralNode => {
    if (!Number.isFinite(value)) {
      throw new ConfigError(String(value), 'double literals must be finite');
    }
    return { type: 'Literal', literalType: 'double', value };
  },

  string: (value: string): StringLiteralNode => ({ type: 'Literal', literalType: 'string', value }),

  bool: (value: boolean): BooleanLiteralNode => ({ type: 'Literal', literalType: 'boolean', value }),

  /**
   * @param value - `YYYY-MM-DD` string or a Date (its UTC calendar day is used)
   */
  date: (value: string | Date): DateLiteralNode => ({
    type: 'Literal',
    literalType: 'date',
    value: toIsoDate(value)
  })
};

/**
 * Lifts a plain value to the narrowest matching literal node.
 * Integral numbers beyond the safe integer range become doubles.
 */
export const toLiteral = (value: LiteralValue): LiteralNode => {
  if (typeof value === 'bigint') return lit.long(value);
  if (typeof value === 'string') return lit.string(value);
  if (typeof value === 'boolean') return lit.bool(value);
  if (value instanceof Date) return lit.date(value);
  if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) return lit.int(value);
  if (Number.isSafeInteger(value)) return lit.long(value);
  return lit.double(value);
};
