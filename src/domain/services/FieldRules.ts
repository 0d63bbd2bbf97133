import { isUtf8 } from 'node:buffer';
import type { Field } from '../model/Field.js';
import type { BoundRule, LengthParams, NoParams, Rule } from '../model/Plan.js';
import { ErrorKind } from '../model/ErrorKind.js';
import { NO_PARAMS, bindRule } from '../model/Plan.js';

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOAT_PATTERN = /^[+-]?(?:inf|infinity|nan)$/i;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/** Length of the well-formed UTF-8 sequence starting at `i`, or 0 when it is malformed. */
function utf8SequenceLength(bytes: Buffer, i: number): number {
  const lead = bytes[i] ?? 0;
  if (lead < 0x80) return 1;

  let size: number;
  let low = 0x80;
  let high = 0xbf;

  if (lead >= 0xc2 && lead <= 0xdf) {
    size = 2;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    size = 3;
    if (lead === 0xe0) low = 0xa0;
    if (lead === 0xed) high = 0x9f;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    size = 4;
    if (lead === 0xf0) low = 0x90;
    if (lead === 0xf4) high = 0x8f;
  } else {
    return 0;
  }

  for (let k = 1; k < size; k++) {
    const b = bytes[i + k];
    if (b === undefined) return 0;
    const min = k === 1 ? low : 0x80;
    const max = k === 1 ? high : 0xbf;
    if (b < min || b > max) return 0;
  }

  return size;
}

/** Every byte that does not start or belong to a well-formed UTF-8 sequence, as `0xNN`. */
export function invalidUtf8Bytes(bytes: Buffer): string[] {
  const bad: string[] = [];
  let i = 0;

  while (i < bytes.length) {
    const size = utf8SequenceLength(bytes, i);
    if (size === 0) {
      bad.push(`0x${(bytes[i] ?? 0).toString(16).toUpperCase().padStart(2, '0')}`);
      i++;
    } else {
      i += size;
    }
  }

  return bad;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

function isCalendarDate(year: string, month: string, day: string): boolean {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (m < 1 || m > 12) return false;
  return d >= 1 && d <= daysInMonth(y, m);
}

function isDate(s: string): boolean {
  const match = DATE_PATTERN.exec(s);
  if (!match) return false;
  const [, year = '', month = '', day = ''] = match;
  return isCalendarDate(year, month, day);
}

function isDatetime(s: string): boolean {
  const match = DATETIME_PATTERN.exec(s);
  if (!match) return false;
  const [, year = '', month = '', day = '', hour = '', minute = '', second = ''] = match;
  return isCalendarDate(year, month, day) && Number(hour) < 24 && Number(minute) < 60 && Number(second) < 60;
}

function fitsInteger(s: string, min: bigint, max: bigint): boolean {
  if (!INTEGER_PATTERN.test(s)) return false;
  const n = BigInt(s);
  return n >= min && n <= max;
}

export const encodingRule: Rule<NoParams> = {
  name: 'Encoding',
  description: 'Validates a value only contains UTF-8 characters.',
  requiresValue: true,
  check(value) {
    if (isUtf8(value)) return null;
    return { kind: ErrorKind.BAD_ENCODING, context: { badBytes: invalidUtf8Bytes(value) } };
  },
};

/** Only bound to fields marked required. */
export const requiredRule: Rule<NoParams> = {
  name: 'Required',
  description: 'Validates the value is not empty.',
  requiresValue: false,
  check(value) {
    return value.length === 0 ? { kind: ErrorKind.REQUIRED_VALUE } : null;
  },
};

export const integerRule: Rule<NoParams> = {
  name: 'Integer',
  description: 'Validates the value is a base-10 integer within the signed 32-bit range.',
  requiresValue: true,
  check(value) {
    return fitsInteger(value.toString('utf8'), INT32_MIN, INT32_MAX) ? null : { kind: ErrorKind.TYPE_MISMATCH_INT };
  },
};

export const bigIntegerRule: Rule<NoParams> = {
  name: 'BigInteger',
  description: 'Validates the value is a base-10 integer within the signed 64-bit range.',
  requiresValue: true,
  check(value) {
    return fitsInteger(value.toString('utf8'), INT64_MIN, INT64_MAX) ? null : { kind: ErrorKind.TYPE_MISMATCH_INT };
  },
};

export const numberRule: Rule<NoParams> = {
  name: 'Number',
  description: 'Validates the value is a base-10 number within the 32-bit float range.',
  requiresValue: true,
  check(value) {
    const s = value.toString('utf8');
    if (SPECIAL_FLOAT_PATTERN.test(s)) return null;
    if (DECIMAL_PATTERN.test(s) && Number.isFinite(Math.fround(Number(s)))) return null;
    return { kind: ErrorKind.TYPE_MISMATCH_NUM };
  },
};

/** A datetime is also accepted as a date; consumers needing only the date must truncate it. */
export const dateRule: Rule<NoParams> = {
  name: 'Date',
  description: 'Validates the value is a date (YYYY-MM-DD).',
  requiresValue: true,
  check(value) {
    const s = value.toString('utf8');
    return isDate(s) || isDatetime(s) ? null : { kind: ErrorKind.TYPE_MISMATCH_DATE };
  },
};

export const datetimeRule: Rule<NoParams> = {
  name: 'Datetime',
  description: 'Validates the value is a datetime (YYYY-MM-DD HH:MM:SS).',
  requiresValue: true,
  check(value) {
    return isDatetime(value.toString('utf8')) ? null : { kind: ErrorKind.TYPE_MISMATCH_DATETIME };
  },
};

export const stringLengthRule: Rule<LengthParams> = {
  name: 'String Length',
  description: 'Validates the value is not longer than a pre-defined number of bytes.',
  requiresValue: true,
  check(value, params) {
    if (value.length <= params.length) return null;
    return { kind: ErrorKind.LENGTH_EXCEEDED, context: { maxLength: params.length } };
  },
};

/**
 * Builds the type-specific rule for a field. Returning `null` means the type
 * is known but needs no rule (e.g. a string without a length limit).
 */
export type RuleFactory = (field: Field) => BoundRule | null;

/** Lookup table from declared field type to its rule factory. */
export type RuleRegistry = ReadonlyMap<string, RuleFactory>;

export function createRuleRegistry(): Map<string, RuleFactory> {
  const stringLength: RuleFactory = (field) =>
    field.maxLength !== undefined && field.maxLength > 0
      ? bindRule(stringLengthRule, { kind: 'length', length: field.maxLength })
      : null;
  const integer: RuleFactory = () => bindRule(integerRule, NO_PARAMS);
  const bigInteger: RuleFactory = () => bindRule(bigIntegerRule, NO_PARAMS);
  const number: RuleFactory = () => bindRule(numberRule, NO_PARAMS);
  const date: RuleFactory = () => bindRule(dateRule, NO_PARAMS);
  const datetime: RuleFactory = () => bindRule(datetimeRule, NO_PARAMS);

  return new Map<string, RuleFactory>([
    ['string', stringLength],
    ['clob', stringLength],
    ['text', stringLength],
    ['integer', integer],
    ['biginteger', bigInteger],
    ['number', number],
    ['float', number],
    ['decimal', number],
    ['date', date],
    ['datetime', datetime],
    ['timestamp', datetime],
  ]);
}

export const DEFAULT_RULE_REGISTRY: RuleRegistry = createRuleRegistry();
