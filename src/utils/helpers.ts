// src/utils/helpers.ts

import type { Temperature } from '../types/ramses-types.js';
import { hexToBytes, hexToInt, toHex } from './utils.js';

const NULL_DTM = 'FF'.repeat(6);
const NULL_DTS = '00000000007F';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function toDate(dtm: Date | string): Date {
  const date = typeof dtm === 'string' ? new Date(dtm) : dtm;
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid date/time: ${String(dtm)}`);
  }
  return date;
}

function assertDateParts(year: number, month: number, day: number, hour: number, minute: number, second: number): void {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
    throw new RangeError(`Invalid date/time: ${year}-${month}-${day} ${hour}:${minute}:${second}`);
  }
}

/**
 * Decodes a 6 or 7 byte local date/time (`[ss]mmhhDDMMYYYY`).
 * @returns `YYYY-MM-DDTHH:MM:SS`, or null for the all-FF value.
 */
export function dtmFromHex(value: string): string | null {
  if (value === NULL_DTM) return null;
  if (value.length !== 12 && value.length !== 14) {
    throw new TypeError(`Invalid date/time length: '${value}'`);
  }
  const full = value.length === 12 ? `00${value}` : value;

  const second = hexToInt(full.slice(0, 2)) & 0x7f;
  const minute = hexToInt(full.slice(2, 4));
  const hour = hexToInt(full.slice(4, 6)) & 0x1f;
  const day = hexToInt(full.slice(6, 8));
  const month = hexToInt(full.slice(8, 10));
  const year = hexToInt(full.slice(10, 14));
  assertDateParts(year, month, day, hour, minute, second);

  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}T${pad2(hour)}:${pad2(minute)}:${pad2(second)}`;
}

/**
 * Encodes a local date/time as `mmhhDDMMYYYY` (seconds are dropped).
 * @param dtm - a Date, or an ISO string without offset (read as local time)
 */
export function dtmToHex(dtm: Date | string | null): string {
  if (dtm === null) return NULL_DTM;
  const date = toDate(dtm);
  return [
    toHex(date.getMinutes()),
    toHex(date.getHours()),
    toHex(date.getDate()),
    toHex(date.getMonth() + 1),
    toHex(date.getFullYear(), 4),
  ].join('');
}

// 48 bits: wider than the 32-bit operators, so fields are taken with division
const DTS_FIELDS = {
  year: { shift: 24, bits: 7 },
  month: { shift: 36, bits: 4 },
  day: { shift: 31, bits: 5 },
  hour: { shift: 19, bits: 5 },
  minute: { shift: 13, bits: 6 },
  second: { shift: 7, bits: 6 },
} as const;

type DtsField = keyof typeof DTS_FIELDS;

function dtsField(value: number, field: DtsField): number {
  const { shift, bits } = DTS_FIELDS[field];
  return Math.floor(value / 2 ** shift) % 2 ** bits;
}

/**
 * Decodes the packed 48-bit timestamp used by fault log entries.
 * @returns `YY-MM-DDTHH:MM:SS`, or null for the empty timestamp.
 */
export function dtsFromHex(value: string): string | null {
  if (value === NULL_DTS) return null;
  if (value.length !== 12) {
    throw new TypeError(`Invalid timestamp length: '${value}'`);
  }
  const packed = hexToInt(value);
  const parts = {
    year: dtsField(packed, 'year'),
    month: dtsField(packed, 'month'),
    day: dtsField(packed, 'day'),
    hour: dtsField(packed, 'hour'),
    minute: dtsField(packed, 'minute'),
    second: dtsField(packed, 'second'),
  };
  assertDateParts(parts.year, parts.month, parts.day, parts.hour, parts.minute, parts.second);

  return `${pad2(parts.year)}-${pad2(parts.month)}-${pad2(parts.day)}T${pad2(parts.hour)}:${pad2(parts.minute)}:${pad2(parts.second)}`;
}

export function dtsToHex(dtm: Date | string | null): string {
  if (dtm === null) return NULL_DTS;
  const date = toDate(dtm);
  const fields: Record<DtsField, number> = {
    year: date.getFullYear() % 100,
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  };
  let packed = 0x7f;
  for (const [field, value] of Object.entries(fields)) {
    if (isDtsField(field)) {
      packed += value * 2 ** DTS_FIELDS[field].shift;
    }
  }
  return toHex(packed, 12);
}

function isDtsField(field: string): field is DtsField {
  return field in DTS_FIELDS;
}

/** Codes that decode as a sentinel rather than a temperature */
const RESERVED_TEMPS: readonly string[] = ['31FF', '7EFF', '7FFF'];

/**
 * Encodes a temperature as a 2-byte two's complement value, in hundredths of a degree.
 * `null` is encoded as 7FFF (not available), `false` as 7EFF (disabled).
 */
export function tempToHex(value: Temperature): string {
  if (value === null) return '7FFF';
  if (value === false) return '7EFF';
  const temp = Math.round(value * 100);
  if (temp < -0x8000 || temp > 0x7fff) {
    throw new RangeError(`Temperature out of range: ${value}`);
  }
  const hex = toHex(temp >= 0 ? temp : temp + 0x10000, 4);
  if (RESERVED_TEMPS.includes(hex)) {
    throw new RangeError(`Temperature is a reserved value: ${value}`);
  }
  return hex;
}

/**
 * Encodes a fraction (0.0-1.0) at 0.5% resolution, null as FF.
 */
export function percentToHex(value: number | null): string {
  if (value === null) return 'FF';
  if (value < 0 || value > 1) {
    throw new RangeError(`Percentage out of range: ${value}`);
  }
  return toHex(Math.round(value * 200));
}

/**
 * Encodes a string of single-byte characters.
 */
export function strToHex(value: string): string {
  return Array.from(value, char => {
    const code = char.charCodeAt(0);
    if (code > 0xff) {
      throw new RangeError(`Cannot encode character: '${char}'`);
    }
    return toHex(code);
  }).join('');
}

/**
 * Packs eight flags into a byte.
 * @param flags - eight values of 0 or 1
 * @param lsb - if true, the first flag is the least significant bit
 */
export function flag8ToHex(flags: readonly number[], lsb: boolean = false): string {
  if (flags.length !== 8 || !flags.every(flag => flag === 0 || flag === 1)) {
    throw new RangeError(`Expected eight flags of 0 or 1, got: [${flags.join(', ')}]`);
  }
  const byte = flags.reduce<number>((acc, flag, idx) => acc | (flag << (lsb ? idx : 7 - idx)), 0);
  return toHex(byte);
}

/**
 * Decodes the null-terminated ASCII text that some payloads carry.
 */
export function bytesToText(hex: string): string {
  const bytes = hexToBytes(hex);
  const end = bytes.indexOf(0);
  return String.fromCharCode(...(end === -1 ? bytes : bytes.subarray(0, end)));
}
