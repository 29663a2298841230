// src/decoders.ts

import { assertPayload } from './errors.js';
import type { Temperature } from './types/ramses-types.js';
import { hexToBytes, hexToInt } from './utils/utils.js';

/**
 * Decodes a boolean byte: 00 is false, C8 is true, FF is not available.
 */
export function decodeBool(value: string): boolean | null {
  assertPayload(value === '00' || value === 'C8' || value === 'FF', `Invalid boolean: '${value}'`);
  return value === 'FF' ? null : value === 'C8';
}

/**
 * Decodes a percentage byte (0-200, in steps of 0.5%) as a fraction from 0.0 to 1.0.
 * EF, FE and FF mean not available.
 */
export function decodePercent(value: string): number | null {
  assertPayload(value.length === 2, `Invalid percentage length: '${value}'`);
  if (value === 'EF' || value === 'FE' || value === 'FF') return null;
  const raw = hexToInt(value);
  assertPayload(raw <= 200, `Percentage out of range: 0x${value}`);
  return raw / 200;
}

/**
 * Decodes a two's complement temperature, in hundredths of a degree.
 * @returns degrees C, `false` for 7EFF (disabled), null for 7FFF or 31FF (not available)
 */
export function decodeTemperature(value: string): Temperature {
  assertPayload(value.length === 4, `Invalid temperature length: '${value}'`);
  if (value === '31FF' || value === '7FFF') return null;
  if (value === '7EFF') return false;
  const temp = hexToInt(value);
  return (temp < 0x8000 ? temp : temp - 0x10000) / 100;
}

/**
 * Decodes a date (`DDMMYYYY`, the top three bits of the day hold the weekday).
 * @returns `YYYY-MM-DD`, or null for FFFFFFFF
 */
export function decodeDate(value: string): string | null {
  assertPayload(value.length === 8, `Invalid date length: '${value}'`);
  if (value === 'FFFFFFFF') return null;
  const day = hexToInt(value.slice(0, 2)) & 0x1f;
  const month = hexToInt(value.slice(2, 4));
  const year = hexToInt(value.slice(4, 8));
  if (day < 1 || month < 1 || month > 12) {
    throw new RangeError(`Invalid date: ${value}`);
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Decodes the printable ASCII characters of a hex string.
 * @returns the trimmed text, or null if nothing printable remains
 */
export function decodeString(value: string): string | null {
  const printable = Array.from(hexToBytes(value))
    .filter(byte => byte > 31 && byte < 127)
    .map(byte => String.fromCharCode(byte))
    .join('');
  return printable.length > 0 ? printable.trim() : null;
}

/**
 * Splits a byte into eight bits, least significant first.
 */
export function decodeFlags8(value: string): number[] {
  assertPayload(value.length === 2, `Invalid flags length: '${value}'`);
  const byte = hexToInt(value);
  return Array.from({ length: 8 }, (_, bit) => (byte >> bit) & 1);
}

/**
 * Decodes an unsigned 16-bit value, optionally scaled down; 7FFF means not available.
 */
export function decodeDouble(value: string, factor: number = 1): number | null {
  assertPayload(value.length === 4, `Invalid value length: '${value}'`);
  if (value === '7FFF') return null;
  const result = hexToInt(value);
  assertPayload(result < 32767, `Value out of range: 0x${value}`);
  return factor === 1 ? result : result / factor;
}
