// src/utils/utils.ts

const HEX_PATTERN = /^[0-9A-Fa-f]*$/;

/**
 * Parses a hex string into an unsigned integer.
 * @param hex - up to 13 hex digits (anything wider loses precision)
 * @returns The integer value.
 * @throws TypeError if the string is empty or not hex.
 */
export function hexToInt(hex: string): number {
  if (hex.length === 0 || hex.length > 13 || !HEX_PATTERN.test(hex)) {
    throw new TypeError(`Not a hex value: '${hex}'`);
  }
  return parseInt(hex, 16);
}

/**
 * Formats an unsigned integer as an upper-case hex string of fixed width.
 * @param value - The integer to format.
 * @param width - Number of hex digits.
 * @returns The zero-padded hex string.
 * @throws RangeError if the value is negative, fractional, or too wide.
 */
export function toHex(value: number, width: number = 2): string {
  if (!Number.isInteger(value) || value < 0 || value >= 16 ** width) {
    throw new RangeError(`Value ${value} does not fit in ${width} hex digits`);
  }
  return value.toString(16).toUpperCase().padStart(width, '0');
}

/**
 * Splits a hex string into its bytes.
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !HEX_PATTERN.test(hex)) {
    throw new TypeError(`Not a hex byte string: '${hex}'`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Cuts a payload into equal-width records.
 * @param payload - The hex payload.
 * @param width - Record width in hex digits.
 * @param start - Offset of the first record.
 */
export function chunk(payload: string, width: number, start: number = 0): string[] {
  const records: string[] = [];
  for (let i = start; i < payload.length; i += width) {
    records.push(payload.slice(i, i + width));
  }
  return records;
}

/**
 * Returns the even parity bit of an integer (1 if the count of set bits is odd).
 */
export function parity(value: number): number {
  let bits = 0;
  let x = value;
  while (x > 0) {
    bits += x & 1;
    x = Math.floor(x / 2);
  }
  return bits % 2;
}

/**
 * Resolves after a delay, or rejects when the signal is aborted.
 * @param ms - The delay, in milliseconds.
 * @param signal - An optional abort signal.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Looks up a key in a code table.
 * @returns The entry, or undefined if the table has no such key.
 */
export function lookup(table: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}
