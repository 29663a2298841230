// src/message-codes/misc.ts

import { decodeBool, decodeString } from '../decoders.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { dtsFromHex, dtsToHex, strToHex } from '../utils/helpers.js';
import { hexToInt, lookup, toHex } from '../utils/utils.js';

// Codes here are seen on the wire but their meaning is not known; they are
// checked for the values seen so far and passed through.

// !=============================================================================
// ! 000E
// !=============================================================================

export function parseMessage000E(payload: string, _ctx: ParseContext): PayloadRecord {
  assertPayload(payload === '000000' || payload === '000014', `Invalid payload: '${payload}'`);
  return { unknown_0: payload };
}

// !=============================================================================
// ! 01D0, 01E9 (from TRVs)
// !=============================================================================

export function parseTrvUnknown(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 2, `Invalid length: ${ctx.len} (expecting 2)`);
  assertPayload(payload.slice(2) === '00' || payload.slice(2) === '03', `Invalid payload: '${payload.slice(2)}'`);
  return { unknown_0: payload.slice(2) };
}

// !=============================================================================
// ! 042F
// !=============================================================================

export function parseMessage042F(payload: string, _ctx: ParseContext): PayloadRecord {
  return {
    counter_1: hexToInt(payload.slice(2, 6)),
    counter_2: hexToInt(payload.slice(6, 10)),
    counter_total: hexToInt(payload.slice(10, 14)),
    unknown_0: payload.slice(14),
  };
}

// !=============================================================================
// ! 0B04
// !=============================================================================

export function parseMessage0B04(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 2 && payload === '00C8', `Invalid payload: '${payload}'`);
  return { _unknown_0: payload.slice(2) };
}

// !=============================================================================
// ! 22D0
// !=============================================================================

export function parseMessage22D0(payload: string, _ctx: ParseContext): PayloadRecord {
  assertPayload(payload === '00000002', `Invalid payload: '${payload}'`);
  return { unknown: payload.slice(2) };
}

// !=============================================================================
// ! 2D49
// !=============================================================================

export function parseMessage2D49(payload: string, ctx: ParseContext): PayloadRecord {
  const seqx = payload.slice(0, 2);
  const isZone = seqx !== '88' && seqx !== 'FD';
  if (isZone) {
    assertPayload(hexToInt(seqx) < ctx.config.maxZones, `Invalid zone_idx: '${seqx}'`);
  }
  assertPayload(payload.slice(2) === '0000' || payload.slice(2) === 'C800', `Invalid payload: '${payload.slice(2)}'`);

  return { [isZone ? 'zone_idx' : 'domain_id']: seqx, _state: decodeBool(payload.slice(2, 4)) };
}

// !=============================================================================
// ! 3120
// !=============================================================================

export function parseMessage3120(payload: string, _ctx: ParseContext): PayloadRecord {
  assertPayload(['00', '70', '80'].includes(payload.slice(2, 4)), `Invalid byte 1: '${payload.slice(2, 4)}'`);
  assertPayload(payload.slice(6, 8) === '00' || payload.slice(6, 8) === '01', `Invalid byte 3: '${payload.slice(6, 8)}'`);
  assertPayload(payload.slice(8, 10) === '00', `Invalid byte 4: '${payload.slice(8, 10)}'`);
  assertPayload(['00', '03', '9C'].includes(payload.slice(10, 12)), `Invalid byte 5: '${payload.slice(10, 12)}'`);

  return { unknown_0: payload.slice(2, 10), unknown_1: payload.slice(10, 12), unknown_2: payload.slice(12) };
}

// !=============================================================================
// ! 7FFF: puzzle_packet (sent by this library, to mark a log)
// !=============================================================================

const PUZZLE_TEXT = '00';
const PUZZLE_COUNTER = '7F';
const PUZZLE_ANNOUNCEMENTS: Readonly<Record<string, string>> = {
  '01': 'engine',
  '02': 'impersonating',
  '03': 'message',
};

/** Payloads are cut to this many hex digits */
const MAX_PUZZLE_LENGTH = 48;

export function parsePuzzle(payload: string, _ctx: ParseContext): PayloadRecord {
  const msgType = payload.slice(2, 4);

  if (msgType === PUZZLE_TEXT) {
    return { datetime: dtsFromHex(payload.slice(4, 16)), message: decodeString(payload.slice(18)) };
  }

  const announcement = lookup(PUZZLE_ANNOUNCEMENTS, msgType);
  if (announcement !== undefined) {
    return { [announcement]: decodeString(payload.slice(4)) };
  }

  if (msgType === PUZZLE_COUNTER) {
    return {
      datetime: dtsFromHex(payload.slice(4, 16)),
      counter: hexToInt(payload.slice(18, 22)),
      interval: hexToInt(payload.slice(24, 28)) / 100,
    };
  }

  return { header: payload.slice(0, 4), payload: payload.slice(4) };
}

export interface PuzzleParams {
  message?: string;
  ordinal?: number;
  /** seconds */
  interval?: number;
  /** pad to this many bytes */
  length?: number;
  dtm?: Date;
}

/**
 * Encodes a puzzle packet: a text (`00`), an announcement (`01`-`03`) or a
 * counter (any other type).
 */
export function buildPuzzlePayload(msgType: string, params: PuzzleParams = {}): string {
  const { message = '', ordinal = 0, interval = 0, length, dtm = new Date() } = params;

  let payload: string;
  if (msgType === PUZZLE_TEXT) {
    payload = `00${PUZZLE_TEXT}${dtsToHex(dtm)}7F${strToHex(message)}7F`;
  } else if (lookup(PUZZLE_ANNOUNCEMENTS, msgType) !== undefined) {
    payload = `00${msgType}${strToHex(message)}7F`;
  } else {
    assertCommand(interval >= 0 && interval * 100 < 0x10000, `Invalid interval: ${interval}`);
    payload = [
      `00${PUZZLE_COUNTER}${dtsToHex(dtm)}7F`,
      `${toHex(ordinal % 0x10000, 4)}7F`,
      `${toHex(Math.trunc(interval * 100), 4)}7F`,
    ].join('');
  }

  if (length !== undefined) {
    payload = payload.padEnd(length * 2, 'F');
  }
  return payload.slice(0, MAX_PUZZLE_LENGTH);
}
