// src/message-codes/schedule.ts

import { VERBS } from '../constants/constants.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { hexToInt, toHex } from '../utils/utils.js';

const ZONE_SCHEDULE = '20';
const DHW_SCHEDULE = '23';
const DHW_IDX = 'FA';

/** The most a controller sends in one fragment, in bytes */
const MAX_FRAGMENT_LENGTH = 41;

// !=============================================================================
// ! 0404: zone_schedule
// !=============================================================================

function parseHeader(header: string): PayloadRecord {
  const kind = header.slice(2, 4);
  assertPayload(kind === ZONE_SCHEDULE || kind === DHW_SCHEDULE, `Invalid schedule type: '${kind}'`);
  assertPayload(header.slice(4, 8) === '0008', `Invalid header: '${header.slice(4, 8)}'`);

  return {
    frag_index: hexToInt(header.slice(10, 12)),
    frag_total: hexToInt(header.slice(12, 14)),
    frag_length: hexToInt(header.slice(8, 10)),
  };
}

/**
 * One fragment of a zone (or DHW) schedule. The fragments are pieces of a
 * single zlib stream, so they mean nothing on their own.
 */
export function parseZoneSchedule(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ) {
    assertPayload(ctx.len === 7, `Invalid length: ${ctx.len} (expecting 7)`);
    return parseHeader(payload.slice(0, 14));
  }
  return { ...parseHeader(payload.slice(0, 14)), fragment: payload.slice(14) };
}

function scheduleHeader(zoneIdx: string): string {
  return zoneIdx === DHW_IDX ? `00${DHW_SCHEDULE}0008` : `${zoneIdx}${ZONE_SCHEDULE}0008`;
}

function assertFragmentIdx(fragIdx: number, fragCnt: number): void {
  assertCommand(Number.isInteger(fragIdx) && fragIdx >= 0 && fragIdx < 0xff, `Invalid fragment index: ${fragIdx}`);
  assertCommand(Number.isInteger(fragCnt) && fragCnt >= 0 && fragCnt <= 0xff, `Invalid fragment count: ${fragCnt}`);
}

/**
 * @param fragIdx - zero-based, sent one-based
 * @param fragCnt - the total, or 0 if not yet known
 */
export function buildScheduleRequestPayload(zoneIdx: string, fragIdx: number, fragCnt: number): string {
  assertFragmentIdx(fragIdx, fragCnt);
  return `${scheduleHeader(zoneIdx)}00${toHex(fragIdx + 1)}${toHex(fragCnt)}`;
}

export function buildScheduleFragmentPayload(zoneIdx: string, fragIdx: number, fragCnt: number, fragment: string): string {
  assertFragmentIdx(fragIdx, fragCnt);
  assertCommand(/^([0-9A-F]{2})+$/.test(fragment), `Invalid fragment: '${fragment}'`);
  assertCommand(fragment.length / 2 <= MAX_FRAGMENT_LENGTH, `Fragment too long: ${fragment.length / 2} bytes`);

  return `${scheduleHeader(zoneIdx)}${toHex(fragment.length / 2)}${toHex(fragIdx + 1)}${toHex(fragCnt)}${fragment}`;
}
