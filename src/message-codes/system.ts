// src/message-codes/system.ts

import { SYSTEM_MODE_MAP, VERBS } from '../constants/constants.js';
import { decodeString, decodeTemperature } from '../decoders.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { dtmFromHex, dtmToHex, tempToHex } from '../utils/helpers.js';
import { hexToInt, lookup, toHex } from '../utils/utils.js';
import { timeOfDay } from './zones.js';

// !=============================================================================
// ! 0001: rf_unknown (sent before an rf_check, and in test modes)
// !=============================================================================

export function parseRfUnknown(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.verb === VERBS.I || ctx.verb === VERBS.W, `Invalid verb: ${ctx.verb}`);
  assertPayload(ctx.len === 5, `Invalid length: ${ctx.len} (expecting 5)`);

  const idx = payload.slice(0, 2);
  assertPayload(idx === 'FC' || idx === 'FF' || hexToInt(idx) < ctx.config.maxZones, `Invalid index: '${idx}'`);
  assertPayload(payload.slice(2, 6) === '0000' || payload.slice(2, 6) === 'FFFF', `Invalid payload: '${payload}'`);
  assertPayload(payload.slice(6, 8) === '02' || payload.slice(6, 8) === '05', `Invalid payload: '${payload}'`);

  return { payload: [idx, payload.slice(2, 6), payload.slice(6, 8), payload.slice(8)].join('-') };
}

// !=============================================================================
// ! 0006: schedule_sync
// !=============================================================================

/**
 * The total number of changes to the schedules (DHW included).
 */
export function parseScheduleSync(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ) {
    assertPayload(payload === '00', `Invalid request: '${payload}'`);
    return {};
  }

  assertPayload(ctx.verb === VERBS.RP, `Invalid verb: ${ctx.verb}`);
  assertPayload(ctx.len === 4, `Invalid length: ${ctx.len} (expecting 4)`);
  assertPayload(payload.slice(0, 2) === '00', `Invalid header: '${payload.slice(0, 2)}'`);

  // the reply to an invalid request
  if (payload.slice(2) === 'FFFFFF') return {};

  assertPayload(payload.slice(2, 4) === '05', `Invalid header: '${payload.slice(0, 4)}'`);
  return { change_counter: hexToInt(payload.slice(4)), _header: payload.slice(0, 4) };
}

// !=============================================================================
// ! 0016: rf_check
// !=============================================================================

export function parseRfCheck(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.verb === VERBS.RQ || ctx.verb === VERBS.RP, `Invalid verb: ${ctx.verb}`);
  assertPayload(ctx.len === 2, `Invalid length: ${ctx.len} (expecting 2)`);

  const rfValue = hexToInt(payload.slice(2, 4));
  return { rf_strength: Math.min(Math.floor(rfValue / 5) + 1, 5), rf_value: rfValue };
}

// !=============================================================================
// ! 0100: language
// !=============================================================================

export function parseLanguage(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.len === 1) {
    assertPayload(ctx.verb === VERBS.RQ, `Invalid verb: ${ctx.verb}`);
    return {};
  }
  return { language: decodeString(payload.slice(2, 6)), _unknown_0: payload.slice(6) };
}

// !=============================================================================
// ! 1100: tpi_params
// !=============================================================================

const CYCLE_RATES = [3, 6, 9, 12] as const;
const ON_OFF_RANGE = [1, 5] as const;
const BAND_WIDTH_RANGE = [1.5, 3.0] as const;

export interface TpiParams {
  cycleRate?: number;
  minOnTime?: number;
  minOffTime?: number;
  proportionalBandWidth?: number | null;
}

/** True if a byte holds a whole number of quarters in the range */
function isQuarters(hex: string, min: number, max: number): boolean {
  const value = hexToInt(hex);
  return value % 4 === 0 && value / 4 >= min && value / 4 <= max;
}

/**
 * TPI (time proportional and integral) settings of the heating relay.
 * Times are carried as quarter minutes.
 */
export function parseTpiParams(payload: string, ctx: ParseContext): PayloadRecord {
  // heat recovery units use the code for something else
  if (ctx.src.type === '08') {
    assertPayload(ctx.len === 19, `Invalid length: ${ctx.len} (expecting 19)`);
    return { ordinal: `0x${payload.slice(2, 8)}`, blob: payload.slice(8) };
  }

  if (ctx.verb === VERBS.RQ && ctx.len === 2) return {};

  assertPayload(ctx.len === 5 || ctx.len === 8, `Invalid length: ${ctx.len} (expecting 5 or 8)`);
  const domain = payload.slice(0, 2);
  assertPayload(domain === '00' || domain === 'FC', `Invalid domain_id: '${domain}'`);
  assertPayload(isQuarters(payload.slice(2, 4), 1, 12), `Invalid cycle_rate: '${payload.slice(2, 4)}'`);
  assertPayload(isQuarters(payload.slice(4, 6), 1, 30), `Invalid min_on_time: '${payload.slice(4, 6)}'`);
  assertPayload(isQuarters(payload.slice(6, 8), 0, 15), `Invalid min_off_time: '${payload.slice(6, 8)}'`);
  assertPayload(payload.slice(8, 10) === '00' || payload.slice(8, 10) === 'FF', `Invalid payload: '${payload}'`);

  const result: PayloadRecord = {
    ...(domain === 'FC' ? { domain_id: domain } : {}),
    cycle_rate: hexToInt(payload.slice(2, 4)) / 4,
    min_on_time: hexToInt(payload.slice(4, 6)) / 4,
    min_off_time: hexToInt(payload.slice(6, 8)) / 4,
    _unknown_0: payload.slice(8, 10),
  };

  if (ctx.len > 5) {
    assertPayload(payload.slice(14) === '01', `Invalid payload: '${payload}'`);
    result.proportional_band_width = decodeTemperature(payload.slice(10, 14));
    result._unknown_1 = payload.slice(14);
  }
  return result;
}

export function buildTpiParamsPayload(domainId: string, params: TpiParams = {}): string {
  const { cycleRate = 3, minOnTime = 5, minOffTime = 5, proportionalBandWidth = null } = params;

  assertCommand(domainId === '00' || domainId === 'FC', `Invalid domain_id: '${domainId}'`);
  assertCommand(CYCLE_RATES.some(rate => rate === cycleRate), `Invalid cycle_rate: ${cycleRate}`);
  assertCommand(
    Number.isInteger(minOnTime) && minOnTime >= ON_OFF_RANGE[0] && minOnTime <= ON_OFF_RANGE[1],
    `Invalid min_on_time: ${minOnTime}`
  );
  assertCommand(
    Number.isInteger(minOffTime) && minOffTime >= ON_OFF_RANGE[0] && minOffTime <= ON_OFF_RANGE[1],
    `Invalid min_off_time: ${minOffTime}`
  );
  assertCommand(
    proportionalBandWidth === null ||
      (proportionalBandWidth >= BAND_WIDTH_RANGE[0] && proportionalBandWidth <= BAND_WIDTH_RANGE[1]),
    `Invalid proportional_band_width: ${String(proportionalBandWidth)}`
  );

  return [
    domainId,
    toHex(cycleRate * 4),
    toHex(minOnTime * 4),
    toHex(minOffTime * 4),
    'FF',
    tempToHex(proportionalBandWidth),
    '01',
  ].join('');
}

// !=============================================================================
// ! 1F09: system_sync
// !=============================================================================

export function parseSystemSync(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  const header = payload.slice(0, 2);
  assertPayload(['00', '01', 'F8', 'FF'].includes(header), `Invalid header: '${header}'`);

  const seconds = hexToInt(payload.slice(2, 6)) / 10;
  return { remaining_seconds: seconds, _next_sync: timeOfDay(ctx.dtm, seconds * 1000) };
}

// !=============================================================================
// ! 2E04: system_mode
// !=============================================================================

/** Modes that last until they are changed */
const PERMANENT_MODES: readonly string[] = ['00', '01', '06'];

/**
 * Evohome sends eight bytes; Hometronics sixteen.
 */
export function parseSystemMode(payload: string, ctx: ParseContext): PayloadRecord {
  const modeCode = payload.slice(0, 2);

  if (ctx.len === 8) {
    assertPayload(lookup(SYSTEM_MODE_MAP, modeCode) !== undefined, `Unknown system_mode: '${modeCode}'`);
  } else if (ctx.len === 16) {
    assertPayload(modeCode === 'FF' || hexToInt(modeCode) <= 15, `Unknown system_mode: '${modeCode}'`);
    assertPayload(payload.slice(16, 18) === '00' || payload.slice(16, 18) === '07', `Invalid payload: '${payload}'`);
    assertPayload(payload.slice(30, 32) === '04', `Invalid payload: '${payload}'`);
  } else {
    assertPayload(false, `Invalid length: ${ctx.len} (expecting 8 or 16)`);
  }

  return {
    system_mode: lookup(SYSTEM_MODE_MAP, modeCode) ?? modeCode,
    until: payload.slice(14, 16) !== '00' ? dtmFromHex(payload.slice(2, 14)) : null,
  };
}

/**
 * Resolves a system mode given by name, by code or by number to its code.
 */
export function normaliseSystemMode(systemMode: string | number): string {
  const code = typeof systemMode === 'number' ? toHex(systemMode) : systemMode.toUpperCase();
  if (lookup(SYSTEM_MODE_MAP, code) !== undefined) return code;

  const byName = Object.entries(SYSTEM_MODE_MAP).find(([, name]) => name === systemMode);
  assertCommand(byName !== undefined, `Unknown system_mode: '${String(systemMode)}'`);
  return byName[0];
}

export function buildSystemModePayload(systemMode: string | number, until: Date | string | null = null): string {
  const code = normaliseSystemMode(systemMode);

  if (PERMANENT_MODES.includes(code)) {
    assertCommand(until === null, `For system_mode ${code}, until must be null`);
  } else {
    assertCommand(until !== null, `For system_mode ${code}, until is required`);
  }

  return `${code}${dtmToHex(until)}${until === null ? '00' : '01'}`;
}

// !=============================================================================
// ! 313F: datetime
// !=============================================================================

/** The byte that follows the header, by the type of device that sends the time */
const DATETIME_FLAGS: Readonly<Record<string, readonly string[]>> = {
  '01': ['F0', 'FC'],
  '12': ['38'],
  '22': ['38'],
  '18': ['60'],
  '30': ['60'],
};

export function parseDatetime(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ) {
    assertPayload(payload === '00', `Invalid request: '${payload}'`);
    return {};
  }

  assertPayload(ctx.len === 9, `Invalid length: ${ctx.len} (expecting 9)`);
  assertPayload(payload.slice(0, 2) === '00', `Invalid header: '${payload.slice(0, 2)}'`);

  const flags = DATETIME_FLAGS[ctx.src.type];
  assertPayload(flags !== undefined && flags.includes(payload.slice(2, 4)), `Invalid payload: '${payload.slice(2, 4)}'`);

  return {
    datetime: dtmFromHex(payload.slice(4, 18)),
    is_dst: (hexToInt(payload.slice(4, 6)) & 0x80) !== 0 ? true : null,
    _unknown_0: payload.slice(2, 4),
  };
}

export function buildDatetimePayload(datetime: Date | string): string {
  return `006000${dtmToHex(datetime)}`;
}
