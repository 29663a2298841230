// src/message-codes/dhw.ts

import { VERBS, ZONE_MODE_MAP } from '../constants/constants.js';
import { decodeTemperature } from '../decoders.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { dtmFromHex, dtmToHex, tempToHex } from '../utils/helpers.js';
import { hexToInt, lookup, toHex } from '../utils/utils.js';
import type { ModeParams } from './zones.js';

const SETPOINT_RANGE = [30, 85] as const;
const OVERRUN_RANGE = [0, 10] as const;
const DIFFERENTIAL_RANGE = [1, 10] as const;

export interface DhwParams {
  setpoint?: number;
  overrun?: number;
  differential?: number;
}

// !=============================================================================
// ! 10A0: dhw_params
// !=============================================================================

/**
 * The OpenTherm bridge sends three bytes (setpoint only), a controller six.
 */
export function parseDhwParams(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ && ctx.len === 1) return {};

  assertPayload(ctx.len === 1 || ctx.len === 3 || ctx.len === 6, `Invalid length: ${ctx.len} (expecting 1, 3 or 6)`);
  assertPayload(payload.slice(0, 2) === '00' || payload.slice(0, 2) === '01', `Invalid dhw_idx: '${payload.slice(0, 2)}'`);

  const result: PayloadRecord = {};
  if (ctx.len >= 2) {
    result.setpoint = decodeTemperature(payload.slice(2, 6));
  }
  if (ctx.len >= 4) {
    result.overrun = hexToInt(payload.slice(6, 8));
  }
  if (ctx.len >= 6) {
    result.differential = decodeTemperature(payload.slice(8, 12));
  }
  return result;
}

export function buildDhwParamsPayload(params: DhwParams = {}): string {
  const { setpoint = 50, overrun = 5, differential = 1 } = params;

  assertCommand(setpoint >= SETPOINT_RANGE[0] && setpoint <= SETPOINT_RANGE[1], `Invalid setpoint: ${setpoint}`);
  assertCommand(
    Number.isInteger(overrun) && overrun >= OVERRUN_RANGE[0] && overrun <= OVERRUN_RANGE[1],
    `Invalid overrun: ${overrun}`
  );
  assertCommand(
    differential >= DIFFERENTIAL_RANGE[0] && differential <= DIFFERENTIAL_RANGE[1],
    `Invalid differential: ${differential}`
  );

  return `00${tempToHex(setpoint)}${toHex(overrun)}${tempToHex(differential)}`;
}

// !=============================================================================
// ! 1260: dhw_temp
// !=============================================================================

export function parseDhwTemp(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ && ctx.len <= 2) return {};

  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  assertPayload(payload.slice(0, 2) === '00', `Invalid dhw_idx: '${payload.slice(0, 2)}'`);
  return { temperature: decodeTemperature(payload.slice(2, 6)) };
}

// !=============================================================================
// ! 1F41: dhw_mode
// !=============================================================================

const DHW_ACTIVE: Readonly<Record<string, boolean | null>> = { '00': false, '01': true, FF: null };

export function parseDhwMode(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 6 || ctx.len === 12, `Invalid length: ${ctx.len} (expecting 6 or 12)`);

  const active = DHW_ACTIVE[payload.slice(2, 4)];
  assertPayload(active !== undefined, `Invalid dhw state: '${payload.slice(2, 4)}'`);

  const modeCode = payload.slice(4, 6);
  const mode = lookup(ZONE_MODE_MAP, modeCode);
  assertPayload(mode !== undefined, `Unknown dhw mode: '${modeCode}'`);

  const result: PayloadRecord = { active, mode };

  if (modeCode === '03') {
    assertPayload(payload.slice(6, 12) !== 'FFFFFF', `A countdown needs a duration: '${payload}'`);
    result.duration = hexToInt(payload.slice(6, 12));
  } else {
    assertPayload(payload.slice(6, 12) === 'FFFFFF', `Expected FFFFFF, not '${payload.slice(6, 12)}'`);
  }

  if (modeCode === '04') {
    assertPayload(ctx.len === 12, `A temporary override needs an until: '${payload}'`);
    result.until = dtmFromHex(payload.slice(12, 24));
  }

  return result;
}

/**
 * Encodes an already normalised DHW mode.
 */
export function buildDhwModePayload(active: boolean | null, params: ModeParams): string {
  return [
    '00',
    active ? '01' : '00',
    params.mode,
    params.duration === null ? 'FFFFFF' : toHex(params.duration, 6),
    params.until === null ? '' : dtmToHex(params.until),
  ].join('');
}
