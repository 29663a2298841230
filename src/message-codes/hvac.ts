// src/message-codes/hvac.ts

import { FAN_INFO, FAN_SWITCH } from '../constants/constants.js';
import { decodeBool, decodeDouble, decodePercent } from '../decoders.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { percentToHex } from '../utils/helpers.js';
import { hexToInt, toHex } from '../utils/utils.js';

const FAN_MODES: Readonly<Record<number, string>> = FAN_SWITCH.FAN_MODES;
const HEATER_MODES: Readonly<Record<number, string>> = FAN_SWITCH.HEATER_MODES;

// !=============================================================================
// ! 22F1: switch_speed
// !=============================================================================

export function parseSwitchSpeed(payload: string, _ctx: ParseContext): PayloadRecord {
  const stepIdx = hexToInt(payload.slice(2, 4));
  const stepMax = hexToInt(payload.slice(4, 6));
  assertPayload(stepIdx <= stepMax, `step_idx not <= step_max: '${payload}'`);

  const fanMode = FAN_MODES[stepIdx];
  const heaterMode = HEATER_MODES[stepIdx];

  return {
    ...(fanMode !== undefined ? { [FAN_SWITCH.FAN_MODE]: fanMode } : {}),
    ...(heaterMode !== undefined ? { [FAN_SWITCH.HEATER_MODE]: heaterMode } : {}),
    step_idx: stepIdx,
    step_max: stepMax,
  };
}

// !=============================================================================
// ! 22F3: switch_duration (boost timer)
// !=============================================================================

const BOOST_MINUTES: readonly string[] = ['0A', '14', '1E'];

export function parseSwitchDuration(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  assertPayload(BOOST_MINUTES.includes(payload.slice(4, 6)), `Invalid boost timer: '${payload.slice(4, 6)}'`);

  return { [FAN_SWITCH.BOOST_TIMER]: hexToInt(payload.slice(4, 6)) };
}

// !=============================================================================
// ! 31D9: fan_state
// !=============================================================================

const FAN_BITMAPS: readonly string[] = ['00', '06', '80'];

const FAN_FLAGS = {
  passive: 0x02,
  damperOnly: 0x04,
  filterDirty: 0x20,
  frostCycle: 0x40,
  hasFault: 0x80,
} as const;

export function parseFanState(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(FAN_BITMAPS.includes(payload.slice(2, 4)), `Invalid bitmap: '${payload.slice(2, 4)}'`);

  const bitmap = hexToInt(payload.slice(2, 4));
  const result: PayloadRecord = {
    exhaust_fan_speed: decodePercent(payload.slice(4, 6)),
    passive: (bitmap & FAN_FLAGS.passive) !== 0,
    damper_only: (bitmap & FAN_FLAGS.damperOnly) !== 0,
    filter_dirty: (bitmap & FAN_FLAGS.filterDirty) !== 0,
    frost_cycle: (bitmap & FAN_FLAGS.frostCycle) !== 0,
    has_fault: (bitmap & FAN_FLAGS.hasFault) !== 0,
    _bitmap_0: payload.slice(2, 4),
  };

  if (ctx.len === 3) return result;

  assertPayload(ctx.len === 17, `Invalid length: ${ctx.len} (expecting 3 or 17)`);
  assertPayload(payload.slice(6, 8) === '00', `Invalid payload: '${payload.slice(6, 8)}'`);
  const filler = payload.slice(8, 32);
  assertPayload(filler === '00'.repeat(12) || filler === '20'.repeat(12), `Invalid payload: '${filler}'`);
  assertPayload(payload.slice(32) === '00', `Invalid payload: '${payload.slice(32)}'`);

  return { ...result, _unknown_2: payload.slice(6, 8), _unknown_3: filler, _unknown_4: payload.slice(32) };
}

export interface FanState {
  /** 0.0-1.0, or null if not known */
  speed: number | null;
  passive?: boolean;
  damperOnly?: boolean;
  hasFault?: boolean;
}

/**
 * Encodes a fan state. Fans report one of three flag sets: none, passive
 * with damper only, or a fault.
 */
export function buildFanStatePayload(hvacId: string, state: FanState): string {
  const { speed, passive = false, damperOnly = false, hasFault = false } = state;

  assertCommand(['00', '01', '21'].includes(hvacId), `Invalid hvac_id: '${hvacId}'`);
  assertCommand(passive === damperOnly, 'passive and damperOnly are set together');
  assertCommand(!(hasFault && passive), 'A faulty fan is not passive');

  const bitmap = (passive ? FAN_FLAGS.passive | FAN_FLAGS.damperOnly : 0) | (hasFault ? FAN_FLAGS.hasFault : 0);
  return `${hvacId}${toHex(bitmap)}${percentToHex(speed)}`;
}

// !=============================================================================
// ! 31DA: hvac_state
// !=============================================================================

/**
 * A percentage at a given resolution; EF and FF mean not available.
 */
function percentAt(value: string, precision: number = 0.5): number | null {
  if (value === 'EF' || value === 'FF') return null;
  const raw = hexToInt(value);
  assertPayload(raw <= 100 / precision, `Percentage out of range: 0x${value}`);
  return (raw * precision) / 100;
}

const SPEED_CAPS: readonly string[] = ['0002', 'F000', 'F800', 'F808', '7FFF'];

export function parseHvacState(payload: string, _ctx: ParseContext): PayloadRecord {
  const at = (start: number, end: number): string => payload.slice(start, end);

  assertPayload(at(2, 4) === '00' || at(2, 4) === 'EF', `Invalid air_quality: '${at(2, 4)}'`);
  assertPayload(at(4, 6) === '00' || at(4, 6) === '40', `Invalid air_quality_base: '${at(4, 6)}'`);
  assertPayload(at(10, 12) === 'EF' || hexToInt(at(10, 12)) <= 100, `Invalid indoor_humidity: '${at(10, 12)}'`);
  assertPayload(at(12, 14) === 'EF', `Invalid outdoor_humidity: '${at(12, 14)}'`);
  for (const start of [14, 18, 22, 26]) {
    assertPayload(at(start, start + 4) === '7FFF', `Invalid temperature: '${at(start, start + 4)}'`);
  }
  assertPayload(SPEED_CAPS.includes(at(30, 34)), `Invalid speed_cap: '${at(30, 34)}'`);
  assertPayload(at(34, 36) === 'EF', `Invalid bypass_pos: '${at(34, 36)}'`);
  assertPayload(at(36, 38) === 'EF' || (hexToInt(at(36, 38)) & 0x1f) <= 0x18, `Invalid fan_info: '${at(36, 38)}'`);
  assertPayload(
    at(38, 40) === 'EF' || at(38, 40) === 'FF' || hexToInt(at(38, 40)) <= 200,
    `Invalid exhaust_fan_speed: '${at(38, 40)}'`
  );
  assertPayload(['00', 'EF', 'FF'].includes(at(40, 42)), `Invalid supply_fan_speed: '${at(40, 42)}'`);
  assertPayload(at(46, 48) === '00' || at(46, 48) === 'EF', `Invalid post_heat: '${at(46, 48)}'`);
  assertPayload(at(48, 50) === 'EF', `Invalid pre_heat: '${at(48, 50)}'`);
  assertPayload(at(50, 54) === '7FFF' && at(54, 58) === '7FFF', `Invalid flow: '${at(50, 58)}'`);

  return {
    air_quality: percentAt(at(2, 4)),
    air_quality_base: hexToInt(at(4, 6)),
    co2_level: decodeDouble(at(6, 10)),
    indoor_humidity: percentAt(at(10, 12), 1),
    outdoor_humidity: percentAt(at(12, 14), 1),
    exhaust_temperature: decodeDouble(at(14, 18), 100),
    supply_temperature: decodeDouble(at(18, 22), 100),
    indoor_temperature: decodeDouble(at(22, 26), 100),
    outdoor_temperature: decodeDouble(at(26, 30), 100),
    speed_cap: hexToInt(at(30, 34)),
    bypass_pos: percentAt(at(34, 36)),
    fan_info: FAN_INFO[hexToInt(at(36, 38)) & 0x1f] ?? null,
    exhaust_fan_speed: percentAt(at(38, 40)),
    supply_fan_speed: percentAt(at(40, 42)),
    remaining_time: decodeDouble(at(42, 46)),
    post_heat: percentAt(at(46, 48)),
    pre_heat: percentAt(at(48, 50)),
    supply_flow: decodeDouble(at(50, 54), 100),
    exhaust_flow: decodeDouble(at(54, 58), 100),
  };
}

// !=============================================================================
// ! 31E0: message_31e0 (external ventilation, seen at high humidity)
// !=============================================================================

export function parseVentilationActive(payload: string, _ctx: ParseContext): PayloadRecord {
  return { active: decodeBool(payload.slice(4, 6)), _unknown_0: payload.slice(0, 4), _unknown_1: payload.slice(6) };
}
