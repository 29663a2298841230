// src/message-codes/zones.ts

import { hexIdToDec } from '../address.js';
import {
  ATTR_DHW_VALVE,
  ATTR_DHW_VALVE_HTG,
  VERBS,
  ZONE_DEVICE_TYPE,
  ZONE_MODE_MAP,
  ZONE_TYPE,
} from '../constants/constants.js';
import { decodeFlags8, decodeString, decodeTemperature } from '../decoders.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { FieldValue, ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { dtmFromHex, dtmToHex, flag8ToHex, strToHex, tempToHex } from '../utils/helpers.js';
import { chunk, hexToInt, lookup, toHex } from '../utils/utils.js';

const ZONE_NAME_LEN = 22;
const NULL_ZONE_NAME = '7F'.repeat(20);
const MAX_NAME_HEX = 24;

const MIN_TEMP_RANGE = [5, 21] as const;
const MAX_TEMP_RANGE = [21, 35] as const;

/**
 * Formats a local time of day, some minutes or seconds after a given instant.
 */
export function timeOfDay(from: Date, offsetMs: number): string {
  const at = new Date(from.getTime() + offsetMs);
  return [at.getHours(), at.getMinutes(), at.getSeconds()].map(v => String(v).padStart(2, '0')).join(':');
}

// !=============================================================================
// ! 0004: zone_name
// !=============================================================================

export function parseZoneName(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === ZONE_NAME_LEN, `Invalid length: ${ctx.len} (expecting ${ZONE_NAME_LEN})`);
  assertPayload(payload.slice(2, 4) === '00', `Invalid zone_name header: '${payload.slice(2, 4)}'`);

  if (payload.slice(4) === NULL_ZONE_NAME) return {};
  return { name: decodeString(payload.slice(4)) };
}

/**
 * Names are cut at twelve characters and padded with nulls.
 */
export function buildZoneNamePayload(zoneIdx: string, name: string): string {
  return `${zoneIdx}00${strToHex(name).slice(0, MAX_NAME_HEX).padEnd(40, '0')}`;
}

// !=============================================================================
// ! 0005: system_zones
// !=============================================================================

function parseZoneMask(seqx: string, ctx: ParseContext): PayloadRecord {
  assertPayload(seqx.length === 8 || seqx.length === 12, `Invalid zone mask record: '${seqx}'`);
  assertPayload(seqx.slice(0, 2) === '00', `Invalid zone mask header: '${seqx.slice(0, 2)}'`);

  const mask = [...decodeFlags8(seqx.slice(4, 6)), ...decodeFlags8(seqx.slice(6, 8))];
  return {
    zone_mask: mask.slice(0, ctx.config.maxZones),
    zone_type: lookup(ZONE_TYPE, seqx.slice(2, 4)) ?? seqx.slice(2, 4),
  };
}

export function parseSystemZones(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.verb === VERBS.RQ) {
    assertPayload(payload.slice(0, 2) === '00', `Invalid system_zones header: '${payload.slice(0, 2)}'`);
    return { zone_type: lookup(ZONE_TYPE, payload.slice(2, 4)) ?? payload.slice(2, 4) };
  }

  assertPayload(ctx.verb === VERBS.I || ctx.verb === VERBS.RP, `Invalid verb: ${ctx.verb}`);
  if (ctx.src.type === '34') {
    assertPayload(ctx.len === 12, `Invalid length: ${ctx.len} (expecting 12)`);
    return chunk(payload, 8).map(seqx => parseZoneMask(seqx, ctx));
  }

  assertPayload(ctx.src.type === '01' || ctx.src.type === '02', `Invalid source: ${ctx.src.id}`);
  return parseZoneMask(payload, ctx);
}

/**
 * @param zoneMask - one flag per zone, zone 0 first (up to sixteen)
 */
export function buildSystemZonesPayload(zoneType: string, zoneMask: readonly number[]): string {
  assertCommand(/^[0-9A-F]{2}$/.test(zoneType), `Invalid zone_type: '${zoneType}'`);
  assertCommand(zoneMask.length <= 16, `Too many zones in mask: ${zoneMask.length}`);

  const flags = [...zoneMask, ...Array<number>(16 - zoneMask.length).fill(0)];
  return `00${zoneType}${flag8ToHex(flags.slice(0, 8), true)}${flag8ToHex(flags.slice(8), true)}`;
}

// !=============================================================================
// ! 000A: zone_params
// !=============================================================================

export interface ZoneConfig {
  minTemp?: number;
  maxTemp?: number;
  localOverride?: boolean;
  openwindowFunction?: boolean;
  multiroomMode?: boolean;
}

function parseZoneParamsRecord(seqx: string): PayloadRecord {
  const bitmap = hexToInt(seqx.slice(2, 4));
  return {
    zone_idx: seqx.slice(0, 2),
    min_temp: decodeTemperature(seqx.slice(4, 8)),
    max_temp: decodeTemperature(seqx.slice(8, 12)),
    local_override: (bitmap & 1) === 0,
    openwindow_function: (bitmap & 2) === 0,
    multiroom_mode: (bitmap & 16) === 0,
    _unknown_bitmap: `0b${bitmap.toString(2).padStart(8, '0')}`,
  };
}

export function parseZoneParams(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.verb === VERBS.RQ && ctx.len <= 2) return {};

  if (ctx.isArray) {
    return chunk(payload, 12).map(parseZoneParamsRecord);
  }

  assertPayload(ctx.len === 6, `Invalid length: ${ctx.len} (expecting 6)`);
  return parseZoneParamsRecord(payload);
}

export function buildZoneParamsPayload(zoneIdx: string, config: ZoneConfig = {}): string {
  const {
    minTemp = 5,
    maxTemp = 35,
    localOverride = false,
    openwindowFunction = false,
    multiroomMode = false,
  } = config;

  assertCommand(minTemp >= MIN_TEMP_RANGE[0] && minTemp <= MIN_TEMP_RANGE[1], `Invalid min_temp: ${minTemp}`);
  assertCommand(maxTemp >= MAX_TEMP_RANGE[0] && maxTemp <= MAX_TEMP_RANGE[1], `Invalid max_temp: ${maxTemp}`);

  // the flags are set when the feature is off
  let bitmap = localOverride ? 0 : 1;
  bitmap |= openwindowFunction ? 0 : 2;
  bitmap |= multiroomMode ? 0 : 16;

  return `${zoneIdx}${toHex(bitmap)}${tempToHex(minTemp)}${tempToHex(maxTemp)}`;
}

// !=============================================================================
// ! 000C: zone_devices
// !=============================================================================

function zoneDevicesIdx(payload: string, ctx: ParseContext): PayloadRecord {
  const seqx = payload.slice(0, 2);
  const devClass = payload.slice(2, 4);

  if (ctx.src.type === '02') {
    assertPayload(hexToInt(seqx) < 8, `Invalid ufh_idx: '${seqx}'`);
    return { ufh_idx: seqx, zone_id: payload.slice(4, 6) === '7F' ? null : payload.slice(4, 6) };
  }

  if (devClass === '0D' || devClass === '0E') {
    assertPayload(hexToInt(seqx) < (devClass === '0D' ? 1 : 2), `Invalid dhw index: '${seqx}'`);
    return { domain_id: 'FA' };
  }

  if (devClass === '0F') {
    assertPayload(hexToInt(seqx) < 1, `Invalid heating control index: '${seqx}'`);
    return { domain_id: 'FC' };
  }

  assertPayload(hexToInt(seqx) < ctx.config.maxZones, `Invalid zone_idx: '${seqx}'`);
  return { zone_idx: seqx };
}

export function parseZoneDevices(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ) {
    assertPayload(ctx.len === 2, `Invalid length: ${ctx.len} (expecting 2)`);
  } else {
    assertPayload(ctx.len >= 6 && ctx.len % 6 === 0, `Invalid length: ${ctx.len} (expecting n * 6)`);
  }

  const devClass = payload.slice(2, 4);
  let deviceClass = lookup(ZONE_DEVICE_TYPE, devClass) ?? `unknown_${devClass}`;
  if (deviceClass === ATTR_DHW_VALVE && payload.slice(0, 2) === '01') {
    deviceClass = ATTR_DHW_VALVE_HTG;
  }

  const result: PayloadRecord = { ...zoneDevicesIdx(payload, ctx), device_class: deviceClass };
  if (ctx.verb === VERBS.RQ) return result;

  const devices: FieldValue[] = [];
  for (const seqx of chunk(payload, 12)) {
    const zone = seqx.slice(4, 6);
    assertPayload(seqx.slice(0, 2) === payload.slice(0, 2), `Mixed indexes: '${seqx.slice(0, 2)}'`);
    assertPayload(zone === '7F' || hexToInt(zone) < ctx.config.maxZones, `Invalid zone: '${zone}'`);
    if (zone !== '7F') devices.push(hexIdToDec(seqx.slice(6, 12)));
  }
  return { ...result, devices };
}

// !=============================================================================
// ! 12B0: window_state
// !=============================================================================

export function parseWindowState(payload: string, _ctx: ParseContext): PayloadRecord {
  const state = payload.slice(2);
  assertPayload(state === '0000' || state === 'C800' || state === 'FFFF', `Invalid window_state: '${state}'`);
  return { window_open: state === 'FFFF' ? null : state === 'C800' };
}

// !=============================================================================
// ! 2249: setpoint_now (programmer)
// !=============================================================================

function parseSetpointNowRecord(seqx: string, ctx: ParseContext): PayloadRecord {
  const minutes = hexToInt(seqx.slice(10, 14));
  return {
    setpoint_now: decodeTemperature(seqx.slice(2, 6)),
    setpoint_next: decodeTemperature(seqx.slice(6, 10)),
    minutes_remaining: minutes,
    _next_setpoint: timeOfDay(ctx.dtm, minutes * 60_000),
  };
}

export function parseSetpointNow(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.isArray) {
    return chunk(payload, 14).map(seqx => ({ zone_idx: seqx.slice(0, 2), ...parseSetpointNowRecord(seqx, ctx) }));
  }
  assertPayload(ctx.len === 7, `Invalid length: ${ctx.len} (expecting 7)`);
  return parseSetpointNowRecord(payload, ctx);
}

// !=============================================================================
// ! 2309: setpoint
// !=============================================================================

function parseSetpointRecord(seqx: string): PayloadRecord {
  return { zone_idx: seqx.slice(0, 2), setpoint: decodeTemperature(seqx.slice(2, 6)) };
}

export function parseSetpoint(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.verb === VERBS.RQ && ctx.len <= 2) return {};

  if (ctx.isArray) {
    return chunk(payload, 6).map(parseSetpointRecord);
  }

  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  return parseSetpointRecord(payload);
}

export function buildSetpointPayload(zoneIdx: string, setpoint: number): string {
  assertCommand(Number.isFinite(setpoint), `Invalid setpoint: ${setpoint}`);
  return `${zoneIdx}${tempToHex(setpoint)}`;
}

// !=============================================================================
// ! 2349: zone_mode
// !=============================================================================

export function parseZoneMode(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ) {
    assertPayload(ctx.len === 1 || ctx.len === 2 || ctx.len === 7, `Invalid length: ${ctx.len} (expecting 1, 2 or 7)`);
    if (ctx.len <= 2) return {};
  } else {
    assertPayload(ctx.len === 4 || ctx.len === 7 || ctx.len === 13, `Invalid length: ${ctx.len} (expecting 4, 7 or 13)`);
  }

  const modeCode = payload.slice(6, 8);
  const mode = lookup(ZONE_MODE_MAP, modeCode);
  assertPayload(mode !== undefined, `Unknown zone_mode: '${modeCode}'`);

  const result: PayloadRecord = { mode, setpoint: decodeTemperature(payload.slice(2, 6)) };

  if (ctx.len >= 7) {
    if (payload.slice(8, 14) === 'FFFFFF') {
      assertPayload(modeCode !== '03', `A countdown needs a duration: '${payload}'`);
    } else {
      assertPayload(modeCode === '03', `Only a countdown has a duration: '${payload}'`);
      result.duration = hexToInt(payload.slice(8, 14));
    }
  }

  if (ctx.len >= 13) {
    if (payload.slice(14) === 'FF'.repeat(6)) {
      assertPayload(modeCode === '00' || modeCode === '02', `Mode ${modeCode} needs an until: '${payload}'`);
      result.until = null;
    } else {
      assertPayload(modeCode !== '02', `A permanent override has no until: '${payload}'`);
      result.until = dtmFromHex(payload.slice(14, 26));
    }
  }

  return result;
}

export interface ModeParams {
  mode: string;
  until: Date | string | null;
  duration: number | null;
}

/**
 * Encodes an already normalised zone mode.
 */
export function buildZoneModePayload(zoneIdx: string, setpoint: number | null, params: ModeParams): string {
  return [
    zoneIdx,
    tempToHex(setpoint),
    params.mode,
    params.duration === null ? 'FFFFFF' : toHex(params.duration, 6),
    params.until === null ? '' : dtmToHex(params.until),
  ].join('');
}

// !=============================================================================
// ! 30C9: temperature
// !=============================================================================

function parseTemperatureRecord(seqx: string): PayloadRecord {
  return { zone_idx: seqx.slice(0, 2), temperature: decodeTemperature(seqx.slice(2, 6)) };
}

export function parseTemperature(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.isArray) {
    return chunk(payload, 6).map(parseTemperatureRecord);
  }
  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  return parseTemperatureRecord(payload);
}

export function buildSensorTempPayload(temperature: number | null): string {
  return `00${tempToHex(temperature)}`;
}
