// src/message-codes/heating.ts

import { VERBS } from '../constants/constants.js';
import { decodeBool, decodeFlags8, decodePercent, decodeTemperature } from '../decoders.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { percentToHex } from '../utils/helpers.js';
import { chunk, hexToInt, toHex } from '../utils/utils.js';

/**
 * Heat recovery units reuse some heating codes with a layout of their own.
 */
function parseHvacBlob(payload: string): PayloadRecord {
  return { ordinal: `0x${payload.slice(2, 8)}`, blob: payload.slice(8) };
}

function isDomain(seqx: string): boolean {
  return seqx.startsWith('F');
}

// !=============================================================================
// ! 0008: relay_demand
// !=============================================================================

export function parseRelayDemand(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.src.type === '31' && ctx.len === 13) {
    return parseHvacBlob(payload);
  }

  assertPayload(ctx.len === 2, `Invalid length: ${ctx.len} (expecting 2)`);

  const seqx = payload.slice(0, 2);
  let idx: PayloadRecord = {};
  if (ctx.verb === VERBS.I && (ctx.src.type === '01' || ctx.src.type === '02') && ctx.src.equals(ctx.dst)) {
    if (seqx === 'F9' || seqx === 'FA' || seqx === 'FC') {
      idx = { domain_id: seqx };
    } else {
      assertPayload(hexToInt(seqx) < ctx.config.maxZones, `Invalid zone_idx: '${seqx}'`);
      idx = { zone_idx: seqx };
    }
  } else {
    assertPayload(seqx === '00' || ctx.verb === VERBS.RQ, `Invalid index: '${seqx}'`);
  }

  return { ...idx, relay_demand: decodePercent(payload.slice(2, 4)) };
}

// !=============================================================================
// ! 0009: relay_failsafe
// !=============================================================================

/**
 * If enabled, a relay that loses contact with its controller cycles at 20%.
 */
export function parseRelayFailsafe(payload: string, ctx: ParseContext): PayloadRecord[] {
  return chunk(payload, 6).map(seqx => {
    const idx = seqx.slice(0, 2);
    assertPayload(idx === 'F9' || idx === 'FC' || hexToInt(idx) < ctx.config.maxZones, `Invalid index: '${idx}'`);
    assertPayload(seqx.slice(2, 4) === '00' || seqx.slice(2, 4) === '01', `Invalid failsafe: '${seqx.slice(2, 4)}'`);
    assertPayload(seqx.slice(4) === '00' || seqx.slice(4) === 'FF', `Invalid payload: '${seqx}'`);

    return {
      [isDomain(idx) ? 'domain_id' : 'zone_idx']: idx,
      failsafe_enabled: seqx.slice(2, 4) === '01',
    };
  });
}

// !=============================================================================
// ! 1030: mixvalve_params
// !=============================================================================

const MIXVALVE_PARAMS: Readonly<Record<string, string>> = {
  C8: 'max_flow_setpoint',
  C9: 'min_flow_setpoint',
  CA: 'valve_run_time',
  CB: 'pump_run_time',
  CC: '_unknown_0',
};

export interface MixValveParams {
  maxFlowSetpoint?: number;
  minFlowSetpoint?: number;
  valveRunTime?: number;
  pumpRunTime?: number;
}

export function parseMixValveParams(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 16, `Invalid length: ${ctx.len} (expecting 16)`);
  assertPayload(payload.slice(30) === '00' || payload.slice(30) === '01', `Invalid payload: '${payload.slice(30)}'`);

  const result: PayloadRecord = {};
  for (const seqx of chunk(payload, 6, 2)) {
    assertPayload(seqx.slice(2, 4) === '01', `Invalid parameter: '${seqx}'`);
    const name = MIXVALVE_PARAMS[seqx.slice(0, 2)];
    assertPayload(name !== undefined, `Unknown parameter: '${seqx.slice(0, 2)}'`);
    result[name] = hexToInt(seqx.slice(4));
  }
  return result;
}

function assertParam(name: string, value: number, max: number): void {
  assertCommand(Number.isInteger(value) && value >= 0 && value <= max, `Invalid ${name}: ${value}`);
}

export function buildMixValveParamsPayload(zoneIdx: string, params: MixValveParams = {}): string {
  const { maxFlowSetpoint = 55, minFlowSetpoint = 15, valveRunTime = 150, pumpRunTime = 15 } = params;

  assertParam('max_flow_setpoint', maxFlowSetpoint, 99);
  assertParam('min_flow_setpoint', minFlowSetpoint, 50);
  assertParam('valve_run_time', valveRunTime, 240);
  assertParam('pump_run_time', pumpRunTime, 99);

  return [
    zoneIdx,
    `C801${toHex(maxFlowSetpoint)}`,
    `C901${toHex(minFlowSetpoint)}`,
    `CA01${toHex(valveRunTime)}`,
    `CB01${toHex(pumpRunTime)}`,
    'CC0101',
  ].join('');
}

// !=============================================================================
// ! 22C9: ufh_setpoint
// !=============================================================================

function parseUfhSetpointRecord(seqx: string): PayloadRecord {
  return {
    ufh_idx: seqx.slice(0, 2),
    temp_low: decodeTemperature(seqx.slice(2, 6)),
    temp_high: decodeTemperature(seqx.slice(6, 10)),
    _unknown_0: seqx.slice(10),
  };
}

export function parseUfhSetpoint(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.isArray) {
    return chunk(payload, 12).map(parseUfhSetpointRecord);
  }
  assertPayload(ctx.len === 6, `Invalid length: ${ctx.len} (expecting 6)`);
  return parseUfhSetpointRecord(payload);
}

// !=============================================================================
// ! 22D9: boiler_setpoint
// !=============================================================================

export function parseBoilerSetpoint(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  return { boiler_setpoint: decodeTemperature(payload.slice(2, 6)) };
}

// !=============================================================================
// ! 3150: heat_demand
// !=============================================================================

function parseHeatDemandRecord(seqx: string, ctx: ParseContext): PayloadRecord {
  const demand = hexToInt(seqx.slice(2, 4));
  assertPayload((demand & 0xf0) === 0xf0 || demand <= 200, `Invalid heat_demand: '${seqx.slice(2, 4)}'`);

  const idxName = ctx.src.type === '02' ? 'ufh_idx' : 'zone_idx';
  return {
    [isDomain(seqx) ? 'domain_id' : idxName]: seqx.slice(0, 2),
    heat_demand: decodePercent(seqx.slice(2, 4)),
  };
}

export function parseHeatDemand(payload: string, ctx: ParseContext): PayloadRecord | PayloadRecord[] {
  if (ctx.isArray) {
    return chunk(payload, 4).map(seqx => parseHeatDemandRecord(seqx, ctx));
  }
  assertPayload(ctx.len === 2, `Invalid length: ${ctx.len} (expecting 2)`);
  return parseHeatDemandRecord(payload, ctx);
}

// !=============================================================================
// ! 3B00: actuator_sync
// !=============================================================================

/** The index byte each type of device sends */
const SYNC_INDEX: Readonly<Record<string, string>> = { '01': 'FC', '13': '00', '23': 'FC' };

/**
 * Sent by the heat relay at the end of each TPI cycle, and by the
 * controller at the start of the next.
 */
export function parseActuatorSync(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 2, `Invalid length: ${ctx.len} (expecting 2)`);
  const seqx = payload.slice(0, 2);
  assertPayload(seqx === (SYNC_INDEX[ctx.src.type] ?? '00'), `Invalid index: '${seqx}'`);
  assertPayload(payload.slice(2) === 'C8', `Invalid payload: '${payload.slice(2)}'`);

  const fromController =
    ctx.verb === VERBS.I && (ctx.src.type === '01' || ctx.src.type === '23') && ctx.src.equals(ctx.dst);
  return {
    ...(fromController ? { domain_id: 'FC' } : {}),
    actuator_sync: decodeBool(payload.slice(2)),
  };
}

// !=============================================================================
// ! 3EF0: actuator_state
// !=============================================================================

const NULL_ACTUATOR_STATE = '007FFF';

export function parseActuatorState(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.src.type === '08') {
    assertPayload(ctx.len === 20, `Invalid length: ${ctx.len} (expecting 20)`);
    return parseHvacBlob(payload);
  }

  if (payload === NULL_ACTUATOR_STATE) {
    return { actuator_enabled: null, modulation_level: null };
  }

  assertPayload(payload.slice(0, 2) === '00', `Invalid header: '${payload.slice(0, 2)}'`);
  const level = payload.slice(2, 4);

  if (ctx.len <= 3) {
    assertPayload(level === 'FF' || hexToInt(level) <= 200, `Invalid modulation level: '${level}'`);
    assertPayload(payload.slice(4, 6) === 'FF', `Invalid payload: '${payload.slice(4, 6)}'`);
  } else {
    // the OpenTherm bridge
    assertPayload(level === 'FF' || hexToInt(level) <= 100, `Invalid modulation level: '${level}'`);
    assertPayload(payload.slice(4, 6) === '10' || payload.slice(4, 6) === '11', `Invalid payload: '${payload.slice(4, 6)}'`);
    assertPayload((hexToInt(payload.slice(6, 8)) & 0xf0) === 0, `Invalid flags: '${payload.slice(6, 8)}'`);
    assertPayload(['00', '01', '0A', 'FA', 'FF'].includes(payload.slice(8, 10)), `Invalid payload: '${payload.slice(8, 10)}'`);
    assertPayload(['00', '1C', 'FF'].includes(payload.slice(10, 12)), `Invalid payload: '${payload.slice(10, 12)}'`);
  }
  if (ctx.len > 6) {
    assertPayload((hexToInt(payload.slice(12, 14)) & 0xfc) === 0, `Invalid flags: '${payload.slice(12, 14)}'`);
    assertPayload(payload.slice(-2) === '00' || payload.slice(-2) === '64', `Invalid payload: '${payload.slice(-2)}'`);
  }

  const modulation = decodePercent(level);
  const result: PayloadRecord = {
    actuator_enabled: Boolean(modulation),
    modulation_level: modulation,
    _unknown_2: decodeFlags8(payload.slice(4, 6)),
  };

  if (ctx.len > 3) {
    const flags = hexToInt(payload.slice(6, 8));
    Object.assign(result, {
      _unknown_3: decodeFlags8(payload.slice(6, 8)),
      ch_enabled: (flags & 0x02) !== 0,
      dhw_active: (flags & 0x04) !== 0,
      flame_active: (flags & 0x08) !== 0,
      _unknown_4: payload.slice(8, 10),
      _unknown_5: payload.slice(10, 12),
    });
  }

  if (ctx.len > 6) {
    Object.assign(result, {
      _unknown_6: decodeFlags8(payload.slice(12, 14)),
      ch_active: (hexToInt(payload.slice(12, 14)) & 0x01) !== 0,
      ch_setpoint: hexToInt(payload.slice(14, 16)),
      max_rel_modulation: hexToInt(payload.slice(16, 18)),
    });
  }

  return result;
}

/**
 * @param modLevel - 0.0 to 1.0, or null if the level is not known
 */
export function buildActuatorStatePayload(modLevel: number | null): string {
  return modLevel === null ? NULL_ACTUATOR_STATE : `00${percentToHex(modLevel)}FF`;
}

// !=============================================================================
// ! 3EF1: actuator_cycle
// !=============================================================================

export function parseActuatorCycle(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.src.type === '08') {
    assertPayload(ctx.len === 18, `Invalid length: ${ctx.len} (expecting 18)`);
    return parseHvacBlob(payload);
  }
  if (ctx.src.type === '31') {
    assertPayload(ctx.len === 12, `Invalid length: ${ctx.len} (expecting 12)`);
    return parseHvacBlob(payload);
  }

  if (ctx.verb === VERBS.RQ) {
    assertPayload(ctx.len < 3, `Invalid length: ${ctx.len} (expecting 1 or 2)`);
    return {};
  }

  assertPayload(ctx.verb === VERBS.RP, `Invalid verb: ${ctx.verb}`);
  assertPayload(ctx.len === 7, `Invalid length: ${ctx.len} (expecting 7)`);
  assertPayload(payload.slice(0, 2) === '00', `Invalid header: '${payload.slice(0, 2)}'`);

  const modulation = decodePercent(payload.slice(10, 12));
  return {
    actuator_enabled: Boolean(modulation),
    modulation_level: modulation,
    actuator_countdown: hexToInt(payload.slice(6, 10)),
    // an OpenTherm bridge has no cycle
    cycle_countdown: payload.slice(2, 6) === '7FFF' ? null : hexToInt(payload.slice(2, 6)),
    _unknown_0: payload.slice(12),
  };
}

/**
 * @param actuatorCountdown - seconds until the relay next changes state
 * @param cycleCountdown - seconds until the next cycle, if the actuator has cycles
 */
export function buildActuatorCyclePayload(
  modLevel: number,
  actuatorCountdown: number,
  cycleCountdown: number | null = null
): string {
  return [
    '00',
    cycleCountdown === null ? '7FFF' : toHex(cycleCountdown, 4),
    toHex(actuatorCountdown, 4),
    percentToHex(modLevel),
    'FF',
  ].join('');
}
