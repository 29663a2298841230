// src/message-codes/fault.ts

import { hexIdToDec } from '../address.js';
import {
  ATTR_HTG_CONTROL,
  DOMAIN_IDS,
  FAULT_DEVICE_CLASS,
  FAULT_STATE,
  FAULT_TYPE,
  NULL_LOG_ENTRY,
  VERBS,
} from '../constants/constants.js';
import { assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { dtsFromHex } from '../utils/helpers.js';
import { hexToInt, lookup, toHex } from '../utils/utils.js';

/** Controllers keep up to 64 entries, the UI shows only the first */
export const MAX_LOG_IDX = 0x3f;

const CONTROLLER_CLASS = '00';

/**
 * Device ids that mean something other than a device
 */
const UNKNOWN_DEVICE = '000002';
const NO_DEVICE: readonly string[] = ['000000', '000001'];

// !=============================================================================
// ! 0418: system_fault
// !=============================================================================

/**
 * An entry of the controller's fault log.
 *
 * `RP --- 01:145038 18:013393 --:------ 0418 022 000000B00401010000008694A3CC7FFFFF70000ECC8A`
 */
export function parseSystemFault(payload: string, ctx: ParseContext): PayloadRecord {
  if (ctx.verb === VERBS.RQ) {
    return { log_idx: payload.slice(4, 6) };
  }

  // an empty slot, at or after the end of the log; its log_idx byte varies
  if (payload.slice(0, 4) === NULL_LOG_ENTRY.slice(0, 4) && payload.slice(6) === NULL_LOG_ENTRY.slice(6)) {
    return {};
  }

  assertPayload(ctx.verb === VERBS.I || ctx.verb === VERBS.RP, `Invalid verb: ${ctx.verb}`);

  const faultState = lookup(FAULT_STATE, payload.slice(2, 4));
  assertPayload(faultState !== undefined, `Unknown fault_state: '${payload.slice(2, 4)}'`);
  assertPayload(hexToInt(payload.slice(4, 6)) <= MAX_LOG_IDX, `Invalid log_idx: '${payload.slice(4, 6)}'`);

  const faultType = lookup(FAULT_TYPE, payload.slice(8, 10));
  assertPayload(faultType !== undefined, `Unknown fault_type: '${payload.slice(8, 10)}'`);

  const domain = payload.slice(10, 12);
  const isZone = hexToInt(domain) < ctx.config.maxZones;
  assertPayload(isZone || DOMAIN_IDS.some(id => id === domain), `Invalid domain_id: '${domain}'`);

  const devClass = payload.slice(12, 14);
  const deviceClass = lookup(FAULT_DEVICE_CLASS, devClass);
  assertPayload(deviceClass !== undefined, `Unknown device_class: '${devClass}'`);
  assertPayload(payload.slice(28, 30) === '7F' || payload.slice(28, 30) === 'FF', `Invalid timestamp: '${payload.slice(18, 30)}'`);

  assertPayload(payload.slice(6, 8) === 'B0', `Invalid payload: '${payload.slice(6, 8)}'`);
  assertPayload(payload.slice(14, 18) === '0000', `Invalid payload: '${payload.slice(14, 18)}'`);
  assertPayload(payload.slice(30, 38) === 'FFFF7000', `Invalid payload: '${payload.slice(30, 38)}'`);

  const result: PayloadRecord = {
    log_idx: payload.slice(4, 6),
    timestamp: dtsFromHex(payload.slice(18, 30)),
    fault_state: faultState,
    fault_type: faultType,
    device_class: domain === 'FC' && deviceClass === 'actuator' ? ATTR_HTG_CONTROL : deviceClass,
  };

  if (devClass !== CONTROLLER_CLASS) {
    result[isZone ? 'zone_id' : 'domain_id'] = domain;
  }

  const deviceHex = payload.slice(38);
  if (deviceHex === UNKNOWN_DEVICE) {
    result.device_id = null;
  } else if (!NO_DEVICE.includes(deviceHex)) {
    result.device_id = hexIdToDec(deviceHex);
  }

  return {
    ...result,
    _unknown_1: payload.slice(6, 8),
    _unknown_2: payload.slice(14, 18),
    _unknown_3: payload.slice(30, 38),
  };
}

export function buildLogEntryRequestPayload(logIdx: number): string {
  return toHex(logIdx, 6);
}
