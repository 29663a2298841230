// src/message-codes/opentherm-msg.ts

import { VERBS } from '../constants/constants.js';
import { assertCommand, assertPayload } from '../errors.js';
import { R8810A_MSG_IDS, decodeFrame } from '../opentherm/opentherm.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { hexToInt, parity, toHex } from '../utils/utils.js';

// !=============================================================================
// ! 1FD4: opentherm_sync
// !=============================================================================

export function parseOpenthermSync(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.verb === VERBS.I, `Invalid verb: ${ctx.verb}`);
  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  return { ticker: hexToInt(payload.slice(2)) };
}

// !=============================================================================
// ! 3220: opentherm_msg
// !=============================================================================

/**
 * An OpenTherm frame relayed between the controller and the boiler by the
 * bridge. Requests carry the data-id; replies the decoded value.
 */
export function parseOpenthermMsg(payload: string, ctx: ParseContext): PayloadRecord {
  const { msgType, msgId, value, schema } = decodeFrame(payload.slice(2, 10));

  // an Unknown-DataId reply tells the controller to stop asking
  assertPayload(
    R8810A_MSG_IDS.has(msgId) || msgType === 'Unknown-DataId',
    `OpenTherm: Invalid data-id: 0x${toHex(msgId)} (${msgId}), msg-type = ${msgType}`
  );

  const result: PayloadRecord = { msg_id: msgId, msg_type: msgType, msg_name: schema.name ?? null };

  if (ctx.verb === VERBS.RQ) {
    if (msgType === 'Read-Data') {
      assertPayload(payload.slice(6, 10) === '0000', `OpenTherm: Invalid data-value: ${payload.slice(6, 10)}`);
      return result;
    }
    assertPayload(msgType === 'Write-Data' || msgType === 'Invalid-Data', `OpenTherm: Invalid msg-type for RQ: ${msgType}`);
    return { ...result, ...value };
  }

  if (msgType === 'Data-Invalid' || msgType === 'Unknown-DataId') return result;

  return { ...result, ...value, ...(schema.en ? { description: schema.en } : {}) };
}

/**
 * A Read-Data request for one data-id; the top bit of the frame is its parity.
 */
export function buildOpenthermRequestPayload(msgId: number): string {
  assertCommand(Number.isInteger(msgId) && msgId >= 0 && msgId <= 0xff, `Invalid data-id: ${msgId}`);
  return `00${parity(msgId) ? '80' : '00'}${toHex(msgId)}0000`;
}
