// src/message-codes/bind.ts

import { devIdToHex, hexIdToDec } from '../address.js';
import { VERBS } from '../constants/constants.js';
import { assertCommand, assertPayload } from '../errors.js';
import type { FieldValue, ParseContext, Verb } from '../types/ramses-types.js';
import { chunk, hexToInt } from '../utils/utils.js';

export const BIND_CODE = '1FC9';

/** Leading bytes of a bind record that are not zone indexes */
const BIND_DOMAINS: readonly string[] = ['90', 'F9', 'FA', 'FB', 'FC', 'FF'];

// !=============================================================================
// ! 1FC9: rf_bind
// !=============================================================================

/**
 * A binding offer, accept or confirm: a list of `[idx, code, device_id]`.
 *
 * `W --- 13:106039 01:145038 --:------ 1FC9 012 003EF0359E37003B00359E37`
 */
export function parseRfBind(payload: string, ctx: ParseContext): FieldValue[] {
  assertPayload(ctx.len >= 6 && ctx.len % 6 === 0, `Invalid length: ${ctx.len} (expecting a multiple of 6)`);
  assertPayload(ctx.verb !== VERBS.RQ, `Invalid verb: ${ctx.verb}`);

  const owner = payload.slice(6, 12);
  assertPayload(ctx.src.id === hexIdToDec(owner), `Invalid device: '${owner}' (src is ${ctx.src.id})`);

  return chunk(payload, 12).map(seqx => {
    const idx = seqx.slice(0, 2);
    // 90 records name some other device
    if (idx !== '90') {
      assertPayload(seqx.slice(6) === owner, `Invalid device: '${seqx.slice(6)}'`);
    }
    if (!BIND_DOMAINS.includes(idx)) {
      assertPayload(hexToInt(idx) < ctx.config.maxZones, `Invalid zone_idx: '${idx}'`);
    }
    return [idx, seqx.slice(2, 6), hexIdToDec(seqx.slice(6))];
  });
}

/**
 * Encodes a bind payload. An offer (an I with no destination) lists every
 * code with the bind code appended; an accept or confirm names only the first.
 */
export function buildBindPayload(
  verb: Verb,
  codes: readonly string[],
  srcId: string,
  idx: string = '00',
  hasDestination: boolean = false
): string {
  assertCommand(codes.length > 0, 'At least one code is required');
  assertCommand(codes.every(code => /^[0-9A-F]{4}$/.test(code)), `Invalid codes: ${codes.join(', ')}`);
  const hexId = devIdToHex(srcId);

  if (verb === VERBS.I && !hasDestination) {
    return [...codes, BIND_CODE].map(code => `${idx}${code}${hexId}`).join('');
  }

  assertCommand(verb === VERBS.I || verb === VERBS.W, `Invalid verb for a bind: '${verb}'`);
  return `00${codes[0] ?? BIND_CODE}${hexId}`;
}
