// src/validator.ts

import {
  ARRAY_CODES,
  DEFAULT_MAX_ZONES,
  DOMAIN_IDS,
  DST_EXCEPTIONS,
  HGI_DEVICE_TYPE,
  VERBS,
  ZONE_AWARE_TYPES,
} from './constants/constants.js';
import { CorruptFrameError, CorruptPayloadError, assertPayload } from './errors.js';
import { RAMSES_CODES, RAMSES_DEVICES } from './schema/ramses-schema.js';
import type {
  CodecConfig,
  CodeSchema,
  DecodedPayload,
  DeviceSchema,
  FrameMeta,
  ParseContext,
  PayloadParser,
  PayloadRecord,
  Verb,
  VerbKey,
} from './types/ramses-types.js';
import { hexToInt } from './utils/utils.js';

export interface ValidatorTables {
  codes: Readonly<Record<string, CodeSchema>>;
  devices: Readonly<Record<string, DeviceSchema>>;
}

/** A parser body composed with the checks that every payload goes through */
export type ValidatedParser = (payload: string, meta: FrameMeta, config?: CodecConfig) => DecodedPayload;

/** The keys under which a payload's identity may be merged into its record */
export const INDEX_KEYS = ['zone_idx', 'domain_id', 'ufh_idx', 'dhw_idx', 'hvac_id', 'other_idx'] as const;

export const DEFAULT_CONFIG: Readonly<CodecConfig> = { maxZones: DEFAULT_MAX_ZONES };

/** The verb a destination would answer with (or send) for a given verb */
const REPLY_VERB: Readonly<Partial<Record<VerbKey, VerbKey>>> = { RQ: 'RP', RP: 'RQ', W: 'I' };

export function verbKey(verb: Verb): VerbKey {
  switch (verb) {
    case VERBS.I:
      return 'I';
    case VERBS.RQ:
      return 'RQ';
    case VERBS.RP:
      return 'RP';
    case VERBS.W:
      return 'W';
  }
}

function isDomainId(value: string): boolean {
  return DOMAIN_IDS.some(id => id === value);
}

/**
 * Checks a payload against the device and code tables before it is decoded,
 * and shapes what the decoder returns.
 *
 * The checks, in order: the code is known; the source may send the verb/code;
 * the destination may receive it; the payload matches the pattern for the
 * code/verb. Requests without a payload are answered with their index alone,
 * and array payloads are flagged for the decoder.
 */
export class PayloadValidator {
  private readonly codes: Readonly<Record<string, CodeSchema>>;
  private readonly devices: Readonly<Record<string, DeviceSchema>>;

  constructor(tables: ValidatorTables = { codes: RAMSES_CODES, devices: RAMSES_DEVICES }) {
    this.codes = tables.codes;
    this.devices = tables.devices;
  }

  private schemaFor(code: string): CodeSchema {
    const schema = this.codes[code];
    if (!schema) {
      throw new CorruptFrameError(`Unknown code: ${code}`);
    }
    return schema;
  }

  /**
   * Checks that the source device type may send this verb/code.
   * @throws CorruptFrameError
   */
  checkSource(meta: FrameMeta): void {
    const { src, code } = meta;
    const verb = verbKey(meta.verb);
    const device = this.devices[src.type];
    if (!device) {
      throw new CorruptFrameError(`Unknown src device type: ${src.id}`);
    }

    // a gateway may send any code it knows of
    if (src.type === HGI_DEVICE_TYPE) {
      if (!this.codes[code]) {
        throw new CorruptFrameError(`Unknown code for ${src.id} to Tx: ${code}`);
      }
      return;
    }

    const verbs = device[code];
    if (!verbs) {
      throw new CorruptFrameError(`Invalid code for ${src.id} to Tx: ${code}`);
    }
    if (!verbs.includes(verb)) {
      throw new CorruptFrameError(`Invalid verb/code for ${src.id} to Tx: ${meta.verb}/${code}`);
    }
  }

  /**
   * Checks that the destination device type would accept this verb/code.
   * @throws CorruptFrameError
   */
  checkDestination(meta: FrameMeta): void {
    const { src, dst, code } = meta;
    const verb = verbKey(meta.verb);

    if (src.type === HGI_DEVICE_TYPE || dst.type === HGI_DEVICE_TYPE || dst.type === '--' || dst.type === '63') {
      return;
    }

    const device = this.devices[dst.type];
    if (!device) {
      throw new CorruptFrameError(`Unknown dst device type: ${dst.id}`);
    }

    if (verb === 'I') return;

    const triple = `${dst.type}/${verb}/${code}`;
    if (DST_EXCEPTIONS.BEFORE_CODE.some(exc => exc === triple)) return;

    const verbs = device[code];
    if (!verbs) {
      throw new CorruptFrameError(`Invalid code for ${dst.id} to Rx: ${code}`);
    }

    if (DST_EXCEPTIONS.ANY_DST.some(exc => exc === `${verb}/${code}`)) return;
    if (DST_EXCEPTIONS.AFTER_CODE.some(exc => exc === triple)) return;

    const reply = REPLY_VERB[verb];
    if (reply === undefined || !verbs.includes(reply)) {
      throw new CorruptFrameError(`Invalid verb/code for ${dst.id} to Rx: ${meta.verb}/${code}`);
    }
  }

  /**
   * Matches the payload against the pattern for its code/verb, where there is one.
   * @throws CorruptPayloadError
   */
  checkPayload(meta: FrameMeta, payload: string): void {
    const regex = this.schemaFor(meta.code).verbs[verbKey(meta.verb)];
    if (regex && !regex.test(payload)) {
      throw new CorruptPayloadError(`Payload doesn't match '${regex.source}'`);
    }
  }

  /**
   * False if the payload carries nothing beyond an index.
   */
  hasPayload(meta: FrameMeta, payload: string): boolean {
    return !(meta.len === 1 || (meta.verb === VERBS.RQ && meta.len === 2 && payload.slice(2, 4) === '00'));
  }

  /**
   * True if the payload is a run of fixed-width records.
   * @throws CorruptPayloadError if an array payload is malformed, or comes from the wrong device
   */
  detectArray(meta: FrameMeta, payload: string): boolean {
    const { code, src, dst, len } = meta;
    if (code === '1FC9') return meta.verb !== VERBS.RQ;

    const array = ARRAY_CODES[code];
    if (meta.verb !== VERBS.I || array === undefined) return false;

    if (len === array.width) {
      // a UFH controller sends its arrays even when they hold one element
      return (
        (code === '22C9' || code === '3150') &&
        src.type === '02' &&
        src.equals(dst) &&
        payload.slice(0, 2) !== 'F8'
      );
    }

    assertPayload(len % array.width === 0, `Invalid array length: ${len} (width is ${array.width})`);
    assertPayload(array.sources.includes(src.type), `Invalid array source: ${src.id}`);
    assertPayload(src.type !== '01' || src.equals(dst), `Invalid array source: ${src.id}`);
    return true;
  }

  /**
   * Extracts the identity (zone, domain, ...) that leads the payload.
   * @throws CorruptPayloadError if the index is out of range for its kind
   */
  extractIndex(meta: FrameMeta, payload: string, config: CodecConfig = DEFAULT_CONFIG): PayloadRecord {
    const seqx = payload.slice(0, 2);

    switch (this.schemaFor(meta.code).index) {
      case 'zone':
        if (isDomainId(seqx)) return { domain_id: seqx };
        if (meta.verb === VERBS.I && !ZONE_AWARE_TYPES.includes(meta.src.type) && seqx === '00') return {};
        assertPayload(hexToInt(seqx) < config.maxZones, `Invalid zone_idx: '${seqx}'`);
        return { zone_idx: seqx };

      case 'dhw':
        assertPayload(seqx === '00' || seqx === '01', `Invalid dhw_idx: '${seqx}'`);
        return { dhw_idx: seqx };

      case 'ufh':
        assertPayload(hexToInt(seqx) < 0x08, `Invalid ufh_idx: '${seqx}'`);
        return { ufh_idx: seqx };

      case 'hvac':
        assertPayload(seqx === '00' || seqx === '01' || seqx === '21', `Invalid hvac_id: '${seqx}'`);
        return { hvac_id: seqx };

      case 'other':
        assertPayload(hexToInt(seqx) < config.maxZones, `Unknown other_idx: '${seqx}'`);
        return { other_idx: seqx };

      case 'complex':
      case 'none':
        return {};
    }
  }

  /**
   * Composes a decoder body with the checks, the request handling and the index merge.
   */
  wrap(body: PayloadParser): ValidatedParser {
    return (payload: string, meta: FrameMeta, config: CodecConfig = DEFAULT_CONFIG): DecodedPayload => {
      const schema = this.schemaFor(meta.code);

      this.checkSource(meta);
      this.checkDestination(meta);
      this.checkPayload(meta, payload);

      const hasPayload = this.hasPayload(meta, payload);
      const isArray = this.detectArray(meta, payload);
      const ctx: ParseContext = { ...meta, payload, dtm: meta.dtm ?? new Date(), hasPayload, isArray, config };

      let result: DecodedPayload;
      if (schema.rqMayHavePayload || meta.verb !== VERBS.RQ) {
        result = hasPayload ? body(payload, ctx) : {};
      } else {
        const regex = schema.verbs.RQ;
        if (!regex) {
          throw new CorruptFrameError(`Code ${meta.code} not known to support an RQ`);
        }
        if (!regex.test(payload)) {
          throw new CorruptPayloadError(`Payload doesn't match '${regex.source}'`);
        }
        return this.extractIndex(meta, payload, config);
      }

      if (Array.isArray(result)) return result;
      return { ...(isArray ? {} : this.extractIndex(meta, payload, config)), ...result };
    };
  }
}
