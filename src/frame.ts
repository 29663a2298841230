// src/frame.ts

import { Address, pktAddrs } from './address.js';
import { COMMAND_REGEX, HGI_DEVICE_TYPE, VERBS } from './constants/constants.js';
import { CorruptFrameError } from './errors.js';
import type { FrameMeta, Verb } from './types/ramses-types.js';

export interface FrameFields {
  verb: Verb;
  seqn?: string;
  /** the three address slots, space separated */
  addrs: string;
  code: string;
  payload: string;
  dtm?: Date;
}

const WIRE_VERBS: readonly string[] = Object.values(VERBS);

export function isVerb(value: string): value is Verb {
  return WIRE_VERBS.includes(value);
}

/**
 * Normalises a verb to its two-character wire form (`I` -> ` I`).
 */
export function toVerb(value: string): Verb {
  const verb = value.padStart(2, ' ').slice(0, 2);
  if (!isVerb(verb)) {
    throw new CorruptFrameError(`Unknown verb: '${value}'`);
  }
  return verb;
}

/**
 * One bus message: `VV SSS AAAAAAAAA AAAAAAAAA AAAAAAAAA CCCC LLL PAYLOAD`
 */
export class Frame {
  verb: Verb;
  seqn: string;
  src: Address;
  dst: Address;
  addrs: [Address, Address, Address];
  readonly code: string;
  readonly len: number;
  readonly payload: string;
  readonly dtm: Date;

  constructor({ verb, seqn = '---', addrs, code, payload, dtm }: FrameFields) {
    this.verb = verb;
    this.seqn = seqn;
    const addrSet = pktAddrs(addrs);
    this.src = addrSet.src;
    this.dst = addrSet.dst;
    this.addrs = addrSet.addrs;
    this.code = code;
    this.len = Math.floor(payload.length / 2);
    this.payload = payload;
    this.dtm = dtm ?? new Date();
  }

  /**
   * Parses a frame as written on the wire.
   * @throws CorruptFrameError if the line is malformed, or its length field is wrong
   */
  static fromString(line: string, dtm?: Date): Frame {
    const text = line.trimEnd();
    // a leading ' I' or ' W' may have lost its space
    const match = COMMAND_REGEX.exec(/^[IW] /.test(text) ? ` ${text}` : text);
    if (!match) {
      throw new CorruptFrameError(`Invalid frame: '${line}'`);
    }
    const [, verb = '', seqn = '', a0 = '', a1 = '', a2 = '', code = '', len = '', payload = ''] = match;
    if (parseInt(len, 10) !== payload.length / 2) {
      throw new CorruptFrameError(`Invalid frame length: ${len} (payload is ${payload.length / 2} bytes)`);
    }
    return new Frame({ verb: toVerb(verb), seqn, addrs: `${a0} ${a1} ${a2}`, code, payload, dtm });
  }

  /** What a payload parser needs to know about this frame */
  get meta(): FrameMeta {
    return { verb: this.verb, code: this.code, src: this.src, dst: this.dst, len: this.len, dtm: this.dtm };
  }

  /** `verb|device|code` of this frame, as matched against pending requests */
  get txHeader(): string {
    const addr = this.src.type === HGI_DEVICE_TYPE ? this.dst : this.src;
    return [this.verb, addr.id, this.code].join('|');
  }

  /** The header of the expected response, or null if none is expected */
  get rxHeader(): string | null {
    if (this.verb === VERBS.I || this.verb === VERBS.RP || this.src.equals(this.dst)) {
      return null;
    }
    const addr = this.src.type === HGI_DEVICE_TYPE ? this.dst : this.src;
    const verb = this.verb === VERBS.RQ ? VERBS.RP : VERBS.I;
    return [verb, addr.id, this.code].join('|');
  }

  toString(): string {
    const [a0, a1, a2] = this.addrs;
    return [
      this.verb,
      this.seqn,
      a0.id,
      a1.id,
      a2.id,
      this.code,
      String(this.len).padStart(3, '0'),
      this.payload,
    ].join(' ');
  }
}
