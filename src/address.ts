// src/address.ts

import { HGI_DEV_ID, NON_DEV_ID, NUL_DEV_ID } from './constants/constants.js';
import { CorruptAddressError } from './errors.js';
import { hexToInt, toHex } from './utils/utils.js';

const DEVICE_ID_REGEX = /^(--:------|63:------|\d{2}:\d{6})$/;

/**
 * A device address: a two-digit device type and a six-digit serial, or one
 * of the sentinels (`--:------` for no device, `63:------` for all devices).
 */
export class Address {
  readonly id: string;
  readonly type: string;

  constructor(id: string) {
    if (!DEVICE_ID_REGEX.test(id)) {
      throw new CorruptAddressError(id);
    }
    this.id = id;
    this.type = id.slice(0, 2);
  }

  /** True for the two sentinels that stand for no particular device */
  get isSentinel(): boolean {
    return this.type === '--' || this.id === '63:------';
  }

  /** The three-byte form used inside payloads (1FC9, 0418) */
  get hex(): string {
    return devIdToHex(this.id);
  }

  equals(other: Address): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.id;
  }
}

export const NON_DEV_ADDR = new Address(NON_DEV_ID);
export const NUL_DEV_ADDR = new Address(NUL_DEV_ID);
export const HGI_DEV_ADDR = new Address(HGI_DEV_ID);

/**
 * Converts the three-byte payload form of a device id into `TT:NNNNNN`.
 * @param deviceHex - six hex digits, or blanks for no device
 */
export function hexIdToDec(deviceHex: string): string {
  if (deviceHex === 'FFFFFE') return NUL_DEV_ID;
  if (deviceHex.trim() === '') return NON_DEV_ID;

  const value = hexToInt(deviceHex);
  const devType = String(Math.floor((value & 0xfc0000) / 2 ** 18)).padStart(2, '0');
  return `${devType}:${String(value & 0x03ffff).padStart(6, '0')}`;
}

/**
 * Converts a device id (`TT:NNNNNN`) into its three-byte payload form.
 */
export function devIdToHex(deviceId: string): string {
  const match = /^(\d{2}):(\d{6})$/.exec(deviceId);
  if (!match) {
    throw new TypeError(`Not a device id: '${deviceId}'`);
  }
  const [, devType = '', serial = ''] = match;
  return toHex(parseInt(devType, 10) * 2 ** 18 + parseInt(serial, 10), 6);
}

export interface AddressSet {
  src: Address;
  dst: Address;
  addrs: [Address, Address, Address];
}

function isDevice(addr: Address): boolean {
  return !addr.equals(NON_DEV_ADDR) && !addr.equals(NUL_DEV_ADDR);
}

function isEmpty(addr: Address): boolean {
  return addr.equals(NON_DEV_ADDR);
}

/**
 * Resolves the three address slots of a frame into its source and destination.
 *
 * Only three shapes are legal: `dev --:------ dev`, `dev dst --:------` and
 * `--:------ --:------ dev`. Where the destination has the same id as the
 * source, both are the same object.
 * @param fragment - the three addresses, space separated
 * @throws CorruptAddressError for any other shape
 */
export function pktAddrs(fragment: string): AddressSet {
  const ids = fragment.trim().split(/\s+/);
  if (ids.length !== 3) {
    throw new CorruptAddressError(fragment);
  }
  const [a0, a1, a2] = ids.map(id => new Address(id));
  if (a0 === undefined || a1 === undefined || a2 === undefined) {
    throw new CorruptAddressError(fragment);
  }

  // the null device may be addressed, but never sends
  const legal =
    (isDevice(a0) && isEmpty(a1) && !isEmpty(a2)) ||
    (isDevice(a0) && !isEmpty(a1) && !a1.equals(a0) && isEmpty(a2)) ||
    (isEmpty(a0) && isEmpty(a1) && isDevice(a2));
  if (!legal) {
    throw new CorruptAddressError(fragment);
  }

  const devices = [a0, a1, a2].filter(addr => addr.type !== '--');
  const src = devices[0] ?? NON_DEV_ADDR;
  const second = devices[1] ?? NON_DEV_ADDR;
  const dst = second.equals(src) ? src : second;

  return { src, dst, addrs: [a0, a1, a2] };
}
