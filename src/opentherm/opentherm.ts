// src/opentherm/opentherm.ts

import messagesJson from '../../data/opentherm-messages.json' with { type: 'json' };
import { CorruptPayloadError } from '../errors.js';
import type {
  FieldValue,
  OpenThermFrame,
  OpenThermMsgType,
  OpenThermSchema,
  OpenThermValueType,
  PayloadRecord,
} from '../types/ramses-types.js';
import { hexToInt, parity } from '../utils/utils.js';

export const OPENTHERM_MSG_TYPES: readonly OpenThermMsgType[] = [
  'Read-Data',
  'Write-Data',
  'Invalid-Data',
  '-reserved-',
  'Read-Ack',
  'Write-Ack',
  'Data-Invalid',
  'Unknown-DataId',
];

const VALUE_TYPES: readonly OpenThermValueType[] = ['flag8', 'u8', 's8', 'f8.8', 'u16', 's16'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asValueType(value: unknown): OpenThermValueType | undefined {
  return VALUE_TYPES.find(type => type === value);
}

function loadMessages(data: unknown): { supportedIds: ReadonlySet<number>; schemas: ReadonlyMap<number, OpenThermSchema> } {
  if (!isRecord(data) || !Array.isArray(data.supportedIds) || !isRecord(data.messages)) {
    throw new TypeError('Malformed OpenTherm message table');
  }
  const supportedIds = new Set<number>();
  for (const id of data.supportedIds) {
    if (typeof id !== 'number') throw new TypeError(`Malformed OpenTherm data-id: ${String(id)}`);
    supportedIds.add(id);
  }
  const schemas = new Map<number, OpenThermSchema>();
  for (const [id, entry] of Object.entries(data.messages)) {
    if (!isRecord(entry)) throw new TypeError(`Malformed OpenTherm schema: ${id}`);
    schemas.set(parseInt(id, 10), {
      name: typeof entry.name === 'string' ? entry.name : undefined,
      en: typeof entry.en === 'string' ? entry.en : undefined,
      type: asValueType(entry.type),
      hb: asValueType(entry.hb),
      lb: asValueType(entry.lb),
    });
  }
  return { supportedIds, schemas };
}

const messagesData: unknown = messagesJson;
const { supportedIds, schemas } = loadMessages(messagesData);

/** Data-ids that the R8810A bridge is known to relay */
export const R8810A_MSG_IDS: ReadonlySet<number> = supportedIds;

export function getSchema(msgId: number): OpenThermSchema {
  return schemas.get(msgId) ?? {};
}

function signed(value: number, bits: number): number {
  return value < 2 ** (bits - 1) ? value : value - 2 ** bits;
}

/**
 * Decodes a data value by its OpenTherm type.
 * @param hex - two hex digits for the 8-bit types, four for the others
 */
export function decodeValue(hex: string, type: OpenThermValueType): FieldValue {
  const value = hexToInt(hex);
  switch (type) {
    case 'flag8':
      return Array.from({ length: 8 }, (_, bit) => (value >> bit) & 1);
    case 'u8':
    case 'u16':
      return value;
    case 's8':
      return signed(value, 8);
    case 's16':
      return signed(value, 16);
    case 'f8.8':
      return signed(value, 16) / 256;
  }
}

function decodeValues(data: string, schema: OpenThermSchema): PayloadRecord {
  if (schema.type) {
    const wide = schema.type === 'f8.8' || schema.type === 'u16' || schema.type === 's16';
    return { value: decodeValue(wide ? data : data.slice(2), schema.type) };
  }
  const result: PayloadRecord = {};
  if (schema.hb) result.value_hb = decodeValue(data.slice(0, 2), schema.hb);
  if (schema.lb) result.value_lb = decodeValue(data.slice(2), schema.lb);
  return result;
}

/**
 * Decodes an OpenTherm data frame (eight hex digits).
 * @throws CorruptPayloadError on a parity error, or if the spare bits are set
 */
export function decodeFrame(frame: string): OpenThermFrame {
  if (frame.length !== 8) {
    throw new CorruptPayloadError(`OpenTherm: frame must be 8 hex digits, not '${frame}'`);
  }
  const value = hexToInt(frame);
  if (value >>> 31 !== parity(value & 0x7fffffff)) {
    throw new CorruptPayloadError(`OpenTherm: parity error: ${frame}`);
  }

  const byte0 = hexToInt(frame.slice(0, 2));
  if ((byte0 & 0x0f) !== 0) {
    throw new CorruptPayloadError(`OpenTherm: spare bits set: ${frame.slice(0, 2)}`);
  }

  const msgType = OPENTHERM_MSG_TYPES[(byte0 & 0x70) >> 4] ?? '-reserved-';
  const msgId = hexToInt(frame.slice(2, 4));
  const schema = getSchema(msgId);

  return { msgType, msgId, value: decodeValues(frame.slice(4), schema), schema };
}
