// src/schema/ramses-schema.ts

import codesJson from '../../data/ramses-codes.json' with { type: 'json' };
import devicesJson from '../../data/ramses-devices.json' with { type: 'json' };
import type { CodeSchema, DeviceSchema, IndexKind, VerbKey } from '../types/ramses-types.js';

const VERB_KEYS: readonly VerbKey[] = ['I', 'RQ', 'RP', 'W'];
const INDEX_KINDS: readonly IndexKind[] = ['zone', 'dhw', 'ufh', 'hvac', 'other', 'complex', 'none'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVerbKey(value: unknown): value is VerbKey {
  return typeof value === 'string' && VERB_KEYS.some(key => key === value);
}

function isIndexKind(value: unknown): value is IndexKind {
  return typeof value === 'string' && INDEX_KINDS.some(kind => kind === value);
}

function loadCodeSchema(code: string, entry: unknown): CodeSchema {
  if (!isRecord(entry) || typeof entry.name !== 'string' || !isIndexKind(entry.index) || !isRecord(entry.verbs)) {
    throw new TypeError(`Malformed code table entry: ${code}`);
  }
  const verbs: Partial<Record<VerbKey, RegExp>> = {};
  for (const [verb, regex] of Object.entries(entry.verbs)) {
    if (!isVerbKey(verb) || typeof regex !== 'string') {
      throw new TypeError(`Malformed payload pattern: ${code}/${verb}`);
    }
    verbs[verb] = new RegExp(regex);
  }
  return {
    name: entry.name,
    index: entry.index,
    rqMayHavePayload: entry.rqMayHavePayload === true,
    verbs,
  };
}

function loadDeviceSchema(devType: string, entry: unknown): DeviceSchema {
  if (!isRecord(entry)) {
    throw new TypeError(`Malformed device table entry: ${devType}`);
  }
  const schema: DeviceSchema = {};
  for (const [code, verbs] of Object.entries(entry)) {
    if (!Array.isArray(verbs) || !verbs.every(isVerbKey)) {
      throw new TypeError(`Malformed device table entry: ${devType}/${code}`);
    }
    schema[code] = verbs.filter(isVerbKey);
  }
  return schema;
}

/**
 * Builds the code table (code -> name, index kind, verb -> payload pattern).
 * @throws TypeError if the data does not have the expected shape
 */
export function loadCodes(data: unknown): Record<string, CodeSchema> {
  if (!isRecord(data)) {
    throw new TypeError('Code table must be an object');
  }
  const codes: Record<string, CodeSchema> = {};
  for (const [code, entry] of Object.entries(data)) {
    codes[code] = loadCodeSchema(code, entry);
  }
  return codes;
}

/**
 * Builds the device table (device type -> code -> verbs it may send).
 * @throws TypeError if the data does not have the expected shape
 */
export function loadDevices(data: unknown): Record<string, DeviceSchema> {
  if (!isRecord(data)) {
    throw new TypeError('Device table must be an object');
  }
  const devices: Record<string, DeviceSchema> = {};
  for (const [devType, entry] of Object.entries(data)) {
    devices[devType] = loadDeviceSchema(devType, entry);
  }
  return devices;
}

const codesData: unknown = codesJson;
const devicesData: unknown = devicesJson;

export const RAMSES_CODES: Readonly<Record<string, CodeSchema>> = loadCodes(codesData);
export const RAMSES_DEVICES: Readonly<Record<string, DeviceSchema>> = loadDevices(devicesData);
