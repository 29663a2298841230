// src/message-codes/sensors.ts

import { decodeDate, decodeDouble, decodePercent, decodeTemperature } from '../decoders.js';
import { assertPayload } from '../errors.js';
import type { ParseContext, PayloadRecord } from '../types/ramses-types.js';
import { bytesToText, tempToHex } from '../utils/helpers.js';
import { hexToInt } from '../utils/utils.js';

const NULL_DATE = '0000-00-00';

/** Humidity bytes that report a sensor state instead of a value */
const RHUM_STATE: readonly string[] = ['EF', 'F0', 'F1', 'F2', 'F3', 'F4', 'F5'];

// !=============================================================================
// ! 0002: weather_sensor
// !=============================================================================

export function parseWeatherSensor(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 4, `Invalid length: ${ctx.len} (expecting 4)`);
  return { temperature: decodeTemperature(payload.slice(2, 6)), _unknown: payload.slice(6) };
}

export function buildOutdoorTempPayload(temperature: number | null): string {
  return `00${tempToHex(temperature)}01`;
}

// !=============================================================================
// ! 1060: device_battery
// !=============================================================================

export function parseDeviceBattery(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 3, `Invalid length: ${ctx.len} (expecting 3)`);
  assertPayload(payload.slice(4, 6) === '00' || payload.slice(4, 6) === '01', `Invalid battery state: '${payload.slice(4, 6)}'`);

  return {
    battery_low: payload.slice(4) === '00',
    battery_level: decodePercent(payload.slice(2, 4)),
  };
}

// !=============================================================================
// ! 1090: message_1090 (two temperatures, from non-evohome programmers)
// !=============================================================================

export function parseMessage1090(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len === 5, `Invalid length: ${ctx.len} (expecting 5)`);
  assertPayload(hexToInt(payload.slice(0, 2)) < 2, `Invalid index: '${payload.slice(0, 2)}'`);

  return {
    temp_0: decodeTemperature(payload.slice(2, 6)),
    temp_1: decodeTemperature(payload.slice(6, 10)),
  };
}

// !=============================================================================
// ! 10E0: device_info
// !=============================================================================

export function parseDeviceInfo(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(ctx.len >= 19, `Invalid length: ${ctx.len} (expecting 19 or more)`);

  const description = bytesToText(payload.slice(36));
  return {
    unknown: payload.slice(2, 20),
    date_2: decodeDate(payload.slice(20, 28)) ?? NULL_DATE,
    date_1: decodeDate(payload.slice(28, 36)) ?? NULL_DATE,
    description,
    _unknown_2: payload.slice(38 + description.length * 2),
  };
}

// !=============================================================================
// ! 1290: outdoor_temp
// !=============================================================================

export function parseOutdoorTemp(payload: string, _ctx: ParseContext): PayloadRecord {
  return { temperature: decodeTemperature(payload.slice(2, 6)) };
}

// !=============================================================================
// ! 1298: co2_level
// !=============================================================================

export function parseCo2Level(payload: string, _ctx: ParseContext): PayloadRecord {
  return { co2_level: decodeDouble(payload.slice(2, 6)) };
}

// !=============================================================================
// ! 12A0: indoor_humidity
// !=============================================================================

export function parseIndoorHumidity(payload: string, ctx: ParseContext): PayloadRecord {
  assertPayload(payload.slice(0, 2) === '00', `Invalid header: '${payload.slice(0, 2)}'`);
  const rhum = payload.slice(2, 4);
  assertPayload(RHUM_STATE.includes(rhum) || hexToInt(rhum) <= 100, `Invalid humidity: '${rhum}'`);

  const relativeHumidity = rhum === 'EF' ? null : hexToInt(rhum) / 100;
  if (ctx.len === 2) return { relative_humidity: relativeHumidity };

  assertPayload(ctx.len === 6, `Invalid length: ${ctx.len} (expecting 2 or 6)`);
  return {
    relative_humidity: relativeHumidity,
    temperature: decodeTemperature(payload.slice(4, 8)),
    dewpoint_temp: decodeTemperature(payload.slice(8, 12)),
  };
}

// !=============================================================================
// ! 12C0: displayed_temp
// !=============================================================================

export function parseDisplayedTemp(payload: string, _ctx: ParseContext): PayloadRecord {
  assertPayload(payload.slice(0, 2) === '00', `Invalid header: '${payload.slice(0, 2)}'`);
  assertPayload(payload.slice(4) === '01', `Invalid payload: '${payload.slice(4)}'`);

  // half degrees
  const value = payload.slice(2, 4);
  return { temperature: value === '80' ? null : hexToInt(value) / 2 };
}

// !=============================================================================
// ! 12C8: air_quality
// !=============================================================================

export function parseAirQuality(payload: string, _ctx: ParseContext): PayloadRecord {
  assertPayload(payload.slice(2, 4) === '00', `Invalid payload: '${payload.slice(2, 4)}'`);
  return { air_quality: decodePercent(payload.slice(4, 6)) };
}
