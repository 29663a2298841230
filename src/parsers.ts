// src/parsers.ts

import { createErr, createOk, type Result } from 'option-t/plain_result';
import type { Address } from './address.js';
import { CODES } from './constants/constants.js';
import { CodingError, CorruptPayloadError, NotImplementedCodeError, RamsesError } from './errors.js';
import type { Frame } from './frame.js';
import { codecLogger } from './logger.js';
import { parseRfBind } from './message-codes/bind.js';
import { parseDhwMode, parseDhwParams, parseDhwTemp } from './message-codes/dhw.js';
import { parseSystemFault } from './message-codes/fault.js';
import {
  parseActuatorCycle,
  parseActuatorState,
  parseActuatorSync,
  parseBoilerSetpoint,
  parseHeatDemand,
  parseMixValveParams,
  parseRelayDemand,
  parseRelayFailsafe,
  parseUfhSetpoint,
} from './message-codes/heating.js';
import {
  parseFanState,
  parseHvacState,
  parseSwitchDuration,
  parseSwitchSpeed,
  parseVentilationActive,
} from './message-codes/hvac.js';
import {
  parseMessage000E,
  parseMessage042F,
  parseMessage0B04,
  parseMessage22D0,
  parseMessage2D49,
  parseMessage3120,
  parsePuzzle,
  parseTrvUnknown,
} from './message-codes/misc.js';
import { parseOpenthermMsg, parseOpenthermSync } from './message-codes/opentherm-msg.js';
import { parseZoneSchedule } from './message-codes/schedule.js';
import {
  parseAirQuality,
  parseCo2Level,
  parseDeviceBattery,
  parseDeviceInfo,
  parseDisplayedTemp,
  parseIndoorHumidity,
  parseMessage1090,
  parseOutdoorTemp,
  parseWeatherSensor,
} from './message-codes/sensors.js';
import {
  parseDatetime,
  parseLanguage,
  parseRfCheck,
  parseRfUnknown,
  parseScheduleSync,
  parseSystemMode,
  parseSystemSync,
  parseTpiParams,
} from './message-codes/system.js';
import {
  parseSetpoint,
  parseSetpointNow,
  parseSystemZones,
  parseTemperature,
  parseWindowState,
  parseZoneDevices,
  parseZoneMode,
  parseZoneName,
  parseZoneParams,
} from './message-codes/zones.js';
import type {
  CodecConfig,
  DecodedPayload,
  FrameMeta,
  PayloadParser,
  Verb,
} from './types/ramses-types.js';
import { DEFAULT_CONFIG, PayloadValidator, type ValidatedParser } from './validator.js';

const logger = codecLogger.createLogger('parsers');

const validator = new PayloadValidator();

function validated(body: PayloadParser): ValidatedParser {
  return validator.wrap(body);
}

/**
 * Runs a body with none of the device or pattern checks.
 */
function unvalidated(body: PayloadParser): ValidatedParser {
  return (payload: string, meta: FrameMeta, config: CodecConfig = DEFAULT_CONFIG): DecodedPayload =>
    body(payload, { ...meta, payload, dtm: meta.dtm ?? new Date(), hasPayload: true, isArray: false, config });
}

/**
 * code -> decoder. A code that is known but has no entry here (1280) cannot be decoded.
 */
export const PAYLOAD_PARSERS: Readonly<Record<string, ValidatedParser>> = {
  [CODES.RF_UNKNOWN]: validated(parseRfUnknown),
  [CODES.WEATHER_SENSOR]: validated(parseWeatherSensor),
  [CODES.ZONE_NAME]: validated(parseZoneName),
  [CODES.SYSTEM_ZONES]: validated(parseSystemZones),
  [CODES.SCHEDULE_SYNC]: validated(parseScheduleSync),
  [CODES.RELAY_DEMAND]: validated(parseRelayDemand),
  [CODES.RELAY_FAILSAFE]: validated(parseRelayFailsafe),
  [CODES.ZONE_PARAMS]: validated(parseZoneParams),
  [CODES.ZONE_DEVICES]: validated(parseZoneDevices),
  [CODES.MESSAGE_000E]: validated(parseMessage000E),
  [CODES.RF_CHECK]: validated(parseRfCheck),
  [CODES.LANGUAGE]: validated(parseLanguage),
  [CODES.MESSAGE_01D0]: validated(parseTrvUnknown),
  [CODES.MESSAGE_01E9]: validated(parseTrvUnknown),
  [CODES.ZONE_SCHEDULE]: validated(parseZoneSchedule),
  [CODES.SYSTEM_FAULT]: validated(parseSystemFault),
  [CODES.MESSAGE_042F]: validated(parseMessage042F),
  [CODES.MESSAGE_0B04]: validated(parseMessage0B04),
  [CODES.MIXVALVE_PARAMS]: validated(parseMixValveParams),
  [CODES.DEVICE_BATTERY]: validated(parseDeviceBattery),
  [CODES.MESSAGE_1090]: validated(parseMessage1090),
  [CODES.DHW_PARAMS]: validated(parseDhwParams),
  [CODES.DEVICE_INFO]: validated(parseDeviceInfo),
  [CODES.TPI_PARAMS]: validated(parseTpiParams),
  [CODES.DHW_TEMP]: validated(parseDhwTemp),
  [CODES.OUTDOOR_TEMP]: validated(parseOutdoorTemp),
  [CODES.CO2_LEVEL]: validated(parseCo2Level),
  [CODES.INDOOR_HUMIDITY]: validated(parseIndoorHumidity),
  [CODES.WINDOW_STATE]: validated(parseWindowState),
  [CODES.DISPLAYED_TEMP]: validated(parseDisplayedTemp),
  [CODES.AIR_QUALITY]: validated(parseAirQuality),
  [CODES.SYSTEM_SYNC]: validated(parseSystemSync),
  [CODES.DHW_MODE]: validated(parseDhwMode),
  [CODES.RF_BIND]: validated(parseRfBind),
  [CODES.OPENTHERM_SYNC]: validated(parseOpenthermSync),
  [CODES.SETPOINT_NOW]: validated(parseSetpointNow),
  [CODES.UFH_SETPOINT]: validated(parseUfhSetpoint),
  [CODES.MESSAGE_22D0]: validated(parseMessage22D0),
  [CODES.BOILER_SETPOINT]: validated(parseBoilerSetpoint),
  [CODES.SWITCH_SPEED]: validated(parseSwitchSpeed),
  [CODES.SWITCH_DURATION]: validated(parseSwitchDuration),
  [CODES.SETPOINT]: validated(parseSetpoint),
  [CODES.ZONE_MODE]: validated(parseZoneMode),
  [CODES.MESSAGE_2D49]: validated(parseMessage2D49),
  [CODES.SYSTEM_MODE]: validated(parseSystemMode),
  [CODES.TEMPERATURE]: validated(parseTemperature),
  [CODES.MESSAGE_3120]: validated(parseMessage3120),
  [CODES.DATETIME]: validated(parseDatetime),
  [CODES.HEAT_DEMAND]: validated(parseHeatDemand),
  [CODES.FAN_STATE]: validated(parseFanState),
  [CODES.HVAC_STATE]: validated(parseHvacState),
  [CODES.MESSAGE_31E0]: validated(parseVentilationActive),
  [CODES.OPENTHERM_MSG]: validated(parseOpenthermMsg),
  [CODES.ACTUATOR_SYNC]: validated(parseActuatorSync),
  [CODES.ACTUATOR_STATE]: validated(parseActuatorState),
  [CODES.ACTUATOR_CYCLE]: validated(parseActuatorCycle),
  [CODES.PUZZLE]: unvalidated(parsePuzzle),
};

/**
 * Decodes a payload, throwing on any fault.
 * @throws NotImplementedCodeError, CorruptFrameError, CorruptPayloadError, or whatever a decoder throws
 */
export function decodePayload(meta: FrameMeta, payload: string, config: CodecConfig = DEFAULT_CONFIG): DecodedPayload {
  const parser = PAYLOAD_PARSERS[meta.code];
  if (parser === undefined) {
    throw new NotImplementedCodeError(meta.code);
  }
  if (payload.length % 2 !== 0 || meta.len !== payload.length / 2) {
    throw new CorruptPayloadError(`Invalid length: ${meta.len} (payload is ${payload.length / 2} bytes)`);
  }
  return parser(payload, meta, config);
}

/**
 * Decodes the payload of a frame.
 * @returns the decoded payload, or the fault: anything other than a codec error is
 * returned as a CodingError
 */
export function parsePayload(frame: Frame, config: CodecConfig = DEFAULT_CONFIG): Result<DecodedPayload, RamsesError> {
  try {
    return createOk(decodePayload(frame.meta, frame.payload, config));
  } catch (err) {
    return createErr(err instanceof RamsesError ? err : new CodingError(err));
  }
}

export interface ParseMeta {
  verb: Verb;
  src: Address;
  dst: Address;
  /** Declared length in bytes, taken from the payload if not given */
  len?: number;
  dtm?: Date;
}

/**
 * Decodes a payload, logging any fault.
 * @returns the decoded payload, or null if it could not be decoded
 */
export function parse(
  code: string,
  payload: string,
  meta: ParseMeta,
  config: CodecConfig = DEFAULT_CONFIG
): DecodedPayload | null {
  const frameMeta: FrameMeta = { ...meta, code, len: meta.len ?? Math.floor(payload.length / 2) };

  let fault: RamsesError;
  try {
    return decodePayload(frameMeta, payload, config);
  } catch (err) {
    fault = err instanceof RamsesError ? err : new CodingError(err);
  }

  const context = { verb: meta.verb, code, src: meta.src.id, dst: meta.dst.id };
  if (fault instanceof CodingError) {
    logger.error(fault, context);
  } else {
    logger.warn(fault, context);
  }
  return null;
}
