// src/command.ts

import { pktAddrs } from './address.js';
import {
  CODES,
  COMMAND_REGEX,
  HGI_DEV_ID,
  NON_DEV_ID,
  NUL_DEV_ID,
  PRIORITY,
  QOS_TABLE,
  QOS_TX_DEFAULT,
  VERBS,
  ZONE_MODE_MAP,
  type QosParams,
} from './constants/constants.js';
import { CommandInvalidError, assertCommand } from './errors.js';
import { Frame, toVerb } from './frame.js';
import { buildBindPayload } from './message-codes/bind.js';
import { buildDhwModePayload, buildDhwParamsPayload, type DhwParams } from './message-codes/dhw.js';
import { buildLogEntryRequestPayload, MAX_LOG_IDX } from './message-codes/fault.js';
import {
  buildActuatorCyclePayload,
  buildActuatorStatePayload,
  buildMixValveParamsPayload,
  type MixValveParams,
} from './message-codes/heating.js';
import { buildFanStatePayload, type FanState } from './message-codes/hvac.js';
import { buildPuzzlePayload, type PuzzleParams } from './message-codes/misc.js';
import { buildOpenthermRequestPayload } from './message-codes/opentherm-msg.js';
import { buildScheduleFragmentPayload, buildScheduleRequestPayload } from './message-codes/schedule.js';
import { buildOutdoorTempPayload } from './message-codes/sensors.js';
import {
  buildDatetimePayload,
  buildSystemModePayload,
  buildTpiParamsPayload,
  type TpiParams,
} from './message-codes/system.js';
import {
  buildSensorTempPayload,
  buildSetpointPayload,
  buildSystemZonesPayload,
  buildZoneModePayload,
  buildZoneNamePayload,
  buildZoneParamsPayload,
  type ModeParams,
  type ZoneConfig,
} from './message-codes/zones.js';
import type { CommandOptions, Verb, ZoneIdx } from './types/ramses-types.js';
import { hexToInt, lookup, toHex } from './utils/utils.js';

const MIN_PAYLOAD_HEX = 2;
const MAX_PAYLOAD_HEX = 96;

const DHW_IDX = 'FA';

// !=============================================================================
// ! Command
// !=============================================================================

export interface CommandFields {
  verb: Verb;
  code: string;
  payload: string;
  /** the three address slots, space separated */
  addrs: string;
  seqn?: string;
}

/**
 * A frame to be sent, with the QoS the transport should give it.
 *
 * Commands order by priority (lower first), then by when they were made.
 */
export class Command extends Frame {
  private static counter = 0;

  readonly qos: Readonly<QosParams>;
  private readonly serial: number;

  constructor(fields: CommandFields, options: CommandOptions = {}) {
    super(Command.checkAddrs(fields));

    const defaults = QOS_TABLE[`${fields.verb}/${fields.code}`] ?? {};
    this.qos = {
      priority: options.priority ?? defaults.priority ?? QOS_TX_DEFAULT.priority,
      retries: options.retries ?? defaults.retries ?? QOS_TX_DEFAULT.retries,
      timeout: options.timeout ?? defaults.timeout ?? QOS_TX_DEFAULT.timeout,
      disableBackoff: options.disableBackoff ?? defaults.disableBackoff ?? QOS_TX_DEFAULT.disableBackoff,
    };
    this.serial = Command.counter++;

    if (!this.isValid) {
      throw new CommandInvalidError(`Invalid command: ${this.toString()}`);
    }
  }

  private static checkAddrs(fields: CommandFields): CommandFields {
    try {
      pktAddrs(fields.addrs);
    } catch (err) {
      throw new CommandInvalidError(`Invalid addresses: ${fields.addrs} (${err instanceof Error ? err.message : String(err)})`);
    }
    return fields;
  }

  /**
   * A command from the gateway (or `options.fromId`) to one device.
   */
  static to(verb: Verb, code: string, payload: string, destId: string, options: CommandOptions = {}): Command {
    const fromId = options.fromId ?? HGI_DEV_ID;
    return new Command({ verb, code, payload, addrs: `${fromId} ${destId} ${NON_DEV_ID}` }, options);
  }

  get priority(): number {
    return this.qos.priority;
  }

  get isValid(): boolean {
    return (
      COMMAND_REGEX.test(this.toString()) &&
      this.payload.length % 2 === 0 &&
      this.payload.length >= MIN_PAYLOAD_HEX &&
      this.payload.length <= MAX_PAYLOAD_HEX
    );
  }

  /**
   * Sort order for a send queue: negative if `a` goes first.
   */
  static compare(a: Command, b: Command): number {
    return a.priority - b.priority || a.dtm.getTime() - b.dtm.getTime() || a.serial - b.serial;
  }
}

// !=============================================================================
// ! Argument normalisation
// !=============================================================================

/**
 * Resolves a zone index given as a number, a hex string, or 'HW' (the DHW).
 * @returns two hex digits
 */
export function normaliseZoneIdx(zoneIdx: ZoneIdx): string {
  let value: number;
  if (typeof zoneIdx === 'number') {
    value = zoneIdx;
  } else if (zoneIdx.toUpperCase() === 'HW') {
    return DHW_IDX;
  } else {
    assertCommand(/^[0-9A-Fa-f]{1,2}$/.test(zoneIdx), `Invalid zone_idx: '${zoneIdx}'`);
    value = hexToInt(zoneIdx);
  }

  assertCommand(
    Number.isInteger(value) && ((value >= 0 && value <= 0x0f) || value === 0xfa),
    `Invalid zone_idx: ${String(zoneIdx)}`
  );
  return toHex(value);
}

function resolveZoneMode(mode: string | number): string {
  const code = typeof mode === 'number' ? toHex(mode) : mode.toUpperCase();
  if (lookup(ZONE_MODE_MAP, code) !== undefined) return code;

  const byName = Object.entries(ZONE_MODE_MAP).find(([, name]) => name === mode);
  assertCommand(byName !== undefined, `Unknown zone_mode: '${String(mode)}'`);
  return byName[0];
}

/**
 * Resolves the mode of a zone (or the DHW) from the arguments given.
 * With no mode, it is inferred: an until means a temporary override, a
 * duration a countdown, and neither a permanent override.
 * @param target - the setpoint of a zone, or the state of the DHW
 */
export function normaliseZoneMode(
  mode: string | number | null,
  target: number | boolean | null,
  until: Date | string | null,
  duration: number | null
): string {
  assertCommand(mode !== null || target !== null, 'One of mode or setpoint/active must be given');
  assertCommand(until === null || duration === null, 'At most one of until or duration may be given');

  let code: string;
  if (mode !== null) {
    code = resolveZoneMode(mode);
  } else if (until !== null) {
    code = '04';
  } else if (duration !== null) {
    code = '03';
  } else {
    code = '02';
  }

  assertCommand(code === '00' || target !== null, `For mode ${code}, setpoint/active must be given`);
  return code;
}

/**
 * Checks an until and a duration against a resolved mode. A temporary override
 * without an until becomes an advanced override.
 */
export function normaliseDuration(mode: string, until: Date | string | null, duration: number | null): ModeParams {
  if (mode === '04') {
    assertCommand(duration === null, `For mode ${mode}, duration must be null`);
    return until === null ? { mode: '01', until: null, duration: null } : { mode, until, duration: null };
  }
  if (mode === '03') {
    assertCommand(duration !== null, `For mode ${mode}, duration is required`);
    assertCommand(until === null, `For mode ${mode}, until must be null`);
    assertCommand(Number.isInteger(duration) && duration >= 0 && duration < 0xffffff, `Invalid duration: ${duration}`);
    return { mode, until: null, duration };
  }
  assertCommand(until === null && duration === null, `For mode ${mode}, until and duration must both be null`);
  return { mode, until: null, duration: null };
}

/**
 * Makes any fault in a builder a CommandInvalidError.
 */
function guarded<A extends unknown[]>(build: (...args: A) => Command): (...args: A) => Command {
  return (...args: A): Command => {
    try {
      return build(...args);
    } catch (err) {
      if (err instanceof CommandInvalidError) throw err;
      throw new CommandInvalidError(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    }
  };
}

// !=============================================================================
// ! Generic constructors
// !=============================================================================

export interface PacketAddrs {
  addr0?: string;
  addr1?: string;
  addr2?: string;
  seqn?: string | number;
}

/**
 * A command with the address slots given as they are to be sent, e.g.
 * `I --- --:------ --:------ 02:123456`. Empty slots are `--:------`.
 */
export const packet = guarded(
  (verb: string, code: string, payload: string, addrs: PacketAddrs = {}, options: CommandOptions = {}): Command => {
    const { addr0 = NON_DEV_ID, addr1 = NON_DEV_ID, addr2 = NON_DEV_ID, seqn } = addrs;

    let seq = '---';
    if (typeof seqn === 'number' || (seqn !== undefined && /^\d{1,3}$/.test(seqn))) {
      seq = String(seqn).padStart(3, '0');
    } else {
      assertCommand(seqn === undefined || /^-{0,3}$/.test(seqn), `Invalid seqn: '${String(seqn)}'`);
    }

    return new Command({ verb: toVerb(verb), code, payload, addrs: `${addr0} ${addr1} ${addr2}`, seqn: seq }, options);
  }
);

/**
 * A puzzle packet, written to the bus to mark a log.
 */
export const puzzle = guarded(
  (msgType: string = '01', params: PuzzleParams = {}, options: CommandOptions = {}): Command =>
    Command.to(VERBS.I, CODES.PUZZLE, buildPuzzlePayload(msgType, params), NUL_DEV_ID, options)
);

// !=============================================================================
// ! DHW
// !=============================================================================

export const getDhwMode = guarded(
  (ctlId: string, options: CommandOptions = {}): Command => Command.to(VERBS.RQ, CODES.DHW_MODE, '00', ctlId, options)
);

export interface DhwModeArgs {
  mode?: string | number | null;
  active?: boolean | null;
  until?: Date | string | null;
  duration?: number | null;
}

export const setDhwMode = guarded((ctlId: string, args: DhwModeArgs, options: CommandOptions = {}): Command => {
  const { mode = null, active = null, until = null, duration = null } = args;
  const code = normaliseZoneMode(mode, active, until, duration);
  const payload = buildDhwModePayload(active, normaliseDuration(code, until, duration));
  return Command.to(VERBS.W, CODES.DHW_MODE, payload, ctlId, options);
});

export const getDhwParams = guarded(
  (ctlId: string, options: CommandOptions = {}): Command => Command.to(VERBS.RQ, CODES.DHW_PARAMS, '00', ctlId, options)
);

export const setDhwParams = guarded(
  (ctlId: string, params: DhwParams = {}, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.DHW_PARAMS, buildDhwParamsPayload(params), ctlId, options)
);

export const getDhwTemp = guarded(
  (ctlId: string, options: CommandOptions = {}): Command => Command.to(VERBS.RQ, CODES.DHW_TEMP, '00', ctlId, options)
);

// !=============================================================================
// ! Heating
// !=============================================================================

export const getMixValveParams = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.MIXVALVE_PARAMS, `${normaliseZoneIdx(zoneIdx)}00`, ctlId, options)
);

export const setMixValveParams = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, params: MixValveParams = {}, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.MIXVALVE_PARAMS, buildMixValveParamsPayload(normaliseZoneIdx(zoneIdx), params), ctlId, options)
);

export const getOpenthermData = guarded(
  (otbId: string, msgId: number, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.OPENTHERM_MSG, buildOpenthermRequestPayload(msgId), otbId, options)
);

export const getTpiParams = guarded(
  (ctlId: string, domainId: string = 'FC', options: CommandOptions = {}): Command => {
    assertCommand(domainId === '00' || domainId === 'FC', `Invalid domain_id: '${domainId}'`);
    return Command.to(VERBS.RQ, CODES.TPI_PARAMS, domainId, ctlId, options);
  }
);

export const setTpiParams = guarded(
  (ctlId: string, domainId: string, params: TpiParams = {}, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.TPI_PARAMS, buildTpiParamsPayload(domainId, params), ctlId, options)
);

/**
 * The state of an actuator, as a faked relay would report it.
 */
export const putActuatorState = guarded(
  (devId: string, modLevel: number | null, options: CommandOptions = {}): Command =>
    packet(VERBS.I, CODES.ACTUATOR_STATE, buildActuatorStatePayload(modLevel), { addr0: devId, addr2: devId }, options)
);

export const putActuatorCycle = guarded(
  (
    srcId: string,
    dstId: string,
    modLevel: number,
    actuatorCountdown: number,
    cycleCountdown: number | null = null,
    options: CommandOptions = {}
  ): Command => {
    const payload = buildActuatorCyclePayload(modLevel, actuatorCountdown, cycleCountdown);
    return packet(VERBS.RP, CODES.ACTUATOR_CYCLE, payload, { addr0: srcId, addr1: dstId }, options);
  }
);

// !=============================================================================
// ! Schedules
// !=============================================================================

export const getScheduleFragment = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, fragIdx: number, fragCnt: number, options: CommandOptions = {}): Command =>
    Command.to(
      VERBS.RQ,
      CODES.ZONE_SCHEDULE,
      buildScheduleRequestPayload(normaliseZoneIdx(zoneIdx), fragIdx, fragCnt),
      ctlId,
      options
    )
);

export const putScheduleFragment = guarded(
  (
    ctlId: string,
    zoneIdx: ZoneIdx,
    fragIdx: number,
    fragCnt: number,
    fragment: string,
    options: CommandOptions = {}
  ): Command =>
    Command.to(
      VERBS.W,
      CODES.ZONE_SCHEDULE,
      buildScheduleFragmentPayload(normaliseZoneIdx(zoneIdx), fragIdx, fragCnt, fragment),
      ctlId,
      options
    )
);

// !=============================================================================
// ! System
// !=============================================================================

export const getSystemLanguage = guarded(
  (ctlId: string, options: CommandOptions = {}): Command => Command.to(VERBS.RQ, CODES.LANGUAGE, '00', ctlId, options)
);

export const getSystemLogEntry = guarded(
  (ctlId: string, logIdx: number | string, options: CommandOptions = {}): Command => {
    const idx = typeof logIdx === 'number' ? logIdx : hexToInt(logIdx);
    assertCommand(Number.isInteger(idx) && idx >= 0 && idx <= MAX_LOG_IDX, `Invalid log_idx: ${String(logIdx)}`);
    return Command.to(VERBS.RQ, CODES.SYSTEM_FAULT, buildLogEntryRequestPayload(idx), ctlId, options);
  }
);

export const getSystemMode = guarded(
  (ctlId: string, options: CommandOptions = {}): Command => Command.to(VERBS.RQ, CODES.SYSTEM_MODE, 'FF', ctlId, options)
);

export const setSystemMode = guarded(
  (ctlId: string, systemMode: string | number, until: Date | string | null = null, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.SYSTEM_MODE, buildSystemModePayload(systemMode, until), ctlId, options)
);

export const getSystemTime = guarded(
  (ctlId: string, options: CommandOptions = {}): Command => Command.to(VERBS.RQ, CODES.DATETIME, '00', ctlId, options)
);

export const setSystemTime = guarded(
  (ctlId: string, datetime: Date | string, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.DATETIME, buildDatetimePayload(datetime), ctlId, options)
);

/**
 * Announces the zones of a type: an I if there is no destination, else an RP.
 */
export const putSystemZones = guarded(
  (
    ctlId: string,
    zoneType: string,
    zoneMask: readonly number[],
    dstId: string | null = null,
    options: CommandOptions = {}
  ): Command => {
    const payload = buildSystemZonesPayload(zoneType, zoneMask);
    return dstId === null
      ? packet(VERBS.I, CODES.SYSTEM_ZONES, payload, { addr0: ctlId, addr2: ctlId }, options)
      : packet(VERBS.RP, CODES.SYSTEM_ZONES, payload, { addr0: ctlId, addr1: dstId }, options);
  }
);

// !=============================================================================
// ! Zones
// !=============================================================================

export const getZoneConfig = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.ZONE_PARAMS, `${normaliseZoneIdx(zoneIdx)}00`, ctlId, options)
);

export const setZoneConfig = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, config: ZoneConfig = {}, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.ZONE_PARAMS, buildZoneParamsPayload(normaliseZoneIdx(zoneIdx), config), ctlId, options)
);

export const getZoneMode = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.ZONE_MODE, `${normaliseZoneIdx(zoneIdx)}00`, ctlId, options)
);

export interface ZoneModeArgs {
  mode?: string | number | null;
  setpoint?: number | null;
  until?: Date | string | null;
  duration?: number | null;
}

/**
 * Sets or resets the mode of a zone. A setpoint that is needed but not
 * given is sent as not available, and the controller uses its maximum.
 */
export const setZoneMode = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, args: ZoneModeArgs, options: CommandOptions = {}): Command => {
    const { mode = null, setpoint = null, until = null, duration = null } = args;
    const code = normaliseZoneMode(mode, setpoint, until, duration);
    const payload = buildZoneModePayload(normaliseZoneIdx(zoneIdx), setpoint, normaliseDuration(code, until, duration));
    return Command.to(VERBS.W, CODES.ZONE_MODE, payload, ctlId, options);
  }
);

export const getZoneName = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.ZONE_NAME, `${normaliseZoneIdx(zoneIdx)}00`, ctlId, options)
);

export const setZoneName = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, name: string, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.ZONE_NAME, buildZoneNamePayload(normaliseZoneIdx(zoneIdx), name), ctlId, options)
);

export const setZoneSetpoint = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, setpoint: number, options: CommandOptions = {}): Command =>
    Command.to(VERBS.W, CODES.SETPOINT, buildSetpointPayload(normaliseZoneIdx(zoneIdx), setpoint), ctlId, options)
);

export const getZoneTemp = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.TEMPERATURE, normaliseZoneIdx(zoneIdx), ctlId, options)
);

export const getZoneWindowState = guarded(
  (ctlId: string, zoneIdx: ZoneIdx, options: CommandOptions = {}): Command =>
    Command.to(VERBS.RQ, CODES.WINDOW_STATE, normaliseZoneIdx(zoneIdx), ctlId, options)
);

// !=============================================================================
// ! Faked devices
// !=============================================================================

export interface BindArgs {
  idx?: string;
  dstId?: string | null;
}

/**
 * One step of the three-way bind: an offer (an I to nobody), an accept (a W)
 * or a confirm (an I to the device that accepted).
 */
export const putBind = guarded(
  (verb: string, codes: string | readonly string[], srcId: string, args: BindArgs = {}, options: CommandOptions = {}): Command => {
    const { idx = '00', dstId = null } = args;
    const wireVerb = toVerb(verb);
    const codeList = typeof codes === 'string' ? [codes] : codes;

    assertCommand(dstId !== null || wireVerb === VERBS.I, `A bind ${verb} needs a destination`);
    const payload = buildBindPayload(wireVerb, codeList, srcId, idx, dstId !== null);

    const addrs: PacketAddrs =
      dstId === null ? { addr0: srcId, addr2: srcId } : { addr0: srcId, addr1: dstId };
    return packet(wireVerb, CODES.RF_BIND, payload, addrs, { priority: PRIORITY.HIGH, retries: 3, ...options });
  }
);

export const putOutdoorTemp = guarded(
  (devId: string, temperature: number | null, options: CommandOptions = {}): Command =>
    packet(VERBS.I, CODES.WEATHER_SENSOR, buildOutdoorTempPayload(temperature), { addr0: devId, addr2: devId }, options)
);

export const putSensorTemp = guarded(
  (devId: string, temperature: number | null, options: CommandOptions = {}): Command =>
    packet(VERBS.I, CODES.TEMPERATURE, buildSensorTempPayload(temperature), { addr0: devId, addr2: devId }, options)
);

/**
 * The state of a ventilation fan, as a faked fan would report it.
 */
export const putFanState = guarded(
  (fanId: string, state: FanState, hvacId: string = '00', options: CommandOptions = {}): Command =>
    packet(VERBS.I, CODES.FAN_STATE, buildFanStatePayload(hvacId, state), { addr0: fanId, addr2: fanId }, options)
);

// !=============================================================================
// ! Lookup
// !=============================================================================

/** `verb/code` -> builder */
export const COMMAND_BUILDERS = {
  [`${VERBS.I}/${CODES.WEATHER_SENSOR}`]: putOutdoorTemp,
  [`${VERBS.RQ}/${CODES.ZONE_NAME}`]: getZoneName,
  [`${VERBS.W}/${CODES.ZONE_NAME}`]: setZoneName,
  [`${VERBS.I}/${CODES.SYSTEM_ZONES}`]: putSystemZones,
  [`${VERBS.RQ}/${CODES.ZONE_PARAMS}`]: getZoneConfig,
  [`${VERBS.W}/${CODES.ZONE_PARAMS}`]: setZoneConfig,
  [`${VERBS.RQ}/${CODES.LANGUAGE}`]: getSystemLanguage,
  [`${VERBS.RQ}/${CODES.ZONE_SCHEDULE}`]: getScheduleFragment,
  [`${VERBS.W}/${CODES.ZONE_SCHEDULE}`]: putScheduleFragment,
  [`${VERBS.RQ}/${CODES.SYSTEM_FAULT}`]: getSystemLogEntry,
  [`${VERBS.RQ}/${CODES.MIXVALVE_PARAMS}`]: getMixValveParams,
  [`${VERBS.W}/${CODES.MIXVALVE_PARAMS}`]: setMixValveParams,
  [`${VERBS.RQ}/${CODES.DHW_PARAMS}`]: getDhwParams,
  [`${VERBS.W}/${CODES.DHW_PARAMS}`]: setDhwParams,
  [`${VERBS.RQ}/${CODES.TPI_PARAMS}`]: getTpiParams,
  [`${VERBS.W}/${CODES.TPI_PARAMS}`]: setTpiParams,
  [`${VERBS.RQ}/${CODES.DHW_TEMP}`]: getDhwTemp,
  [`${VERBS.RQ}/${CODES.WINDOW_STATE}`]: getZoneWindowState,
  [`${VERBS.RQ}/${CODES.DHW_MODE}`]: getDhwMode,
  [`${VERBS.W}/${CODES.DHW_MODE}`]: setDhwMode,
  [`${VERBS.I}/${CODES.RF_BIND}`]: putBind,
  [`${VERBS.W}/${CODES.SETPOINT}`]: setZoneSetpoint,
  [`${VERBS.RQ}/${CODES.ZONE_MODE}`]: getZoneMode,
  [`${VERBS.W}/${CODES.ZONE_MODE}`]: setZoneMode,
  [`${VERBS.RQ}/${CODES.SYSTEM_MODE}`]: getSystemMode,
  [`${VERBS.W}/${CODES.SYSTEM_MODE}`]: setSystemMode,
  [`${VERBS.I}/${CODES.TEMPERATURE}`]: putSensorTemp,
  [`${VERBS.RQ}/${CODES.TEMPERATURE}`]: getZoneTemp,
  [`${VERBS.RQ}/${CODES.DATETIME}`]: getSystemTime,
  [`${VERBS.W}/${CODES.DATETIME}`]: setSystemTime,
  [`${VERBS.I}/${CODES.FAN_STATE}`]: putFanState,
  [`${VERBS.RQ}/${CODES.OPENTHERM_MSG}`]: getOpenthermData,
  [`${VERBS.I}/${CODES.ACTUATOR_STATE}`]: putActuatorState,
  [`${VERBS.RP}/${CODES.ACTUATOR_CYCLE}`]: putActuatorCycle,
  [`${VERBS.I}/${CODES.PUZZLE}`]: puzzle,
} as const satisfies Readonly<Record<string, (...args: never[]) => Command>>;
