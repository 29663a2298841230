import { isErr, isOk, unwrapErr, unwrapOk } from 'option-t/plain_result';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Address } from '../src/address.js';
import { CODES, VERBS } from '../src/constants/constants.js';
import {
  CodingError,
  CorruptFrameError,
  CorruptPayloadError,
  NotImplementedCodeError,
} from '../src/errors.js';
import { Frame } from '../src/frame.js';
import { codecLogger } from '../src/logger.js';
import { parseBoilerSetpoint } from '../src/message-codes/heating.js';
import { buildPuzzlePayload } from '../src/message-codes/misc.js';
import { PAYLOAD_PARSERS, decodePayload, parse, parsePayload } from '../src/parsers.js';
import type { DecodedPayload, ParseContext, WatchData } from '../src/types/ramses-types.js';
import { DEFAULT_CONFIG } from '../src/validator.js';

const CTL = new Address('01:145038');
const RELAY = new Address('13:237335');

describe('parsePayload', () => {
  it('decodes a relay demand announced to a relay', () => {
    const frame = Frame.fromString(' I --- 01:145038 13:237335 --:------ 0008 002 00C8');
    const result = parsePayload(frame);

    expect(isOk(result)).toBe(true);
    expect(unwrapOk(result)).toEqual({ relay_demand: 1 });
  });

  it('decodes an array of setpoints from a controller', () => {
    const frame = Frame.fromString(' I --- 01:145038 --:------ 01:145038 2309 009 0107D0020898030834');
    expect(unwrapOk(parsePayload(frame))).toEqual([
      { zone_idx: '01', setpoint: 20 },
      { zone_idx: '02', setpoint: 22 },
      { zone_idx: '03', setpoint: 21 },
    ]);
  });

  it('decodes a DHW mode with its index', () => {
    const frame = Frame.fromString('RP --- 01:145038 18:000730 --:------ 1F41 006 000100FFFFFF');
    expect(unwrapOk(parsePayload(frame))).toEqual({ dhw_idx: '00', active: true, mode: 'follow_schedule' });
  });

  it('decodes a controller time', () => {
    const frame = Frame.fromString('RP --- 01:145038 18:000730 --:------ 313F 009 00FC001E12050B07E5');
    expect(unwrapOk(parsePayload(frame))).toEqual({
      datetime: '2021-11-05T18:30:00',
      is_dst: null,
      _unknown_0: 'FC',
    });
  });

  it('returns a code without a parser as an error', () => {
    const frame = Frame.fromString(' I --- 01:145038 --:------ 01:145038 1280 002 0050');
    const result = parsePayload(frame);

    expect(isErr(result)).toBe(true);
    expect(unwrapErr(result)).toBeInstanceOf(NotImplementedCodeError);
  });

  it('returns a source that may not send the code as an error', () => {
    const frame = Frame.fromString(' I --- 13:237335 --:------ 13:237335 0008 002 00C8');
    expect(unwrapErr(parsePayload(frame))).toBeInstanceOf(CorruptFrameError);
  });

  it('wraps a fault no check explains as a coding error', () => {
    // month 13
    const frame = Frame.fromString('RP --- 01:145038 18:000730 --:------ 313F 009 00FC001E120D0D07E5');
    const fault = unwrapErr(parsePayload(frame));

    expect(fault).toBeInstanceOf(CodingError);
    expect(fault.cause).toBeInstanceOf(RangeError);
  });
});

describe('decodePayload', () => {
  it('throws on a length that disagrees with the payload', () => {
    const meta = { verb: VERBS.I, code: CODES.RELAY_DEMAND, src: CTL, dst: RELAY, len: 3 };
    expect(() => decodePayload(meta, '00C8')).toThrow(CorruptPayloadError);
  });

  it('throws on an unknown code', () => {
    const meta = { verb: VERBS.I, code: '1234', src: CTL, dst: RELAY, len: 1 };
    expect(() => decodePayload(meta, '00')).toThrow(NotImplementedCodeError);
  });

  it('has a parser for every known code but 1280', () => {
    const missing = Object.values(CODES).filter(code => PAYLOAD_PARSERS[code] === undefined);
    expect(missing).toEqual([CODES.OUTDOOR_HUMIDITY]);
  });
});

describe('parse', () => {
  const seen: WatchData[] = [];

  beforeEach(() => {
    seen.length = 0;
    codecLogger.watch(data => seen.push(data));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    codecLogger.clearWatch();
    vi.restoreAllMocks();
  });

  it('returns the decoded payload', () => {
    expect(parse('0008', '00C8', { verb: VERBS.I, src: CTL, dst: RELAY })).toEqual({ relay_demand: 1 });
    expect(seen).toEqual([]);
  });

  it('returns null for an unknown code and logs a warning', () => {
    expect(parse('1234', '00', { verb: VERBS.I, src: CTL, dst: RELAY })).toBeNull();

    expect(seen).toHaveLength(1);
    expect(seen[0]?.level).toBe('warn');
    expect(seen[0]?.context).toEqual({
      verb: ' I',
      code: '1234',
      src: '01:145038',
      dst: '13:237335',
      logger: 'parsers',
    });
    expect(seen[0]?.args[0]).toBeInstanceOf(NotImplementedCodeError);
  });

  it('logs a coding error at error level', () => {
    const meta = { verb: VERBS.RP, src: CTL, dst: new Address('18:000730') };
    expect(parse('313F', '00FC001E120D0D07E5', meta)).toBeNull();

    expect(seen.map(data => data.level)).toEqual(['error']);
    expect(seen[0]?.args[0]).toBeInstanceOf(CodingError);
  });

  it('decodes a puzzle packet without checking its source', () => {
    const payload = buildPuzzlePayload('00', { message: 'hi', dtm: new Date(2020, 7, 13, 20, 30, 24) });
    const meta = { verb: VERBS.I, src: new Address('18:000730'), dst: new Address('63:262142') };

    expect(payload).toBe('0000008694A3CC7F7F68697F');
    expect(parse('7FFF', payload, meta)).toEqual({ datetime: '20-08-13T20:30:24', message: 'hi' });
  });
});

/** One flag per zone, for the default of twelve zones */
const mask = (...zones: number[]): number[] => Array.from({ length: 12 }, (_, idx) => (zones.includes(idx) ? 1 : 0));

const decoded = (line: string, dtm?: Date): DecodedPayload => unwrapOk(parsePayload(Frame.fromString(line, dtm)));

const rejected = (line: string): unknown => unwrapErr(parsePayload(Frame.fromString(line)));

describe('payload parsers', () => {
  it('0005 decodes the zones of one type', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 0005 004 00080300')).toEqual({
      zone_mask: mask(0, 1),
      zone_type: 'radiator_valve',
    });
  });

  it('0005 decodes the three records a wireless thermostat sends', () => {
    expect(decoded(' I --- 34:092243 --:------ 34:092243 0005 012 00080300000D0000000A0100')).toEqual([
      { zone_mask: mask(0, 1), zone_type: 'radiator_valve' },
      { zone_mask: mask(), zone_type: 'hotwater_sensor' },
      { zone_mask: mask(0), zone_type: 'zone_valve' },
    ]);
    expect(rejected(' I --- 34:092243 --:------ 34:092243 0005 008 0008030000080300')).toBeInstanceOf(
      CorruptPayloadError
    );
  });

  it('0009 decodes failsafe flags per zone and domain', () => {
    expect(decoded(' I --- 01:145038 --:------ 01:145038 0009 006 0001FFF90000')).toEqual([
      { zone_idx: '00', failsafe_enabled: true },
      { domain_id: 'F9', failsafe_enabled: false },
    ]);
    expect(rejected(' I --- 01:145038 --:------ 01:145038 0009 004 0001FF00')).toBeInstanceOf(CorruptPayloadError);
  });

  it('000C lists the devices of a zone, skipping unbound slots', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 000C 012 01040089685301047F896854')).toEqual({
      zone_idx: '01',
      device_class: 'zone_sensor',
      devices: ['34:092243'],
    });
    expect(rejected('RP --- 01:145038 18:000730 --:------ 000C 009 010400896853010400')).toBeInstanceOf(
      CorruptPayloadError
    );
  });

  it('0016 decodes the signal strength', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 0016 002 0113')).toEqual({
      zone_idx: '01',
      rf_strength: 4,
      rf_value: 19,
    });
    expect(rejected('RP --- 01:145038 18:000730 --:------ 0016 003 011300')).toBeInstanceOf(CorruptPayloadError);
  });

  it('0100 decodes the language', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 0100 005 00656EFFFF')).toEqual({
      language: 'en',
      _unknown_0: 'FFFF',
    });
    expect(rejected('RP --- 01:145038 18:000730 --:------ 0100 003 00656E')).toBeInstanceOf(CorruptPayloadError);
  });

  it('1030 decodes the mix valve parameters', () => {
    expect(decoded(' I --- 01:145038 --:------ 01:145038 1030 016 01C80137C9010FCA0196CB010FCC0101')).toEqual({
      zone_idx: '01',
      max_flow_setpoint: 55,
      min_flow_setpoint: 15,
      valve_run_time: 150,
      pump_run_time: 15,
      _unknown_0: 1,
    });
    expect(rejected(' I --- 01:145038 --:------ 01:145038 1030 013 01C80137C9010FCA0196CB010F')).toBeInstanceOf(
      CorruptPayloadError
    );
  });

  it('1060 decodes the battery state', () => {
    expect(decoded(' I --- 04:056053 --:------ 04:056053 1060 003 00FF01')).toEqual({
      battery_low: false,
      battery_level: null,
    });
    expect(decoded(' I --- 04:056053 --:------ 04:056053 1060 003 006400')).toEqual({
      battery_low: true,
      battery_level: 0.5,
    });
    expect(rejected(' I --- 04:056053 --:------ 04:056053 1060 004 00640100')).toBeInstanceOf(CorruptPayloadError);
  });

  it('10E0 decodes the device description and dates', () => {
    const payload = '000001001B221201FEFFFFFFFFFF0F0707E2543837524600FF';
    expect(decoded(` I --- 04:056053 --:------ 04:056053 10E0 025 ${payload}`)).toEqual({
      unknown: '0001001B221201FEFF',
      date_2: '0000-00-00',
      date_1: '2018-07-15',
      description: 'T87RF',
      _unknown_2: 'FF',
    });
    expect(rejected(` I --- 04:056053 --:------ 04:056053 10E0 017 00${'0'.repeat(32)}`)).toBeInstanceOf(
      CorruptPayloadError
    );
  });

  it('1260 decodes the DHW temperature', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 1260 003 0015E0')).toEqual({ dhw_idx: '00', temperature: 56 });
    expect(rejected('RP --- 01:145038 18:000730 --:------ 1260 004 0015E000')).toBeInstanceOf(CorruptPayloadError);
  });

  it('1290 decodes a temperature below zero', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 1290 003 00FF38')).toEqual({ temperature: -2 });
    expect(rejected('RP --- 01:145038 18:000730 --:------ 1290 004 00FF3800')).toBeInstanceOf(CorruptPayloadError);
  });

  it('12A0 decodes humidity with and without temperatures', () => {
    const header = ' I --- 32:168090 --:------ 32:168090 12A0';
    expect(decoded(`${header} 006 0037084A0623`)).toEqual({
      relative_humidity: 0.55,
      temperature: 21.22,
      dewpoint_temp: 15.71,
    });
    expect(decoded(`${header} 002 00EF`)).toEqual({ relative_humidity: null });
    expect(rejected(`${header} 004 0037084A`)).toBeInstanceOf(CorruptPayloadError);
  });

  it('12B0 decodes the window state', () => {
    expect(decoded(' I --- 04:056053 --:------ 04:056053 12B0 003 01C800')).toEqual({
      zone_idx: '01',
      window_open: true,
    });
    expect(decoded('RP --- 01:145038 18:000730 --:------ 12B0 003 01FFFF')).toEqual({
      zone_idx: '01',
      window_open: null,
    });
    expect(rejected(' I --- 04:056053 --:------ 04:056053 12B0 004 01C80000')).toBeInstanceOf(CorruptPayloadError);
  });

  it('2249 times the next setpoint from when the frame arrived', () => {
    const header = ' I --- 23:100224 --:------ 23:100224 2249';
    const dtm = new Date(2021, 10, 5, 18, 30);

    expect(decoded(`${header} 007 0008340640001E`, dtm)).toEqual({
      zone_idx: '00',
      setpoint_now: 21,
      setpoint_next: 16,
      minutes_remaining: 30,
      _next_setpoint: '19:00:00',
    });
    expect(decoded(`${header} 014 0008340640001E01076C0708003C`, dtm)).toEqual([
      { zone_idx: '00', setpoint_now: 21, setpoint_next: 16, minutes_remaining: 30, _next_setpoint: '19:00:00' },
      { zone_idx: '01', setpoint_now: 19, setpoint_next: 18, minutes_remaining: 60, _next_setpoint: '19:30:00' },
    ]);
    expect(rejected(`${header} 008 0008340640001E00`)).toBeInstanceOf(CorruptPayloadError);
  });

  it('22C9 decodes the setpoints of a UFH controller', () => {
    expect(decoded(' I --- 02:000921 --:------ 02:000921 22C9 012 0001F40BB8010101F40A2802')).toEqual([
      { ufh_idx: '00', temp_low: 5, temp_high: 30, _unknown_0: '01' },
      { ufh_idx: '01', temp_low: 5, temp_high: 26, _unknown_0: '02' },
    ]);
    expect(rejected(' I --- 02:000921 --:------ 02:000921 22C9 006 0001F40BB803')).toBeInstanceOf(
      CorruptPayloadError
    );
  });

  it('22D9 decodes the boiler setpoint', () => {
    expect(decoded('RP --- 10:048122 01:145038 --:------ 22D9 003 000C80')).toEqual({ boiler_setpoint: 32 });
  });

  it('22D9 checks its own length', () => {
    const ctx: ParseContext = {
      verb: VERBS.RP,
      code: '22D9',
      src: new Address('10:048122'),
      dst: CTL,
      len: 4,
      payload: '000C8000',
      dtm: new Date(),
      hasPayload: true,
      isArray: false,
      config: DEFAULT_CONFIG,
    };
    expect(() => parseBoilerSetpoint('000C8000', ctx)).toThrow('Invalid length: 4 (expecting 3)');
  });

  it('30C9 decodes an array of zone temperatures', () => {
    expect(decoded(' I --- 01:145038 --:------ 01:145038 30C9 009 0007D001076C027FFF')).toEqual([
      { zone_idx: '00', temperature: 20 },
      { zone_idx: '01', temperature: 19 },
      { zone_idx: '02', temperature: null },
    ]);
    expect(rejected('RP --- 01:145038 18:000730 --:------ 30C9 004 0007D000')).toBeInstanceOf(CorruptPayloadError);
  });

  it('3150 decodes heat demand per UFH circuit and per domain', () => {
    expect(decoded(' I --- 02:000921 --:------ 02:000921 3150 006 00C80164FC00')).toEqual([
      { ufh_idx: '00', heat_demand: 1 },
      { ufh_idx: '01', heat_demand: 0.5 },
      { domain_id: 'FC', heat_demand: 0 },
    ]);
    expect(decoded(' I --- 01:145038 --:------ 01:145038 3150 002 FC64')).toEqual({
      domain_id: 'FC',
      heat_demand: 0.5,
    });
    expect(rejected(' I --- 01:145038 --:------ 01:145038 3150 004 00C80164')).toBeInstanceOf(CorruptPayloadError);
  });

  it('31DA decodes the state of a ventilation unit', () => {
    const header = ' I --- 32:168090 --:------ 32:168090 31DA';
    const payload = '00EF0001F437EF7FFF7FFF7FFF7FFFF000EF0264EF000000EF7FFF7FFF';

    expect(decoded(`${header} 029 ${payload}`)).toEqual({
      hvac_id: '00',
      air_quality: null,
      air_quality_base: 0,
      co2_level: 500,
      indoor_humidity: 0.55,
      outdoor_humidity: null,
      exhaust_temperature: null,
      supply_temperature: null,
      indoor_temperature: null,
      outdoor_temperature: null,
      speed_cap: 61440,
      bypass_pos: null,
      fan_info: 'speed 2',
      exhaust_fan_speed: 0.5,
      supply_fan_speed: null,
      remaining_time: 0,
      post_heat: 0,
      pre_heat: null,
      supply_flow: null,
      exhaust_flow: null,
    });
    expect(rejected(`${header} 028 ${payload.slice(0, 56)}`)).toBeInstanceOf(CorruptPayloadError);
  });

  it('3B00 decodes a sync from a relay and from a controller', () => {
    expect(decoded(' I --- 13:237335 --:------ 13:237335 3B00 002 00C8')).toEqual({ actuator_sync: true });
    expect(decoded(' I --- 01:145038 --:------ 01:145038 3B00 002 FCC8')).toEqual({
      domain_id: 'FC',
      actuator_sync: true,
    });
    expect(rejected(' I --- 13:237335 --:------ 13:237335 3B00 002 FCC8')).toBeInstanceOf(CorruptPayloadError);
    expect(rejected(' I --- 13:237335 --:------ 13:237335 3B00 003 00C800')).toBeInstanceOf(CorruptPayloadError);
  });

  it('3EF0 decodes the state of a relay', () => {
    const header = ' I --- 13:237335 --:------ 13:237335 3EF0';
    expect(decoded(`${header} 003 0064FF`)).toEqual({
      actuator_enabled: true,
      modulation_level: 0.5,
      _unknown_2: [1, 1, 1, 1, 1, 1, 1, 1],
    });
    expect(decoded(`${header} 003 007FFF`)).toEqual({ actuator_enabled: null, modulation_level: null });
    expect(rejected(`${header} 003 00C9FF`)).toBeInstanceOf(CorruptPayloadError);
    expect(rejected(`${header} 004 0064FF00`)).toBeInstanceOf(CorruptPayloadError);
  });

  it('3EF0 decodes the flags an OpenTherm bridge adds', () => {
    expect(decoded('RP --- 10:048122 01:145038 --:------ 3EF0 006 0000100A00FF')).toEqual({
      actuator_enabled: false,
      modulation_level: 0,
      _unknown_2: [0, 0, 0, 0, 1, 0, 0, 0],
      _unknown_3: [0, 1, 0, 1, 0, 0, 0, 0],
      ch_enabled: true,
      dhw_active: false,
      flame_active: true,
      _unknown_4: '00',
      _unknown_5: 'FF',
    });
  });

  it('0418 decodes an empty slot at any index as an empty record', () => {
    expect(decoded('RP --- 01:145038 18:000730 --:------ 0418 022 000005B0000000000000000000007FFFFF7000000000')).toEqual(
      {}
    );
  });
});
