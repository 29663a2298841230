// src/constants/constants.ts

/**
 * RAMSES-II verbs, as they appear on the wire (always two characters)
 */
export const VERBS = {
  I: ' I',
  RQ: 'RQ',
  RP: 'RP',
  W: ' W',
} as const;

/**
 * Message codes known to the codec
 */
export const CODES = {
  RF_UNKNOWN: '0001',
  WEATHER_SENSOR: '0002',
  ZONE_NAME: '0004',
  SYSTEM_ZONES: '0005',
  SCHEDULE_SYNC: '0006',
  RELAY_DEMAND: '0008',
  RELAY_FAILSAFE: '0009',
  ZONE_PARAMS: '000A',
  ZONE_DEVICES: '000C',
  MESSAGE_000E: '000E',
  RF_CHECK: '0016',
  LANGUAGE: '0100',
  MESSAGE_01D0: '01D0',
  MESSAGE_01E9: '01E9',
  ZONE_SCHEDULE: '0404',
  SYSTEM_FAULT: '0418',
  MESSAGE_042F: '042F',
  MESSAGE_0B04: '0B04',
  MIXVALVE_PARAMS: '1030',
  DEVICE_BATTERY: '1060',
  MESSAGE_1090: '1090',
  DHW_PARAMS: '10A0',
  DEVICE_INFO: '10E0',
  TPI_PARAMS: '1100',
  DHW_TEMP: '1260',
  OUTDOOR_HUMIDITY: '1280',
  OUTDOOR_TEMP: '1290',
  CO2_LEVEL: '1298',
  INDOOR_HUMIDITY: '12A0',
  WINDOW_STATE: '12B0',
  DISPLAYED_TEMP: '12C0',
  AIR_QUALITY: '12C8',
  SYSTEM_SYNC: '1F09',
  DHW_MODE: '1F41',
  RF_BIND: '1FC9',
  OPENTHERM_SYNC: '1FD4',
  SETPOINT_NOW: '2249',
  UFH_SETPOINT: '22C9',
  MESSAGE_22D0: '22D0',
  BOILER_SETPOINT: '22D9',
  SWITCH_SPEED: '22F1',
  SWITCH_DURATION: '22F3',
  SETPOINT: '2309',
  ZONE_MODE: '2349',
  MESSAGE_2D49: '2D49',
  SYSTEM_MODE: '2E04',
  TEMPERATURE: '30C9',
  MESSAGE_3120: '3120',
  DATETIME: '313F',
  HEAT_DEMAND: '3150',
  FAN_STATE: '31D9',
  HVAC_STATE: '31DA',
  MESSAGE_31E0: '31E0',
  OPENTHERM_MSG: '3220',
  ACTUATOR_SYNC: '3B00',
  ACTUATOR_STATE: '3EF0',
  ACTUATOR_CYCLE: '3EF1',
  PUZZLE: '7FFF',
} as const;

/**
 * Sentinel device addresses
 */
export const NON_DEV_ID = '--:------';
export const NUL_DEV_ID = '63:262142';
export const HGI_DEV_ID = '18:000730';

/** Device type of a gateway (HGI80 and compatibles) */
export const HGI_DEVICE_TYPE = '18';

export const DEFAULT_MAX_ZONES = 12;

export const DOMAIN_IDS = ['F9', 'FA', 'FC'] as const;

/** `{verb} {seqn} {addr0} {addr1} {addr2} {code} {len:03d} {payload}` */
export const ADDR_PATTERN = '(--:------|\\d{2}:\\d{6}|63:------)';

export const COMMAND_REGEX = new RegExp(
  `^( I|RQ|RP| W) (---|\\d{3}) ${ADDR_PATTERN} ${ADDR_PATTERN} ${ADDR_PATTERN} ([0-9A-F]{4}) (\\d{3}) ([0-9A-F]{2,96})$`
);

export const ZONE_MODE_MAP = {
  '00': 'follow_schedule',
  '01': 'advanced_override',
  '02': 'permanent_override',
  '03': 'countdown_override',
  '04': 'temporary_override',
} as const;

export type ZoneModeCode = keyof typeof ZONE_MODE_MAP;
export type ZoneModeName = (typeof ZONE_MODE_MAP)[ZoneModeCode];

export const SYSTEM_MODE_MAP = {
  '00': 'auto',
  '01': 'heat_off',
  '02': 'eco_boost',
  '03': 'away',
  '04': 'day_off',
  '05': 'day_off_eco',
  '06': 'auto_with_reset',
  '07': 'custom',
} as const;

export type SystemModeCode = keyof typeof SYSTEM_MODE_MAP;
export type SystemModeName = (typeof SYSTEM_MODE_MAP)[SystemModeCode];

export const FAULT_DEVICE_CLASS = {
  '00': 'controller',
  '01': 'sensor',
  '02': 'setpoint',
  '04': 'actuator',
  '05': 'dhw_sensor',
  '06': 'rf_gateway',
} as const;

export const FAULT_STATE = {
  '00': 'fault',
  '40': 'restore',
  C0: 'unknown_c0',
} as const;

export const FAULT_TYPE = {
  '01': 'system_fault',
  '03': 'mains_low',
  '04': 'battery_low',
  '06': 'comms_fault',
  '0A': 'sensor_error',
} as const;

/** 0418 payload of an empty log slot */
export const NULL_LOG_ENTRY = '000000B0000000000000000000007FFFFF7000000000';

export const ZONE_TYPE = {
  '00': 'zones_all',
  '04': 'zones_sensors',
  '08': 'radiator_valve',
  '09': 'underfloor_heating',
  '0A': 'zone_valve',
  '0B': 'mixing_valve',
  '0C': 'outdoor_sensor',
  '0D': 'hotwater_sensor',
  '0E': 'hotwater_valve',
  '0F': 'heating_control',
  '10': 'rf_gateway',
  '11': 'electric_heat',
} as const;

export const ZONE_DEVICE_TYPE = {
  '00': 'zone_actuators',
  '04': 'zone_sensor',
  '08': 'rad_actuator',
  '09': 'ufh_actuator',
  '0A': 'val_actuator',
  '0B': 'mix_actuator',
  '0C': 'out_sensor',
  '0D': 'dhw_sensor',
  '0E': 'hotwater_valve',
  '0F': 'heating_control',
  '10': 'rf_gateway',
  '11': 'ele_actuator',
} as const;

export const ATTR_DHW_VALVE = 'hotwater_valve';
export const ATTR_DHW_VALVE_HTG = 'heating_valve';
export const ATTR_HTG_CONTROL = 'heating_control';

/**
 * Fan switch (22F1/22F3) vocabulary
 */
export const FAN_SWITCH = {
  FAN_MODE: 'fan_mode',
  HEATER_MODE: 'heater_mode',
  BOOST_TIMER: 'boost_timer',
  FAN_MODES: {
    0: 'standby',
    1: 'auto',
    2: 'low',
    3: 'medium',
    4: 'high',
  },
  HEATER_MODES: {
    9: 'off',
    10: 'auto',
  },
} as const;

export const FAN_INFO: readonly string[] = [
  'off',
  'speed 1',
  'speed 2',
  'speed 3',
  'speed 4',
  'speed 5',
  'speed 6',
  'speed 7',
  'speed 8',
  'speed 9',
  'speed 10',
  'speed 1 temporary override',
  'speed 2 temporary override',
  'speed 3 temporary override',
  'speed 4 temporary override',
  'speed 5 temporary override',
  'speed 6 temporary override',
  'speed 7 temporary override',
  'speed 8 temporary override',
  'speed 9 temporary override',
  'speed 10 temporary override',
  'away',
  'absolute minimum',
  'absolute maximum',
  'auto',
];

/**
 * Codes whose I payload may be a run of fixed-width records
 * (width in bytes, and the device types allowed to send such arrays)
 */
export const ARRAY_CODES: Readonly<Record<string, { width: number; sources: readonly string[] }>> =
  {
    '0005': { width: 4, sources: ['34'] },
    '0009': { width: 3, sources: ['01', '12', '22'] },
    '000A': { width: 6, sources: ['01', '12', '22'] },
    '2309': { width: 3, sources: ['01', '12', '22'] },
    '30C9': { width: 3, sources: ['01', '12', '22'] },
    '2249': { width: 7, sources: ['23'] },
    '22C9': { width: 6, sources: ['02'] },
    '3150': { width: 2, sources: ['02'] },
  };

/** Device types that address zones by their leading payload byte */
export const ZONE_AWARE_TYPES: readonly string[] = ['01', '02', '12', '22', '23'];

/**
 * Allowances in the destination check that the device tables cannot express
 */
export const DST_EXCEPTIONS = {
  BEFORE_CODE: ['01/RQ/3EF1'],
  ANY_DST: ['W/0001'],
  AFTER_CODE: ['13/RQ/3EF0'],
} as const;

/**
 * Command priorities, lower values are sent first
 */
export const PRIORITY = {
  LOWEST: 8,
  LOW: 6,
  DEFAULT: 4,
  HIGH: 2,
  HIGHEST: 0,
} as const;

export const QOS_TX_TIMEOUT = 50; // ms
export const QOS_TX_RETRIES = 2;

export interface QosParams {
  priority: number;
  retries: number;
  timeout: number;
  disableBackoff: boolean;
}

export const QOS_TX_DEFAULT: Readonly<QosParams> = {
  priority: PRIORITY.DEFAULT,
  retries: QOS_TX_RETRIES,
  timeout: QOS_TX_TIMEOUT,
  disableBackoff: false,
};

export const QOS_TABLE: Readonly<Record<string, Partial<QosParams>>> = {
  'RQ/0016': { priority: PRIORITY.HIGH, retries: 5 },
  'RQ/1F09': { priority: PRIORITY.HIGH, retries: 5 },
  ' I/1FC9': { priority: PRIORITY.HIGH, retries: 2, timeout: 1000, disableBackoff: true },
  ' I/0404': { priority: PRIORITY.HIGH, retries: 5, timeout: 300 },
  ' W/0404': { priority: PRIORITY.HIGH, retries: 5, timeout: 300 },
  'RQ/0418': { priority: PRIORITY.LOW, retries: 3 },
  // the OTB has to relay to the boiler, so the round trip is long
  'RQ/3220': { priority: PRIORITY.DEFAULT, retries: 1, timeout: 1000, disableBackoff: true },
};

/**
 * Fault log retrieval defaults
 */
export const FAULT_LOG_DEFAULTS = {
  START: 0x00,
  LIMIT: 0x06,
  POLL_INTERVAL: 50, // ms
  ENTRY_TIMEOUT: 10000, // ms
  LONG_TIMEOUT: 120000, // ms
} as const;
