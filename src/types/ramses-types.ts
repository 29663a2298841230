// src/types/ramses-types.ts

import type { VERBS } from '../constants/constants.js';
import type { Address } from '../address.js';

// !=============================================================================
// ! Wire vocabulary
// !=============================================================================

/** A verb as it is written on the wire: ' I', 'RQ', 'RP' or ' W' */
export type Verb = (typeof VERBS)[keyof typeof VERBS];

/** A verb as it is written in the code tables: 'I', 'RQ', 'RP' or 'W' */
export type VerbKey = keyof typeof VERBS;

/** How the identity (zone, domain, ...) of a payload is found */
export type IndexKind = 'zone' | 'dhw' | 'ufh' | 'hvac' | 'other' | 'complex' | 'none';

export interface CodeSchema {
  name: string;
  index: IndexKind;
  rqMayHavePayload: boolean;
  verbs: Partial<Record<VerbKey, RegExp>>;
}

/** code -> verbs that a device type may send */
export type DeviceSchema = Record<string, VerbKey[]>;

// !=============================================================================
// ! Decoded values
// !=============================================================================

/**
 * A decoded temperature: degrees C, `false` where the device reports the
 * feature as disabled (7EFF), `null` where no value is available.
 */
export type Temperature = number | false | null;

export type FieldValue = string | number | boolean | null | FieldValue[] | PayloadRecord;

export interface PayloadRecord {
  [key: string]: FieldValue;
}

/** What a payload decodes to: one record, or a list for array payloads */
export type DecodedPayload = PayloadRecord | FieldValue[];

// !=============================================================================
// ! Parse context
// !=============================================================================

export interface CodecConfig {
  /** Zone indexes at or above this value are rejected */
  maxZones: number;
}

/** The parts of a frame a payload parser may look at */
export interface FrameMeta {
  verb: Verb;
  code: string;
  src: Address;
  dst: Address;
  /** Declared payload length, in bytes */
  len: number;
  /** When the frame was received */
  dtm?: Date;
}

export interface ParseContext extends FrameMeta {
  payload: string;
  dtm: Date;
  hasPayload: boolean;
  isArray: boolean;
  config: CodecConfig;
}

export type PayloadParser = (payload: string, ctx: ParseContext) => DecodedPayload;

// !=============================================================================
// ! OpenTherm
// !=============================================================================

export type OpenThermMsgType =
  | 'Read-Data'
  | 'Write-Data'
  | 'Invalid-Data'
  | '-reserved-'
  | 'Read-Ack'
  | 'Write-Ack'
  | 'Data-Invalid'
  | 'Unknown-DataId';

export type OpenThermValueType = 'flag8' | 'u8' | 's8' | 'f8.8' | 'u16' | 's16';

export interface OpenThermSchema {
  name?: string;
  en?: string;
  type?: OpenThermValueType;
  hb?: OpenThermValueType;
  lb?: OpenThermValueType;
}

export interface OpenThermFrame {
  msgType: OpenThermMsgType;
  msgId: number;
  value: PayloadRecord;
  schema: OpenThermSchema;
}

// !=============================================================================
// ! Commands
// !=============================================================================

export interface CommandOptions {
  /** Source of the command, defaults to the gateway address */
  fromId?: string;
  priority?: number;
  retries?: number;
  /** ms */
  timeout?: number;
  disableBackoff?: boolean;
}

/** A zone index as accepted by the builders: 0-15, 0xFA, a hex string or 'HW' */
export type ZoneIdx = number | string;

// !=============================================================================
// ! Fault log
// !=============================================================================

export interface FaultLogEntry {
  timestamp: string | null;
  fault_state: string;
  fault_type: string;
  device_class: string;
  zone_id?: string;
  domain_id?: string;
  device_id?: string | null;
}

export interface FaultLogOptions {
  start?: number;
  limit?: number;
  /** ms between checks for completion */
  pollInterval?: number;
  /** ms to wait for any one entry */
  entryTimeout?: number;
  /** ms to wait for the whole log */
  longTimeout?: number;
  signal?: AbortSignal;
}

/** A decoded frame as delivered to a response callback */
export interface ResponseMessage {
  verb: Verb;
  code: string;
  src: Address;
  dst: Address;
  payload: DecodedPayload;
}

export interface ResponseCallback {
  func: (msg: ResponseMessage | null) => void;
  /** If set, the callback stays registered after the first response */
  daemon: boolean;
}

/**
 * What the fault log needs from the transport: a way to send a command and a
 * table of response callbacks keyed by a response header.
 */
export interface CommandTransport<TCommand> {
  sendCommand(cmd: TCommand): void | Promise<void>;
  addCallback(header: string, callback: ResponseCallback): void;
  removeCallback(header: string): boolean;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  verb?: string;
  code?: string;
  src?: string;
  dst?: string;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface WatchData {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  group(): void;
  groupEnd(): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}
