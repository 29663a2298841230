// src/fault-log.ts

import { Mutex } from 'async-mutex';
import { getSystemLogEntry, type Command } from './command.js';
import { CODES, FAULT_LOG_DEFAULTS, VERBS } from './constants/constants.js';
import { ExpiredCallbackError, FaultLogAbortedError } from './errors.js';
import { codecLogger } from './logger.js';
import type {
  CommandTransport,
  DecodedPayload,
  FaultLogEntry,
  FaultLogOptions,
  PayloadRecord,
  ResponseMessage,
} from './types/ramses-types.js';
import { hexToInt, sleep } from './utils/utils.js';

const logger = codecLogger.createLogger('fault_log');

function isRecord(value: DecodedPayload): value is PayloadRecord {
  return !Array.isArray(value);
}

function text(record: PayloadRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Drops the `_` fields and the index from a decoded log entry.
 */
function toEntry(record: PayloadRecord): FaultLogEntry {
  const entry: FaultLogEntry = {
    timestamp: text(record, 'timestamp') ?? null,
    fault_state: text(record, 'fault_state') ?? '',
    fault_type: text(record, 'fault_type') ?? '',
    device_class: text(record, 'device_class') ?? '',
  };

  const zoneId = text(record, 'zone_id');
  if (zoneId !== undefined) entry.zone_id = zoneId;
  const domainId = text(record, 'domain_id');
  if (domainId !== undefined) entry.domain_id = domainId;
  if ('device_id' in record) entry.device_id = text(record, 'device_id') ?? null;

  return entry;
}

interface FetchState {
  entries: Map<number, FaultLogEntry>;
  /** the next index to request, once the response to the last one is in */
  next: number | null;
  done: boolean;
  sentAt: number;
}

/**
 * The fault log of one controller, read one entry at a time.
 *
 * Each entry is asked for with an RQ/0418; the controller answers with an
 * RP/0418. The log ends at the first empty slot, or at `limit`.
 */
export class FaultLog {
  private readonly mutex = new Mutex();
  private log: Map<number, FaultLogEntry> | null = null;

  constructor(
    readonly ctlId: string,
    private readonly transport: CommandTransport<Command>
  ) {}

  /** The last log fetched, or null if no fetch has completed */
  get faultLog(): ReadonlyMap<number, FaultLogEntry> | null {
    return this.log;
  }

  /**
   * Fetches the log. Fetches on the same controller run one after another.
   * @throws ExpiredCallbackError if the whole log takes longer than `longTimeout`
   * @throws FaultLogAbortedError if the signal is aborted
   */
  async getFaultLog(options: FaultLogOptions = {}): Promise<ReadonlyMap<number, FaultLogEntry>> {
    return this.mutex.runExclusive(() => this.fetch(options));
  }

  private async fetch(options: FaultLogOptions): Promise<Map<number, FaultLogEntry>> {
    const {
      start = FAULT_LOG_DEFAULTS.START,
      limit = FAULT_LOG_DEFAULTS.LIMIT,
      pollInterval = FAULT_LOG_DEFAULTS.POLL_INTERVAL,
      entryTimeout = FAULT_LOG_DEFAULTS.ENTRY_TIMEOUT,
      longTimeout = FAULT_LOG_DEFAULTS.LONG_TIMEOUT,
      signal,
    } = options;

    const context = { code: CODES.SYSTEM_FAULT, dst: this.ctlId };
    logger.debug(`Fetching the fault log from ${start}, up to ${limit}`, context);

    this.log = null;
    const state: FetchState = { entries: new Map(), next: start, done: false, sentAt: 0 };
    const header = [VERBS.RP, this.ctlId, CODES.SYSTEM_FAULT].join('|');

    this.transport.addCallback(header, {
      func: (msg: ResponseMessage | null) => this.onEntry(state, msg, limit),
      daemon: true,
    });

    const startedAt = Date.now();
    try {
      while (!state.done) {
        if (state.next !== null) {
          const cmd = getSystemLogEntry(this.ctlId, state.next);
          logger.debug(`Requesting log entry ${state.next}`, context);
          state.next = null;
          state.sentAt = Date.now();
          await this.transport.sendCommand(cmd);
          continue;
        }

        try {
          await sleep(pollInterval, signal);
        } catch {
          throw new FaultLogAbortedError(`Fault log retrieval from ${this.ctlId} was aborted`);
        }

        if (state.done || state.next !== null) continue;

        const now = Date.now();
        if (now - startedAt > longTimeout) {
          throw new ExpiredCallbackError(`Failed to obtain the fault log from ${this.ctlId} (long)`);
        }
        if (now - state.sentAt > entryTimeout) {
          logger.debug('No response to the last request, the log is taken as complete', context);
          state.done = true;
        }
      }
    } finally {
      this.transport.removeCallback(header);
    }

    logger.debug(`Fetched ${state.entries.size} log entries`, context);
    this.log = state.entries;
    return state.entries;
  }

  private onEntry(state: FetchState, msg: ResponseMessage | null, limit: number): void {
    if (state.done) return;

    if (msg === null || !isRecord(msg.payload)) {
      state.done = true;
      return;
    }

    const { log_idx: rawIdx, ...fields } = msg.payload;
    const logIdx = typeof rawIdx === 'string' ? hexToInt(rawIdx) : 0;

    // an empty slot marks the end of the log
    if (Object.keys(fields).length === 0) {
      state.done = true;
      return;
    }

    state.entries.set(logIdx, toEntry(fields));
    if (logIdx < limit) {
      state.next = logIdx + 1;
    } else {
      state.done = true;
    }
  }
}
