import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Command } from '../src/command.js';
import { NULL_LOG_ENTRY, VERBS } from '../src/constants/constants.js';
import { ExpiredCallbackError, FaultLogAbortedError } from '../src/errors.js';
import { FaultLog } from '../src/fault-log.js';
import { Frame } from '../src/frame.js';
import { parse } from '../src/parsers.js';
import type { CommandTransport, ResponseCallback } from '../src/types/ramses-types.js';

const CTL = '01:145038';

/** A controller that answers each RQ/0418 at once, from a log of `size` entries */
class FakeController implements CommandTransport<Command> {
  readonly callbacks = new Map<string, ResponseCallback>();
  readonly sent: string[] = [];

  constructor(
    private readonly size: number,
    private readonly silent = false
  ) {}

  sendCommand(cmd: Command): void {
    const idx = cmd.payload.slice(4, 6);
    this.sent.push(idx);
    if (this.silent) return;

    // an empty slot carries its own log_idx
    const payload =
      parseInt(idx, 16) < this.size
        ? `0000${idx}B00401010000008694A3CC7FFFFF70000ECC8A`
        : `${NULL_LOG_ENTRY.slice(0, 4)}${idx}${NULL_LOG_ENTRY.slice(6)}`;
    const reply = new Frame({ verb: VERBS.RP, addrs: `${CTL} 18:000730 --:------`, code: '0418', payload });
    const decoded = parse(reply.code, reply.payload, { verb: reply.verb, src: reply.src, dst: reply.dst });

    this.callbacks
      .get(cmd.rxHeader ?? '')
      ?.func(decoded === null ? null : { verb: reply.verb, code: reply.code, src: reply.src, dst: reply.dst, payload: decoded });
  }

  addCallback(header: string, callback: ResponseCallback): void {
    this.callbacks.set(header, callback);
  }

  removeCallback(header: string): boolean {
    return this.callbacks.delete(header);
  }
}

const ENTRY = {
  timestamp: '20-08-13T20:30:24',
  fault_state: 'fault',
  fault_type: 'battery_low',
  device_class: 'sensor',
  zone_id: '01',
  device_id: '03:183434',
};

describe('FaultLog', () => {
  it('reads entries until the first empty slot', async () => {
    const ctl = new FakeController(6);
    const log = new FaultLog(CTL, ctl);

    const entries = await log.getFaultLog();

    expect([...entries.keys()]).toEqual([0, 1, 2, 3, 4, 5]);
    expect(entries.get(0)).toEqual(ENTRY);
    expect(ctl.sent).toEqual(['00', '01', '02', '03', '04', '05', '06']);
    expect(ctl.callbacks.size).toBe(0);
  });

  it('ends at an empty slot in the middle of the log', async () => {
    const ctl = new FakeController(3);
    const entries = await new FaultLog(CTL, ctl).getFaultLog();

    expect([...entries.keys()]).toEqual([0, 1, 2]);
    expect(ctl.sent).toEqual(['00', '01', '02', '03']);
  });

  it('stops at the limit', async () => {
    const ctl = new FakeController(10);
    const entries = await new FaultLog(CTL, ctl).getFaultLog({ limit: 2 });

    expect([...entries.keys()]).toEqual([0, 1, 2]);
    expect(ctl.sent).toEqual(['00', '01', '02']);
  });

  it('starts where asked', async () => {
    const entries = await new FaultLog(CTL, new FakeController(6)).getFaultLog({ start: 4 });
    expect([...entries.keys()]).toEqual([4, 5]);
  });

  it('keeps the last log fetched', async () => {
    const log = new FaultLog(CTL, new FakeController(6));
    expect(log.faultLog).toBeNull();

    await log.getFaultLog();
    expect(log.faultLog?.size).toBe(6);
  });

  it('runs concurrent fetches one after another', async () => {
    const ctl = new FakeController(6);
    const log = new FaultLog(CTL, ctl);

    const [first, second] = await Promise.all([log.getFaultLog(), log.getFaultLog({ start: 3 })]);

    expect(first.size).toBe(6);
    expect(second.size).toBe(3);
    expect(ctl.sent).toEqual(['00', '01', '02', '03', '04', '05', '06', '03', '04', '05', '06']);
  });

  describe('with a silent controller', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('takes the log as complete once an entry times out', async () => {
      const ctl = new FakeController(0, true);
      const pending = new FaultLog(CTL, ctl).getFaultLog({ entryTimeout: 1000 });

      await vi.advanceTimersByTimeAsync(1100);

      await expect(pending).resolves.toEqual(new Map());
      expect(ctl.sent).toEqual(['00']);
      expect(ctl.callbacks.size).toBe(0);
    });

    it('gives up once the whole log times out', async () => {
      const ctl = new FakeController(0, true);
      const pending = new FaultLog(CTL, ctl).getFaultLog({ longTimeout: 500 });
      const assertion = expect(pending).rejects.toBeInstanceOf(ExpiredCallbackError);

      await vi.advanceTimersByTimeAsync(600);

      await assertion;
      expect(ctl.callbacks.size).toBe(0);
    });

    it('stops when aborted', async () => {
      const ctl = new FakeController(0, true);
      const controller = new AbortController();
      const pending = new FaultLog(CTL, ctl).getFaultLog({ signal: controller.signal });
      const assertion = expect(pending).rejects.toBeInstanceOf(FaultLogAbortedError);

      await vi.advanceTimersByTimeAsync(100);
      controller.abort();

      await assertion;
      expect(ctl.callbacks.size).toBe(0);
    });
  });
});
