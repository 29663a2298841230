import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import Logger from '../src/logger.js';
import type { WatchData } from '../src/types/ramses-types.js';

const TIME = '\\[\\d{2}:\\d{2}:\\d{2}\\.\\d{3}\\]';

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger();
    logger.disableColors();
    logger.setRateLimit(0);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes a header from the frame context', () => {
    logger
      .createLogger('codec')
      .info('decoded', { verb: ' I', code: '0008', src: '01:145038', dst: '13:237335' });

    expect(console.info).toHaveBeenCalledWith(
      expect.stringMatching(new RegExp(`^${TIME}\\[INFO\\]\\[codec\\]\\[I\\]\\[0008/relay_demand\\]\\[01:145038->13:237335\\]$`)),
      '',
      'decoded',
      ''
    );
  });

  it('prints context fields that are not in the header', () => {
    logger.addGlobalContext({ code: '3150' });
    logger.info('demand', { zone_idx: '01' });

    expect(console.info).toHaveBeenCalledWith(
      expect.stringMatching(new RegExp(`^${TIME}\\[INFO\\]\\[3150/heat_demand\\]$`)),
      '',
      'demand',
      '{"zone_idx":"01"}',
      ''
    );
  });

  it('indents grouped lines', () => {
    logger.group();
    logger.info('inner');
    logger.groupEnd();
    logger.info('outer');

    expect(vi.mocked(console.info).mock.calls.map(call => call[1])).toEqual(['  ', '']);
  });

  it('filters by level and by category', () => {
    const seen: WatchData[] = [];
    logger.watch(data => seen.push(data));

    const faults = logger.createLogger('fault_log');
    logger.setLevel('warn');
    logger.info('dropped');
    logger.warn('kept');

    faults.setLevel('debug');
    faults.debug('kept');
    faults.pause();
    faults.warn('dropped');
    faults.resume();
    faults.info('dropped');

    expect(seen.map(({ level, args, context }) => [level, args[0], context.logger])).toEqual([
      ['warn', 'kept', undefined],
      ['debug', 'kept', 'fault_log'],
    ]);
    expect(logger.getCounts()).toEqual({ trace: 0, debug: 1, info: 0, warn: 1, error: 0 });
  });

  it('stays quiet when disabled', () => {
    logger.disable();
    logger.warn('dropped');
    expect(logger.isEnabled()).toBe(false);
    expect(console.warn).not.toHaveBeenCalled();

    logger.enable();
    logger.warn('kept');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('rate limits lines below warn', () => {
    logger.setRateLimit(60_000);
    logger.info('first');
    logger.info('second');
    logger.warn('third');

    expect(console.info).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('rejects bad settings', () => {
    expect(() => logger.setRateLimit(-1)).toThrow('Rate limit must be a non-negative number');
    expect(() => logger.createLogger('')).toThrow('Logger name required');
    expect(logger.getLevel()).toBe('info');
  });
});
