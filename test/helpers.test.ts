import { describe, expect, it } from 'vitest';
import {
  bytesToText,
  dtmFromHex,
  dtmToHex,
  dtsFromHex,
  dtsToHex,
  flag8ToHex,
  percentToHex,
  strToHex,
  tempToHex,
} from '../src/utils/helpers.js';
import { chunk, hexToInt, lookup, parity, sleep, toHex } from '../src/utils/utils.js';

describe('hex utils', () => {
  it('parses and formats hex', () => {
    expect(hexToInt('FF')).toBe(255);
    expect(hexToInt('07e5')).toBe(2021);
    expect(toHex(10)).toBe('0A');
    expect(toHex(0x1234, 4)).toBe('1234');
  });

  it('rejects what does not fit', () => {
    expect(() => hexToInt('')).toThrow(TypeError);
    expect(() => hexToInt('XY')).toThrow(TypeError);
    expect(() => toHex(256)).toThrow(RangeError);
    expect(() => toHex(-1)).toThrow(RangeError);
    expect(() => toHex(1.5)).toThrow(RangeError);
  });

  it('cuts payloads into records', () => {
    expect(chunk('AABBCC', 2)).toEqual(['AA', 'BB', 'CC']);
    expect(chunk('00C80101C90102', 6, 2)).toEqual(['C80101', 'C90102']);
  });

  it('computes even parity', () => {
    expect(parity(0x19)).toBe(1);
    expect(parity(0x03)).toBe(0);
    expect(parity(0)).toBe(0);
  });

  it('looks up own keys only', () => {
    const table = { '00': 'auto' };
    expect(lookup(table, '00')).toBe('auto');
    expect(lookup(table, 'toString')).toBeUndefined();
  });
});

describe('sleep', () => {
  it('rejects at once if the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    await expect(sleep(1000, controller.signal)).rejects.toThrow('stop');
  });
});

describe('date/time', () => {
  it('encodes a local date/time without seconds', () => {
    expect(dtmToHex(new Date(2021, 10, 5, 18, 30))).toBe('1E12050B07E5');
    expect(dtmToHex(null)).toBe('FFFFFFFFFFFF');
  });

  it('decodes six and seven byte date/times', () => {
    expect(dtmFromHex('1E12050B07E5')).toBe('2021-11-05T18:30:00');
    expect(dtmFromHex('2D1E12050B07E5')).toBe('2021-11-05T18:30:45');
    expect(dtmFromHex('FFFFFFFFFFFF')).toBeNull();
  });

  it('rejects impossible dates', () => {
    expect(() => dtmFromHex('1E12050D07E5')).toThrow(RangeError);
  });

  it('packs fault log timestamps', () => {
    expect(dtsToHex(new Date(2020, 7, 13, 20, 30, 24))).toBe('008694A3CC7F');
    expect(dtsFromHex('008694A3CC7F')).toBe('20-08-13T20:30:24');
    expect(dtsFromHex('00000000007F')).toBeNull();
  });
});

describe('value encoders', () => {
  it('encodes temperatures', () => {
    expect(tempToHex(20)).toBe('07D0');
    expect(tempToHex(-2)).toBe('FF38');
    expect(tempToHex(null)).toBe('7FFF');
    expect(tempToHex(false)).toBe('7EFF');
  });

  it('rejects temperatures that encode as a sentinel', () => {
    expect(() => tempToHex(127.99)).toThrow(RangeError);
    expect(() => tempToHex(325.11)).toThrow(RangeError);
    expect(() => tempToHex(327.67)).toThrow(RangeError);
    expect(tempToHex(127.98)).toBe('31FE');
  });

  it('encodes percentages', () => {
    expect(percentToHex(0.5)).toBe('64');
    expect(percentToHex(null)).toBe('FF');
    expect(() => percentToHex(1.5)).toThrow(RangeError);
  });

  it('encodes strings and flags', () => {
    expect(strToHex('AB')).toBe('4142');
    expect(flag8ToHex([1, 0, 0, 0, 0, 0, 0, 0], true)).toBe('01');
    expect(flag8ToHex([1, 0, 0, 0, 0, 0, 0, 0])).toBe('80');
    expect(() => flag8ToHex([1, 0])).toThrow(RangeError);
  });

  it('reads null-terminated text', () => {
    expect(bytesToText('4869004142')).toBe('Hi');
  });
});
