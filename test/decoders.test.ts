import { describe, expect, it } from 'vitest';
import {
  decodeBool,
  decodeDate,
  decodeDouble,
  decodeFlags8,
  decodePercent,
  decodeString,
  decodeTemperature,
} from '../src/decoders.js';
import { CorruptPayloadError } from '../src/errors.js';

describe('decodeBool', () => {
  it('decodes the three legal values', () => {
    expect(decodeBool('00')).toBe(false);
    expect(decodeBool('C8')).toBe(true);
    expect(decodeBool('FF')).toBeNull();
  });

  it('rejects anything else', () => {
    expect(() => decodeBool('01')).toThrow(CorruptPayloadError);
    expect(() => decodeBool('C9')).toThrow(CorruptPayloadError);
  });
});

describe('decodePercent', () => {
  it('decodes half-percent steps as a fraction', () => {
    expect(decodePercent('00')).toBe(0);
    expect(decodePercent('64')).toBe(0.5);
    expect(decodePercent('C8')).toBe(1);
  });

  it('returns null for the not-available values', () => {
    expect(decodePercent('EF')).toBeNull();
    expect(decodePercent('FE')).toBeNull();
    expect(decodePercent('FF')).toBeNull();
  });

  it('rejects values above 100%', () => {
    expect(() => decodePercent('C9')).toThrow(CorruptPayloadError);
  });

  it('rejects the wrong width', () => {
    expect(() => decodePercent('064')).toThrow(CorruptPayloadError);
  });
});

describe('decodeTemperature', () => {
  it('decodes hundredths of a degree', () => {
    expect(decodeTemperature('07D0')).toBe(20);
    expect(decodeTemperature('0898')).toBe(22);
  });

  it('decodes negative values', () => {
    expect(decodeTemperature('FF38')).toBe(-2);
  });

  it('returns the sentinels', () => {
    expect(decodeTemperature('7FFF')).toBeNull();
    expect(decodeTemperature('31FF')).toBeNull();
    expect(decodeTemperature('7EFF')).toBe(false);
  });

  it('rejects the wrong width', () => {
    expect(() => decodeTemperature('07D')).toThrow(CorruptPayloadError);
  });
});

describe('decodeDate', () => {
  it('decodes DDMMYYYY', () => {
    expect(decodeDate('0B0B07E5')).toBe('2021-11-11');
  });

  it('ignores the weekday bits of the day', () => {
    expect(decodeDate('2B0B07E5')).toBe('2021-11-11');
  });

  it('returns null for the empty date', () => {
    expect(decodeDate('FFFFFFFF')).toBeNull();
  });
});

describe('decodeString', () => {
  it('keeps the printable characters', () => {
    expect(decodeString('4C6976696E6700000000')).toBe('Living');
  });

  it('returns null when nothing printable remains', () => {
    expect(decodeString('7F7F7F7F')).toBeNull();
  });
});

describe('decodeFlags8', () => {
  it('lists the bits least significant first', () => {
    expect(decodeFlags8('05')).toEqual([1, 0, 1, 0, 0, 0, 0, 0]);
    expect(decodeFlags8('80')).toEqual([0, 0, 0, 0, 0, 0, 0, 1]);
  });
});

describe('decodeDouble', () => {
  it('decodes an unsigned value', () => {
    expect(decodeDouble('01F4')).toBe(500);
  });

  it('scales by a factor', () => {
    expect(decodeDouble('01F4', 10)).toBe(50);
  });

  it('returns null for 7FFF', () => {
    expect(decodeDouble('7FFF')).toBeNull();
  });

  it('rejects values out of range', () => {
    expect(() => decodeDouble('8000')).toThrow(CorruptPayloadError);
  });
});
