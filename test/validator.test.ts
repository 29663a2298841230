import { describe, expect, it } from 'vitest';
import { Address } from '../src/address.js';
import { VERBS } from '../src/constants/constants.js';
import { CorruptFrameError, CorruptPayloadError } from '../src/errors.js';
import { loadCodes } from '../src/schema/ramses-schema.js';
import type { FrameMeta, ParseContext, PayloadRecord, Verb } from '../src/types/ramses-types.js';
import { INDEX_KEYS, PayloadValidator, verbKey } from '../src/validator.js';

const CTL = '01:145038';
const RELAY = '13:237335';
const THM = '34:092243';
const HGI = '18:000730';
const HVAC = '30:071715';
const TRV = '04:056053';
const UFC = '02:000921';

function meta(verb: Verb, code: string, src: string, dst: string, payload: string): FrameMeta {
  return { verb, code, src: new Address(src), dst: new Address(dst), len: payload.length / 2 };
}

const echo = (payload: string, ctx: ParseContext): PayloadRecord => ({
  raw: payload,
  has_payload: ctx.hasPayload,
  is_array: ctx.isArray,
});

describe('verbKey', () => {
  it('maps wire verbs to table keys', () => {
    expect(verbKey(VERBS.I)).toBe('I');
    expect(verbKey(VERBS.W)).toBe('W');
    expect(verbKey(VERBS.RQ)).toBe('RQ');
  });
});

describe('PayloadValidator', () => {
  const validator = new PayloadValidator();

  describe('checkSource', () => {
    it('accepts a verb/code the device type sends', () => {
      expect(() => validator.checkSource(meta(VERBS.I, '0008', CTL, RELAY, '00C8'))).not.toThrow();
    });

    it('rejects a code the device type never sends', () => {
      expect(() => validator.checkSource(meta(VERBS.I, '2E04', RELAY, CTL, '00'))).toThrow(CorruptFrameError);
    });

    it('rejects a verb the device type never uses for the code', () => {
      expect(() => validator.checkSource(meta(VERBS.I, '0008', RELAY, CTL, '00C8'))).toThrow(
        'Invalid verb/code for 13:237335 to Tx:  I/0008'
      );
    });

    it('lets a gateway send any known code', () => {
      expect(() => validator.checkSource(meta(VERBS.W, '2309', HGI, CTL, '0107D0'))).not.toThrow();
      expect(() => validator.checkSource(meta(VERBS.RQ, '9999', HGI, CTL, '00'))).toThrow(CorruptFrameError);
    });
  });

  describe('checkDestination', () => {
    it('accepts a request the destination answers', () => {
      expect(() => validator.checkDestination(meta(VERBS.RQ, '2309', THM, CTL, '01'))).not.toThrow();
    });

    it('rejects a request the destination never answers', () => {
      expect(() => validator.checkDestination(meta(VERBS.RQ, '3EF0', RELAY, CTL, '00'))).toThrow(CorruptFrameError);
    });

    it('allows a controller to be asked for its actuator cycle', () => {
      expect(() => validator.checkDestination(meta(VERBS.RQ, '3EF1', RELAY, CTL, '00'))).not.toThrow();
    });

    it('accepts any announcement', () => {
      expect(() => validator.checkDestination(meta(VERBS.I, '0008', CTL, RELAY, '00C8'))).not.toThrow();
    });
  });

  describe('checkPayload', () => {
    it('matches the pattern for the code and verb', () => {
      expect(() => validator.checkPayload(meta(VERBS.I, '0008', CTL, RELAY, '00C8'), '00C8')).not.toThrow();
      expect(() => validator.checkPayload(meta(VERBS.I, '0008', CTL, RELAY, '00C8'), 'A0C8')).toThrow(
        CorruptPayloadError
      );
    });
  });

  describe('hasPayload', () => {
    it('is false for an index alone', () => {
      expect(validator.hasPayload(meta(VERBS.RQ, '2309', THM, CTL, '01'), '01')).toBe(false);
      expect(validator.hasPayload(meta(VERBS.RQ, '2349', THM, CTL, '0100'), '0100')).toBe(false);
      expect(validator.hasPayload(meta(VERBS.RQ, '2349', THM, CTL, '0107'), '0107')).toBe(true);
    });
  });

  describe('detectArray', () => {
    it('takes a run of records from a controller to itself as an array', () => {
      expect(validator.detectArray(meta(VERBS.I, '30C9', CTL, CTL, '0107D0020898'), '0107D0020898')).toBe(true);
      expect(validator.detectArray(meta(VERBS.I, '30C9', CTL, CTL, '0107D0'), '0107D0')).toBe(false);
    });

    it('takes a single record from a UFH controller as an array', () => {
      expect(validator.detectArray(meta(VERBS.I, '3150', UFC, UFC, '0064'), '0064')).toBe(true);
      expect(validator.detectArray(meta(VERBS.I, '3150', UFC, UFC, 'F864'), 'F864')).toBe(false);
    });

    it('rejects a length that is not a whole number of records', () => {
      expect(() => validator.detectArray(meta(VERBS.I, '30C9', CTL, CTL, '0107D00208'), '0107D00208')).toThrow(
        'Invalid array length: 5 (width is 3)'
      );
    });

    it('rejects an array from a device type that never sends one', () => {
      expect(() => validator.detectArray(meta(VERBS.I, '30C9', TRV, TRV, '0107D0020898'), '0107D0020898')).toThrow(
        'Invalid array source: 04:056053'
      );
    });

    it('never takes a request or a reply as an array', () => {
      expect(validator.detectArray(meta(VERBS.RP, '30C9', CTL, HGI, '0107D0020898'), '0107D0020898')).toBe(false);
      expect(validator.detectArray(meta(VERBS.RQ, '1FC9', HGI, CTL, '00'), '00')).toBe(false);
      expect(validator.detectArray(meta(VERBS.W, '1FC9', RELAY, CTL, '003EF0359E37'), '003EF0359E37')).toBe(true);
    });
  });

  describe('extractIndex', () => {
    const index = (verb: Verb, code: string, src: string, payload: string): PayloadRecord =>
      validator.extractIndex(meta(verb, code, src, CTL, payload), payload);

    it('takes a zone index, or a domain in its place', () => {
      expect(index(VERBS.W, '2309', HGI, '0107D0')).toEqual({ zone_idx: '01' });
      expect(index(VERBS.W, '2309', HGI, 'FA07D0')).toEqual({ domain_id: 'FA' });
      expect(index(VERBS.I, '30C9', CTL, 'FC07D0')).toEqual({ domain_id: 'FC' });
    });

    it('rejects a zone index beyond the zones or an unknown domain', () => {
      expect(() => index(VERBS.W, '2309', HGI, '0C07D0')).toThrow("Invalid zone_idx: '0C'");
      expect(() => index(VERBS.W, '2309', HGI, 'FB07D0')).toThrow("Invalid zone_idx: 'FB'");
    });

    it('ignores index 00 from a device that knows nothing of zones', () => {
      expect(index(VERBS.I, '30C9', THM, '0007D0')).toEqual({});
      expect(index(VERBS.I, '30C9', THM, '0107D0')).toEqual({ zone_idx: '01' });
      expect(index(VERBS.I, '30C9', CTL, '0007D0')).toEqual({ zone_idx: '00' });
    });

    it('takes a DHW index of 00 or 01 only', () => {
      expect(index(VERBS.RP, '1260', CTL, '0117D0')).toEqual({ dhw_idx: '01' });
      expect(() => index(VERBS.RP, '1260', CTL, '0217D0')).toThrow("Invalid dhw_idx: '02'");
      expect(() => index(VERBS.RP, '1260', CTL, 'FA17D0')).toThrow("Invalid dhw_idx: 'FA'");
    });

    it('takes UFH, HVAC and other indexes in their ranges', () => {
      expect(index(VERBS.I, '22C9', UFC, '0707D009C401')).toEqual({ ufh_idx: '07' });
      expect(() => index(VERBS.I, '22C9', UFC, '0807D009C401')).toThrow("Invalid ufh_idx: '08'");
      expect(index(VERBS.I, '31D9', HVAC, '210064')).toEqual({ hvac_id: '21' });
      expect(() => index(VERBS.I, '31D9', HVAC, '020064')).toThrow("Invalid hvac_id: '02'");
      expect(() => index(VERBS.I, '0002', '17:145039', '0C02EE01')).toThrow("Unknown other_idx: '0C'");
    });

    it('takes nothing from a code without an index', () => {
      expect(index(VERBS.RP, '1290', CTL, '0002EE')).toEqual({});
      expect(index(VERBS.I, '3150', CTL, 'FC64')).toEqual({});
    });

    it('gives at most one index key', () => {
      const records = [
        index(VERBS.W, '2309', HGI, 'FA07D0'),
        index(VERBS.RP, '1260', CTL, '0017D0'),
        index(VERBS.I, '22C9', UFC, '0107D009C401'),
        index(VERBS.I, '31D9', HVAC, '000064'),
        index(VERBS.I, '0002', '17:145039', '0002EE01'),
        index(VERBS.I, '3EF0', RELAY, '0064FF'),
      ];
      for (const record of records) {
        expect(Object.keys(record).filter(key => INDEX_KEYS.some(name => name === key)).length).toBeLessThanOrEqual(1);
      }
    });
  });

  describe('wrap', () => {
    it('answers a bare request with its index', () => {
      const parser = validator.wrap(echo);
      expect(parser('01', meta(VERBS.RQ, '2309', THM, CTL, '01'))).toEqual({ zone_idx: '01' });
    });

    it('answers a request that cannot carry a payload with its index', () => {
      const parser = validator.wrap(echo);
      expect(parser('0100', meta(VERBS.RQ, '30C9', HVAC, CTL, '0100'))).toEqual({ zone_idx: '01' });
    });

    it('merges the index into the decoded record', () => {
      const parser = validator.wrap(echo);
      expect(parser('0107D0', meta(VERBS.I, '30C9', THM, CTL, '0107D0'))).toEqual({
        zone_idx: '01',
        raw: '0107D0',
        has_payload: true,
        is_array: false,
      });
    });

    it('rejects a zone beyond the configured count', () => {
      const parser = validator.wrap(echo);
      const rq = meta(VERBS.RQ, '30C9', HVAC, CTL, '0C');
      expect(() => parser('0C', rq)).toThrow(CorruptPayloadError);
      expect(parser('0C', rq, { maxZones: 16 })).toEqual({ zone_idx: '0C' });
    });

    it('flags an array announced by a controller', () => {
      const parser = validator.wrap(echo);
      const result = parser('0107D0020898', meta(VERBS.I, '30C9', CTL, CTL, '0107D0020898'));
      expect(result).toEqual({ raw: '0107D0020898', has_payload: true, is_array: true });
    });

    it('rejects a leading zone index on a code that has none', () => {
      const parser = validator.wrap(echo);
      expect(() => parser('01', meta(VERBS.RQ, '10E0', HGI, CTL, '01'))).toThrow(CorruptPayloadError);
      expect(parser('00', meta(VERBS.RQ, '10E0', HGI, CTL, '00'))).toEqual({});
    });

    it('rejects a DHW index on a zone code and a zone index on a DHW code', () => {
      const parser = validator.wrap(echo);
      expect(() => parser('FA', meta(VERBS.RQ, '30C9', HGI, CTL, 'FA'))).toThrow(CorruptPayloadError);
      expect(() => parser('02', meta(VERBS.RQ, '1260', HGI, CTL, '02'))).toThrow(CorruptPayloadError);
    });

    it('rejects an array sent to another device', () => {
      const parser = validator.wrap(echo);
      expect(() => parser('0107D0020898', meta(VERBS.I, '30C9', CTL, RELAY, '0107D0020898'))).toThrow(
        CorruptPayloadError
      );
    });
  });

  describe('with tables of its own', () => {
    const codes = loadCodes({
      '0008': { name: 'relay_demand', index: 'none', verbs: { I: '^00[0-9A-F]{2}$' } },
    });
    const custom = new PayloadValidator({ codes, devices: { '13': { '0008': ['I'] } } });

    it('checks against the given tables', () => {
      const parser = custom.wrap(echo);
      expect(parser('00C8', meta(VERBS.I, '0008', RELAY, RELAY, '00C8'))).toEqual({
        raw: '00C8',
        has_payload: true,
        is_array: false,
      });
      expect(() => parser('00C8', meta(VERBS.I, '0008', CTL, RELAY, '00C8'))).toThrow('Unknown src device type');
    });
  });
});

describe('loadCodes', () => {
  it('rejects a malformed table', () => {
    expect(() => loadCodes({ '0008': { name: 'relay_demand', index: 'sideways', verbs: {} } })).toThrow(TypeError);
  });
});
