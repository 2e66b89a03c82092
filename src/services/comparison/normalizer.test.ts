// Normalizer tests

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { normalize, normalizeTree } from './normalizer.js';
import { configEquals } from './equality.js';
import { ValidationError } from '../../core/errors.js';
import {
  boolValue,
  mapValue,
  nullValue,
  numberValue,
  stringValue,
  toPlain
} from '../../models/config-value.js';

/**
 * Arbitrary JSON-like source values, the shape both producers hand over
 */
const sourceValueArb = fc.letrec(tie => ({
  value: fc.oneof(
    { depthSize: 'small' },
    fc.constant(null),
    fc.boolean(),
    fc.double({ noNaN: true }),
    fc.integer(),
    fc.string(),
    fc.array(tie('value'), { maxLength: 4 }),
    fc.dictionary(fc.string({ maxLength: 6 }), tie('value'), { maxKeys: 4 })
  )
})).value;

describe('normalize', () => {
  describe('scalars - unit tests', () => {
    it('should map null and undefined to null', () => {
      expect(normalize(null)).toEqual(nullValue());
      expect(normalize(undefined)).toEqual(nullValue());
    });

    it('should keep booleans and strings', () => {
      expect(normalize(true)).toEqual(boolValue(true));
      expect(normalize('t2.micro')).toEqual(stringValue('t2.micro'));
    });

    it('should widen integers and bigints to numbers', () => {
      expect(normalize(8)).toEqual(numberValue(8));
      expect(normalize(8n)).toEqual(numberValue(8));
    });

    it('should render dates as ISO strings', () => {
      const launched = new Date('2024-03-01T10:00:00.000Z');
      expect(normalize(launched)).toEqual(stringValue('2024-03-01T10:00:00.000Z'));
    });

    it('should reject NaN', () => {
      expect(() => normalize(Number.NaN)).toThrow(ValidationError);
    });

    it('should reject functions and symbols with the offending path', () => {
      expect(() => normalize({ tags: { Name: () => 'x' } })).toThrow('Unsupported function value at $.tags.Name');
      expect(() => normalize([Symbol('s')])).toThrow('Unsupported symbol value at $[0]');
    });

    it('should reject class instances', () => {
      class VolumeHandle {
        id = 'vol-1';
      }
      expect(() => normalize(new VolumeHandle())).toThrow('Unsupported VolumeHandle instance at $');
    });
  });

  describe('collections - unit tests', () => {
    it('should convert string-keyed records to maps', () => {
      const value = normalize({ Name: 'web', Env: 'dev' });
      expect(value).toEqual(mapValue({ Name: stringValue('web'), Env: stringValue('dev') }));
    });

    it('should convert JS Maps and Sets', () => {
      const value = normalize(new Map([['sg', new Set(['sg-1', 'sg-2'])]]));
      expect(toPlain(value)).toEqual({ sg: ['sg-1', 'sg-2'] });
    });

    it('should omit undefined members', () => {
      const value = normalize({ iops: undefined, volume_size: 8 });
      expect(toPlain(value)).toEqual({ volume_size: 8 });
    });

    it('should reject non-string Map keys', () => {
      expect(() => normalize(new Map([[1, 'x']]))).toThrow(ValidationError);
    });

    it('should treat an object with a kind key as a map', () => {
      const value = normalize({ kind: 'null', Name: 'x' });

      expect(value).toEqual(mapValue({ kind: stringValue('null'), Name: stringValue('x') }));
    });

    it('should normalize the members of a list-shaped object', () => {
      expect(toPlain(normalize({ kind: 'list', items: [1] }))).toEqual({ items: [1], kind: 'list' });
    });
  });

  describe('normalizeTree - unit tests', () => {
    it('should accept a map root', () => {
      expect(normalizeTree({ ami: 'ami-1' }).entries.get('ami')).toEqual(stringValue('ami-1'));
    });

    it('should reject a non-map root', () => {
      expect(() => normalizeTree(['ami-1'])).toThrow('Expected a map at the root, got list');
    });
  });

  describe('numeric widening policy', () => {
    it('should treat 8 and 8.0 as equal', () => {
      expect(configEquals(normalize(8), normalize(8.0))).toBe(true);
    });

    it('should not treat 8 and "8" as equal', () => {
      expect(configEquals(normalize(8), normalize('8'))).toBe(false);
    });

    it('should not treat true and "true" as equal', () => {
      expect(configEquals(normalize(true), normalize('true'))).toBe(false);
    });
  });

  describe('property tests', () => {
    it('should be reflexive for objects shaped like normalized values', () => {
      for (const input of [
        { kind: 'list', items: [1] },
        { kind: 'string', value: 'prod', Name: 'web' },
        { tags: { Name: 'web', kind: 'null' } }
      ]) {
        expect(configEquals(normalize(input), normalize(input))).toBe(true);
      }
    });

    it('should be reflexive after self-normalization', () => {
      fc.assert(
        fc.property(sourceValueArb, (input) => {
          expect(configEquals(normalize(input), normalize(input))).toBe(true);
        }),
        { numRuns: 200 }
      );
    });

    it('should be idempotent', () => {
      fc.assert(
        fc.property(sourceValueArb, (input) => {
          const once = normalize(input);
          expect(normalize(toPlain(once))).toEqual(once);
        }),
        { numRuns: 100 }
      );
    });
  });
});
