/**
 * Quorum Sim - Corruption Sampler Tests
 */

import {
  binomialCorruptedCounts,
  fixedCorruptedCounts,
  binomialSampler,
  fixedSampler,
  createSampler,
} from '../generators/corruption-sampler';
import { SeededRandom } from '../generators/seeded-random';
import { SimulationConfigError } from '../utils/errors';
import { SimulationErrorCode } from '../types/simulation';
import { captureError } from './helpers/capture-error';

describe('Corruption Sampler', () => {
  describe('binomialCorruptedCounts', () => {
    test('yields exactly `iterations` draws', () => {
      const draws = Array.from(binomialCorruptedCounts(110, 250, new SeededRandom(1)));
      expect(draws).toHaveLength(250);
    });

    test('draws stay within the population', () => {
      for (const draw of binomialCorruptedCounts(30, 500, new SeededRandom(2))) {
        expect(draw).toBeGreaterThanOrEqual(0);
        expect(draw).toBeLessThanOrEqual(30);
      }
    });

    test('ratio 0 never corrupts, ratio 1 corrupts everyone', () => {
      expect(Array.from(binomialCorruptedCounts(12, 5, new SeededRandom(3), 0))).toEqual([0, 0, 0, 0, 0]);
      expect(Array.from(binomialCorruptedCounts(12, 3, new SeededRandom(3), 1))).toEqual([12, 12, 12]);
    });

    test('is lazy', () => {
      const rng = new SeededRandom(4);
      const generator = binomialCorruptedCounts(10, 1000000, rng);
      const before = rng.getState();
      generator.next();
      // Draws happen on demand
      expect(rng.getState()).not.toBe(before);
      expect(generator.next().done).toBe(false);
    });
  });

  describe('fixedCorruptedCounts', () => {
    test('yields exactly `iterations` copies of the count', () => {
      expect(Array.from(fixedCorruptedCounts(110, 4, 3))).toEqual([3, 3, 3, 3]);
    });

    test('defaults to zero corrupted', () => {
      expect(Array.from(fixedCorruptedCounts(10, 2))).toEqual([0, 0]);
    });

    test('ignores the population size', () => {
      expect(Array.from(fixedCorruptedCounts(5, 2, 50))).toEqual([50, 50]);
    });
  });

  describe('sampler factories', () => {
    test('binomial and fixed samplers share one contract', () => {
      const rng = new SeededRandom(9);
      const samplers = [binomialSampler(0.5), fixedSampler(2)];

      for (const sampler of samplers) {
        expect(Array.from(sampler(6, 7, rng))).toHaveLength(7);
      }
    });

    test('createSampler builds from configuration', () => {
      const fixed = createSampler({ kind: 'FIXED', corruptedCount: 4 });
      expect(Array.from(fixed(10, 2, new SeededRandom(1)))).toEqual([4, 4]);

      const none = createSampler({ kind: 'BINOMIAL', ratio: 0 });
      expect(Array.from(none(10, 2, new SeededRandom(1)))).toEqual([0, 0]);
    });

    test('rejects a ratio outside [0, 1]', () => {
      expect(() => binomialSampler(1.5)).toThrow(SimulationConfigError);
      expect(() => binomialSampler(-0.1)).toThrow('out of range');
      expect(() => binomialSampler(Number.NaN)).toThrow(SimulationConfigError);
    });

    test('rejects a negative or fractional fixed count', () => {
      const error = captureError(() => fixedSampler(-1));
      expect(error).toBeInstanceOf(SimulationConfigError);
      expect(error).toMatchObject({ code: SimulationErrorCode.INVALID_SAMPLER });
      expect(() => fixedSampler(1.5)).toThrow('non-negative integer');
    });
  });
});
