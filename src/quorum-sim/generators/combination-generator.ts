/**
 * Quorum Sim - Combination Generator
 *
 * Turns a corrupted count into a concrete assignment of which
 * validators are corrupted.
 */

import { CorruptionFlag, isNonNegativeInteger } from '../types/common';
import { CorruptionSampler, SimulationErrorCode } from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';
import { SeededRandom } from './seeded-random';

/**
 * Create a random corrupted combination.
 *
 * With 5 validators and 2 corrupted, possible outputs include
 * [0, 1, 0, 0, 1] and [1, 0, 0, 1, 0]. A count at or above the
 * population size yields the all-corrupted assignment.
 */
export function createCorruptedCombination(
  validatorCount: number,
  corruptedCount: number,
  rng: SeededRandom
): CorruptionFlag[] {
  if (!isNonNegativeInteger(corruptedCount)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_SAMPLER,
      message: `Corrupted count must be a non-negative integer, got ${corruptedCount}`,
      details: { corruptedCount, validatorCount },
    });
  }
  if (corruptedCount >= validatorCount) {
    return new Array<CorruptionFlag>(validatorCount).fill(1);
  }

  const combination = new Array<CorruptionFlag>(validatorCount).fill(0);
  for (const index of rng.sampleIndices(validatorCount, corruptedCount)) {
    combination[index] = 1;
  }
  return combination;
}

/**
 * Yield exactly `iterations` independent combinations, with counts from
 * `sampler`. Draws past `iterations` are never taken; a sampler that runs
 * dry early is rejected.
 */
export function* createCorruptedCombinations(
  validatorCount: number,
  iterations: number,
  sampler: CorruptionSampler,
  rng: SeededRandom
): Generator<CorruptionFlag[], void, undefined> {
  const counts = sampler(validatorCount, iterations, rng)[Symbol.iterator]();

  try {
    for (let iteration = 0; iteration < iterations; iteration++) {
      const draw = counts.next();
      if (draw.done) {
        throw new SimulationConfigError({
          code: SimulationErrorCode.INVALID_SAMPLER,
          message: `Sampler yielded ${iteration} counts, expected ${iterations}`,
          details: { yielded: iteration, iterations },
        });
      }
      yield createCorruptedCombination(validatorCount, draw.value, rng);
    }
  } finally {
    counts.return?.();
  }
}
