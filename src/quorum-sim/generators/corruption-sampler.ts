/**
 * Quorum Sim - Corruption Sampler
 *
 * Draws how many validators are corrupted in each iteration.
 * Which validators are corrupted is decided by the combination generator.
 */

import { isNonNegativeInteger } from '../types/common';
import { CorruptionSampler, SamplerConfig, SimulationErrorCode } from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';
import { SeededRandom } from './seeded-random';

// ============================================
// GENERATORS
// ============================================

/**
 * Yield `iterations` corrupted counts drawn from Binomial(validatorCount, ratio)
 */
export function* binomialCorruptedCounts(
  validatorCount: number,
  iterations: number,
  rng: SeededRandom,
  ratio: number = 0.5
): Generator<number, void, undefined> {
  for (let i = 0; i < iterations; i++) {
    yield rng.binomial(validatorCount, ratio);
  }
}

/**
 * Yield the same corrupted count `iterations` times.
 * `validatorCount` is ignored; oversized counts are clamped downstream.
 */
export function* fixedCorruptedCounts(
  _validatorCount: number,
  iterations: number,
  corruptedCount: number = 0
): Generator<number, void, undefined> {
  for (let i = 0; i < iterations; i++) {
    yield corruptedCount;
  }
}

// ============================================
// SAMPLER FACTORIES
// ============================================

/** Validate a binomial ratio */
export function assertRatio(ratio: number): void {
  if (!(ratio >= 0 && ratio <= 1)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_SAMPLER,
      message: `Corruption ratio ${ratio} out of range [0, 1]`,
      details: { ratio },
    });
  }
}

/** Validate a fixed corrupted count */
export function assertCorruptedCount(corruptedCount: number): void {
  if (!isNonNegativeInteger(corruptedCount)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_SAMPLER,
      message: `Fixed corrupted count must be a non-negative integer, got ${corruptedCount}`,
      details: { corruptedCount },
    });
  }
}

export function binomialSampler(ratio: number = 0.5): CorruptionSampler {
  assertRatio(ratio);
  return (validatorCount, iterations, rng) =>
    binomialCorruptedCounts(validatorCount, iterations, rng, ratio);
}

export function fixedSampler(corruptedCount: number = 0): CorruptionSampler {
  assertCorruptedCount(corruptedCount);
  return (validatorCount, iterations) =>
    fixedCorruptedCounts(validatorCount, iterations, corruptedCount);
}

/**
 * Build a sampler from its configuration
 */
export function createSampler(config: SamplerConfig): CorruptionSampler {
  switch (config.kind) {
    case 'BINOMIAL':
      return binomialSampler(config.ratio);
    case 'FIXED':
      return fixedSampler(config.corruptedCount);
  }
}
