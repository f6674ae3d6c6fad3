/**
 * Quorum Sim - Threshold Evaluator
 *
 * Decides which thresholds a single quorum's corruption count satisfies.
 */

import { CorruptionFlag, Threshold, isPositiveInteger } from '../types/common';
import { SimulationErrorCode, ThresholdBounds, ThresholdRangeFn } from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';

// ============================================
// THRESHOLD RANGE
// ============================================

/**
 * Simple majority up to the full quorum
 */
export function quorumThresholdBounds(quorumSize: number): ThresholdBounds {
  if (!isPositiveInteger(quorumSize)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_QUORUM_SIZE,
      message: `Quorum size must be a positive integer, got ${quorumSize}`,
      details: { quorumSize },
    });
  }
  return {
    min: Math.floor(quorumSize / 2) + 1,
    max: quorumSize,
  };
}

/**
 * Thresholds from minThreshold to maxThreshold, both inclusive
 */
export function* thresholdRangeFromTo(
  minThreshold: Threshold,
  maxThreshold: Threshold
): Generator<Threshold, void, undefined> {
  for (let threshold = minThreshold; threshold <= maxThreshold; threshold++) {
    yield threshold;
  }
}

/**
 * Materialize and validate the thresholds a range function produces.
 * They must be strictly ascending integers within [1, quorumSize].
 */
export function resolveThresholds(
  thresholdRange: ThresholdRangeFn,
  bounds: ThresholdBounds,
  quorumSize: number
): Threshold[] {
  const thresholds = Array.from(thresholdRange(bounds.min, bounds.max));

  if (thresholds.length === 0) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_THRESHOLD_RANGE,
      message: `Threshold range for [${bounds.min}, ${bounds.max}] is empty`,
      details: { ...bounds },
    });
  }

  thresholds.forEach((threshold, i) => {
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > quorumSize) {
      throw new SimulationConfigError({
        code: SimulationErrorCode.INVALID_THRESHOLD_RANGE,
        message: `Threshold ${threshold} outside [1, ${quorumSize}]`,
        details: { thresholds, quorumSize },
      });
    }
    if (i > 0 && threshold <= thresholds[i - 1]) {
      throw new SimulationConfigError({
        code: SimulationErrorCode.INVALID_THRESHOLD_RANGE,
        message: 'Thresholds must be strictly ascending',
        details: { thresholds },
      });
    }
  });

  return thresholds;
}

// ============================================
// EVALUATION
// ============================================

/** Number of corrupted validators in a quorum */
export function countCorrupted(quorum: readonly CorruptionFlag[]): number {
  let count = 0;
  for (const flag of quorum) {
    count += flag;
  }
  return count;
}

/**
 * Every threshold (ascending) that `corruptedCount` meets or exceeds
 */
export function evaluateQuorum(
  corruptedCount: number,
  thresholds: readonly Threshold[]
): Threshold[] {
  const hits: Threshold[] = [];
  for (const threshold of thresholds) {
    if (corruptedCount >= threshold) {
      hits.push(threshold);
    }
  }
  return hits;
}
