/**
 * Quorum Sim - Layer Partitioner
 *
 * Splits the flat validator assignment into one quorum per layer.
 */

import { CorruptionFlag, isPositiveInteger } from '../types/common';
import { SimulationErrorCode } from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';

/**
 * Reject a population that cannot be split into equal quorums
 */
export function assertPartitionable(validatorCount: number, quorumSize: number): void {
  if (!isPositiveInteger(quorumSize)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_PARTITION,
      message: `Quorum size must be a positive integer, got ${quorumSize}`,
      details: { validatorCount, quorumSize },
    });
  }
  if (validatorCount % quorumSize !== 0) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_PARTITION,
      message: `${validatorCount} validators cannot be split into quorums of ${quorumSize}`,
      details: { validatorCount, quorumSize, remainder: validatorCount % quorumSize },
    });
  }
}

/**
 * Yield contiguous, non-overlapping quorums of `quorumSize` validators, in order.
 * Requires validators.length % quorumSize === 0.
 */
export function* splitIntoLayers(
  validators: readonly CorruptionFlag[],
  quorumSize: number
): Generator<CorruptionFlag[], void, undefined> {
  assertPartitionable(validators.length, quorumSize);

  for (let i = 0; i < validators.length; i += quorumSize) {
    yield validators.slice(i, i + quorumSize);
  }
}
