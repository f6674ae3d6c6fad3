/**
 * Quorum Sim - Layer Partitioner Tests
 */

import { splitIntoLayers, assertPartitionable } from '../engines/layer-partitioner';
import { CorruptionFlag } from '../types/common';
import { SimulationErrorCode } from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';
import { captureError } from './helpers/capture-error';

describe('Layer Partitioner', () => {
  const validators: CorruptionFlag[] = [1, 0, 0, 1, 1, 0, 0, 0, 1];

  test('yields N/q contiguous quorums in order', () => {
    expect(Array.from(splitIntoLayers(validators, 3))).toEqual([
      [1, 0, 0],
      [1, 1, 0],
      [0, 0, 1],
    ]);
  });

  test('concatenation of quorums equals the input', () => {
    for (const quorumSize of [1, 3, 9]) {
      const quorums = Array.from(splitIntoLayers(validators, quorumSize));
      expect(quorums).toHaveLength(validators.length / quorumSize);
      expect(quorums.flat()).toEqual(validators);
      expect(quorums.every(q => q.length === quorumSize)).toBe(true);
    }
  });

  test('does not modify the input', () => {
    const input: CorruptionFlag[] = [1, 1, 0, 0];
    const quorums = Array.from(splitIntoLayers(input, 2));
    quorums[0][0] = 0;
    expect(input).toEqual([1, 1, 0, 0]);
  });

  test('is lazy', () => {
    const generator = splitIntoLayers(validators, 3);
    expect(generator.next().value).toEqual([1, 0, 0]);
  });

  test('rejects a population not divisible by the quorum size', () => {
    const error = captureError(() => Array.from(splitIntoLayers(validators, 4)));
    expect(error).toBeInstanceOf(SimulationConfigError);
    expect(error).toMatchObject({
      code: SimulationErrorCode.INVALID_PARTITION,
      details: { validatorCount: 9, quorumSize: 4, remainder: 1 },
    });
  });

  test('rejects a non-positive quorum size', () => {
    expect(() => assertPartitionable(9, 0)).toThrow('positive integer');
    expect(() => assertPartitionable(9, -3)).toThrow(SimulationConfigError);
  });
});
