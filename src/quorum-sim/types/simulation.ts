/**
 * Quorum Sim - Simulation Types
 *
 * Type definitions for the Monte Carlo quorum attack simulation.
 * Defines run configuration, sampler descriptions, result curves and errors.
 */

import { Threshold, Probability, Timestamp } from './common';
import { SeededRandom } from '../generators/seeded-random';

// ============================================
// SAMPLER TYPES
// ============================================

/**
 * Produces the corrupted-validator count for each iteration.
 * Must yield exactly `iterations` values.
 */
export type CorruptionSampler = (
  validatorCount: number,
  iterations: number,
  rng: SeededRandom
) => Iterable<number>;

/** Serializable description of a sampler, used by configuration */
export type SamplerConfig =
  | BinomialSamplerConfig
  | FixedSamplerConfig;

export interface BinomialSamplerConfig {
  kind: 'BINOMIAL';
  /** Probability that any single validator is corrupted */
  ratio: number;
}

export interface FixedSamplerConfig {
  kind: 'FIXED';
  /** Corrupted validators in every iteration (clamped to the population) */
  corruptedCount: number;
}

// ============================================
// THRESHOLD TYPES
// ============================================

/** Produces the thresholds to evaluate, ascending, for the given inclusive bounds */
export type ThresholdRangeFn = (minThreshold: Threshold, maxThreshold: Threshold) => Iterable<Threshold>;

/** Inclusive threshold bounds for a quorum size */
export interface ThresholdBounds {
  /** Simple majority: floor(quorumSize / 2) + 1 */
  min: Threshold;
  /** Full quorum corrupted */
  max: Threshold;
}

// ============================================
// SIMULATION CONFIGURATION
// ============================================

/** Configuration for a simulation run */
export interface SimulationConfig {
  /** Number of Monte Carlo iterations */
  iterations: number;
  /** Number of layers (one quorum per layer) */
  layers: number;
  /** Validators per quorum */
  quorumSize: number;
  /** How corrupted counts are drawn */
  sampler: SamplerConfig;
  /** Random seed for reproducibility; a fresh one is drawn when omitted */
  seed?: number;
  /** Independent random streams the iterations are split across */
  partitions: number;
  /** Threshold range function; defaults to the inclusive range */
  thresholdRange?: ThresholdRangeFn;
}

/** Reference invocation */
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  iterations: 10000,
  layers: 10,
  quorumSize: 11,
  sampler: { kind: 'BINOMIAL', ratio: 0.5 },
  partitions: 1,
};

/** Options accepted by simulate() */
export interface SimulateOptions {
  sampler?: CorruptionSampler;
  seed?: number;
  onProgress?: (iteration: number, totalIterations: number) => void;
}

// ============================================
// RESULTS
// ============================================

/** Attack success probability per threshold, ascending by threshold */
export interface ResultCurve {
  readonly threshold: readonly Threshold[];
  readonly attackSuccessfulProb: readonly Probability[];
}

/** Iterations in which some quorum reached each threshold */
export type HitCounts = Map<Threshold, number>;

/** Summary of a completed run */
export interface SimulationSummary {
  validatorCount: number;
  bounds: ThresholdBounds;
  hitCounts: Record<Threshold, number>;
  seed: number;
  partitions: number;
  /** Monotonicity and bounds held for the returned curve */
  invariantsMaintained: boolean;
  invariantViolations: string[];
}

/** Result of runSimulation() */
export interface SimulationResult {
  config: Omit<SimulationConfig, 'thresholdRange'>;
  curve: ResultCurve;
  summary: SimulationSummary;
  durationMs: number;
  startedAt: Timestamp;
  completedAt: Timestamp;
}

// ============================================
// ERRORS
// ============================================

/** Error codes for rejected simulation configurations */
export enum SimulationErrorCode {
  /** Population cannot be split into equal quorums */
  INVALID_PARTITION = 'INVALID_PARTITION',

  /** Quorum size is not a positive integer */
  INVALID_QUORUM_SIZE = 'INVALID_QUORUM_SIZE',

  /** Layer count is not a positive integer */
  INVALID_LAYERS = 'INVALID_LAYERS',

  /** Iteration count is not a positive integer */
  INVALID_ITERATIONS = 'INVALID_ITERATIONS',

  /** Threshold range is empty, unordered or outside [1, quorumSize] */
  INVALID_THRESHOLD_RANGE = 'INVALID_THRESHOLD_RANGE',

  /** Ratio outside [0, 1] or fixed count not a non-negative integer */
  INVALID_SAMPLER = 'INVALID_SAMPLER',

  /** Partition count is not a positive integer or exceeds iterations */
  INVALID_PARTITIONS = 'INVALID_PARTITIONS',

  /** External configuration failed schema validation */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/** Simulation error details */
export interface SimulationError {
  code: SimulationErrorCode;
  message: string;
  details?: Record<string, unknown>;
}
