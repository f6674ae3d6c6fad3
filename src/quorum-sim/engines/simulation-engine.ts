/**
 * Quorum Sim - Simulation Engine
 *
 * Monte Carlo driver. Each iteration corrupts a random set of validators,
 * splits them into one quorum per layer and records which thresholds the
 * first sufficiently corrupted quorum reached. Hit counts become the
 * attack success probability curve.
 */

import { Threshold, isPositiveInteger, now } from '../types/common';
import {
  CorruptionSampler,
  HitCounts,
  ResultCurve,
  SimulateOptions,
  SimulationConfig,
  SimulationErrorCode,
  SimulationResult,
  ThresholdBounds,
  ThresholdRangeFn,
  DEFAULT_SIMULATION_CONFIG,
} from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';
import { logger } from '../utils/logger';
import { SeededRandom, randomSeed } from '../generators/seeded-random';
import { binomialSampler, createSampler } from '../generators/corruption-sampler';
import { createCorruptedCombinations } from '../generators/combination-generator';
import { splitIntoLayers } from './layer-partitioner';
import {
  countCorrupted,
  evaluateQuorum,
  quorumThresholdBounds,
  resolveThresholds,
  thresholdRangeFromTo,
} from './threshold-evaluator';
import { checkCurveInvariants } from '../invariants/curve-invariants';

const log = logger({ module: 'simulation-engine' });

// ============================================
// VALIDATION
// ============================================

/**
 * Reject run parameters before any iteration starts
 */
export function validateSimulationParameters(
  iterations: number,
  layers: number,
  quorumSize: number
): void {
  if (!isPositiveInteger(iterations)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_ITERATIONS,
      message: `Iterations must be a positive integer, got ${iterations}`,
      details: { iterations },
    });
  }
  if (!isPositiveInteger(layers)) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_LAYERS,
      message: `Layers must be a positive integer, got ${layers}`,
      details: { layers },
    });
  }
  // Also rejects quorumSize = 0
  quorumThresholdBounds(quorumSize);
}

/**
 * Split `iterations` across `partitions` as evenly as possible
 */
export function splitIterations(iterations: number, partitions: number): number[] {
  if (!isPositiveInteger(partitions) || partitions > iterations) {
    throw new SimulationConfigError({
      code: SimulationErrorCode.INVALID_PARTITIONS,
      message: `Partitions must be a positive integer no greater than iterations (${iterations}), got ${partitions}`,
      details: { iterations, partitions },
    });
  }

  const base = Math.floor(iterations / partitions);
  const remainder = iterations % partitions;
  return Array.from({ length: partitions }, (_, i) => base + (i < remainder ? 1 : 0));
}

// ============================================
// CORE LOOP
// ============================================

/** Inputs for one pass over a block of iterations */
export interface HitCountContext {
  iterations: number;
  layers: number;
  quorumSize: number;
  thresholds: readonly Threshold[];
  sampler: CorruptionSampler;
  rng: SeededRandom;
  /** Called after each iteration */
  onIteration?: () => void;
}

/**
 * Run `iterations` iterations and count, per threshold, the iterations in
 * which a quorum reached it. Evaluation of an iteration stops at the first
 * quorum that hits any threshold.
 */
export function countThresholdHits(context: HitCountContext): HitCounts {
  const { iterations, layers, quorumSize, thresholds, sampler, rng, onIteration } = context;
  const validatorCount = layers * quorumSize;

  const hits: HitCounts = new Map();
  for (const threshold of thresholds) {
    hits.set(threshold, 0);
  }

  for (const combination of createCorruptedCombinations(validatorCount, iterations, sampler, rng)) {
    for (const quorum of splitIntoLayers(combination, quorumSize)) {
      const satisfied = evaluateQuorum(countCorrupted(quorum), thresholds);

      for (const threshold of satisfied) {
        hits.set(threshold, (hits.get(threshold) ?? 0) + 1);
      }

      // Attacker owns the iteration once one quorum is corrupted
      if (satisfied.length > 0) {
        break;
      }
    }
    onIteration?.();
  }

  return hits;
}

/**
 * Sum per-threshold hit counts from independent partitions
 */
export function mergeHitCounts(partials: readonly HitCounts[], thresholds: readonly Threshold[]): HitCounts {
  const merged: HitCounts = new Map();
  for (const threshold of thresholds) {
    merged.set(
      threshold,
      partials.reduce((sum, partial) => sum + (partial.get(threshold) ?? 0), 0)
    );
  }
  return merged;
}

/**
 * Convert hit counts to probabilities, ascending by threshold
 */
export function finalizeCurve(
  hits: HitCounts,
  thresholds: readonly Threshold[],
  iterations: number
): ResultCurve {
  const threshold: Threshold[] = [];
  const attackSuccessfulProb: number[] = [];

  for (const t of thresholds) {
    const probability = (hits.get(t) ?? 0) / iterations;
    log.debug({ threshold: t, probability }, `( ${t}, ${probability} )`);

    threshold.push(t);
    attackSuccessfulProb.push(probability);
  }

  return Object.freeze({
    threshold: Object.freeze(threshold),
    attackSuccessfulProb: Object.freeze(attackSuccessfulProb),
  });
}

// ============================================
// ENTRY POINTS
// ============================================

/**
 * Estimate attack success probability for every threshold in range
 */
export function simulate(
  iterations: number,
  layers: number,
  quorumSize: number,
  thresholdRange: ThresholdRangeFn = thresholdRangeFromTo,
  options: SimulateOptions = {}
): ResultCurve {
  validateSimulationParameters(iterations, layers, quorumSize);

  const bounds = quorumThresholdBounds(quorumSize);
  const thresholds = resolveThresholds(thresholdRange, bounds, quorumSize);
  const rng = new SeededRandom(options.seed ?? randomSeed());

  let completed = 0;
  const onProgress = options.onProgress;
  const hits = countThresholdHits({
    iterations,
    layers,
    quorumSize,
    thresholds,
    sampler: options.sampler ?? binomialSampler(),
    rng,
    onIteration: onProgress ? () => onProgress(++completed, iterations) : undefined,
  });

  return finalizeCurve(hits, thresholds, iterations);
}

/**
 * Simulation Engine
 * Runs a fully configured simulation and summarizes it
 */
export class SimulationEngine {
  private config: SimulationConfig;
  private sampler: CorruptionSampler;
  private bounds: ThresholdBounds;
  private thresholds: Threshold[];
  private onProgress?: (iteration: number, totalIterations: number) => void;

  constructor(config: SimulationConfig) {
    validateSimulationParameters(config.iterations, config.layers, config.quorumSize);
    splitIterations(config.iterations, config.partitions);

    this.config = { ...config };
    this.sampler = createSampler(config.sampler);
    this.bounds = quorumThresholdBounds(config.quorumSize);
    this.thresholds = resolveThresholds(
      config.thresholdRange ?? thresholdRangeFromTo,
      this.bounds,
      config.quorumSize
    );
  }

  /**
   * Set progress callback, invoked roughly every 1% of iterations
   */
  setProgressCallback(callback: (iteration: number, totalIterations: number) => void): void {
    this.onProgress = callback;
  }

  /**
   * Run the simulation
   */
  run(): SimulationResult {
    const startedAt = now();
    const { iterations, layers, quorumSize, partitions } = this.config;
    const { sampler, bounds, thresholds } = this;
    const seed = this.config.seed ?? randomSeed();
    const root = new SeededRandom(seed);

    log.debug({ iterations, layers, quorumSize, partitions, seed }, 'simulation started');

    const reportEvery = Math.max(1, Math.floor(iterations / 100));
    let completed = 0;
    const onIteration = () => {
      completed++;
      if (this.onProgress && (completed % reportEvery === 0 || completed === iterations)) {
        this.onProgress(completed, iterations);
      }
    };

    // One stream per partition; a single partition uses the root stream
    const partials = splitIterations(iterations, partitions).map((partitionIterations, i) =>
      countThresholdHits({
        iterations: partitionIterations,
        layers,
        quorumSize,
        thresholds,
        sampler,
        rng: partitions === 1 ? root : root.fork(i),
        onIteration,
      })
    );

    const hits = mergeHitCounts(partials, thresholds);
    const curve = finalizeCurve(hits, thresholds, iterations);
    const invariants = checkCurveInvariants(curve);

    if (!invariants.holds) {
      log.warn({ violations: invariants.violations }, 'curve invariants violated');
    }

    const completedAt = now();
    const durationMs = completedAt - startedAt;
    log.debug({ durationMs }, 'simulation completed');

    const { thresholdRange: _thresholdRange, ...reportableConfig } = this.config;

    return {
      config: { ...reportableConfig, seed },
      curve,
      summary: {
        validatorCount: layers * quorumSize,
        bounds,
        hitCounts: Object.fromEntries(hits),
        seed,
        partitions,
        invariantsMaintained: invariants.holds,
        invariantViolations: invariants.violations,
      },
      durationMs,
      startedAt,
      completedAt,
    };
  }
}

// ============================================
// FACTORY FUNCTIONS
// ============================================

/**
 * Create a simulation engine, filling unset fields from the reference configuration
 */
export function createSimulationEngine(config: Partial<SimulationConfig> = {}): SimulationEngine {
  return new SimulationEngine({
    ...DEFAULT_SIMULATION_CONFIG,
    ...config,
  });
}

/**
 * Run a configured simulation
 */
export function runSimulation(config: SimulationConfig): SimulationResult {
  return new SimulationEngine(config).run();
}
