/**
 * Quorum Sim - Public API
 *
 * Monte Carlo estimation of attack success probability for layered
 * BFT quorum systems.
 */

// ============================================
// TYPE EXPORTS
// ============================================

export * from './types/common';
export * from './types/simulation';
export * from './types/invariant';

// ============================================
// RESULT & ERROR EXPORTS
// ============================================

export { Result, Ok, Err, ok, err, tryCatch } from './utils/result';
export { SimulationConfigError, toSimulationConfigError } from './utils/errors';
export { logger, getLogLevel, LogLevel } from './utils/logger';

// ============================================
// GENERATORS
// ============================================

export { SeededRandom, createSeededRandom, randomSeed } from './generators/seeded-random';

export {
  binomialCorruptedCounts,
  fixedCorruptedCounts,
  binomialSampler,
  fixedSampler,
  createSampler,
} from './generators/corruption-sampler';

export {
  createCorruptedCombination,
  createCorruptedCombinations,
} from './generators/combination-generator';

// ============================================
// ENGINES
// ============================================

export { splitIntoLayers, assertPartitionable } from './engines/layer-partitioner';

export {
  quorumThresholdBounds,
  thresholdRangeFromTo,
  resolveThresholds,
  countCorrupted,
  evaluateQuorum,
} from './engines/threshold-evaluator';

export {
  SimulationEngine,
  HitCountContext,
  simulate,
  runSimulation,
  createSimulationEngine,
  countThresholdHits,
  mergeHitCounts,
  finalizeCurve,
  splitIterations,
  validateSimulationParameters,
} from './engines/simulation-engine';

// ============================================
// INVARIANTS
// ============================================

export {
  checkMonotonicity,
  checkBounds,
  checkAlignment,
  checkCurveInvariants,
  CURVE_INVARIANTS,
} from './invariants/curve-invariants';

// ============================================
// CONFIGURATION & REPORTING
// ============================================

export {
  simulationConfigInputSchema,
  SimulationConfigInput,
  ENV_VARIABLES,
  readEnvConfig,
  parseSimulationConfig,
  loadSimulationConfig,
} from './config/simulation-config';

export {
  Reporter,
  ReporterConfig,
  createReporter,
  describeSampler,
  DEFAULT_REPORTER_CONFIG,
} from './dashboard/reporter';
