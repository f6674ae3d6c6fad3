/**
 * Quorum Sim - Configuration
 *
 * Builds a SimulationConfig from the reference defaults, environment
 * variables and command-line options. Values are validated with zod;
 * later sources override earlier ones.
 */

import { z } from 'zod';
import {
  SamplerConfig,
  SimulationConfig,
  SimulationErrorCode,
  DEFAULT_SIMULATION_CONFIG,
} from '../types/simulation';
import { SimulationConfigError } from '../utils/errors';
import { Result, ok, err } from '../utils/result';

// ============================================
// SCHEMA
// ============================================

const positiveInt = z.coerce.number().int().positive();

/** Flat, string-tolerant configuration as it arrives from env or argv */
export const simulationConfigInputSchema = z
  .object({
    iterations: positiveInt.optional(),
    layers: positiveInt.optional(),
    quorumSize: positiveInt.optional(),
    ratio: z.coerce.number().min(0).max(1).optional(),
    fixedCount: z.coerce.number().int().nonnegative().optional(),
    seed: z.coerce.number().int().nonnegative().max(0xffffffff).optional(),
    partitions: positiveInt.optional(),
  })
  .refine(input => input.ratio === undefined || input.fixedCount === undefined, {
    message: 'ratio and fixedCount are mutually exclusive',
    path: ['fixedCount'],
  });

export type SimulationConfigInput = z.input<typeof simulationConfigInputSchema>;

/** Environment variable for each input field */
export const ENV_VARIABLES: Record<keyof SimulationConfigInput, string> = {
  iterations: 'SIM_ITERATIONS',
  layers: 'SIM_LAYERS',
  quorumSize: 'SIM_QUORUM_SIZE',
  ratio: 'SIM_RATIO',
  fixedCount: 'SIM_FIXED_COUNT',
  seed: 'SIM_SEED',
  partitions: 'SIM_PARTITIONS',
};

// ============================================
// SOURCES
// ============================================

/**
 * Collect SIM_* variables; unset ones are left out
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const input: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      input[field] = value;
    }
  }
  return input;
}

function definedEntries(source: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));
}

/** ratio and fixedCount each select a sampler; setting one replaces the other */
const SAMPLER_FIELDS = ['ratio', 'fixedCount'] as const;

function mergeSource(acc: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const defined = definedEntries(source);
  const merged = { ...acc };
  if (SAMPLER_FIELDS.some(field => field in defined)) {
    for (const field of SAMPLER_FIELDS) {
      delete merged[field];
    }
  }
  return { ...merged, ...defined };
}

// ============================================
// PARSING
// ============================================

/**
 * Merge configuration sources (later wins) over the reference defaults.
 * A sampler field in a later source replaces the sampler chosen earlier;
 * one source setting both is rejected.
 */
export function parseSimulationConfig(
  ...sources: Array<Record<string, unknown>>
): Result<SimulationConfig, SimulationConfigError> {
  const merged = sources.reduce<Record<string, unknown>>(mergeSource, {});

  const parsed = simulationConfigInputSchema.safeParse(merged);
  if (!parsed.success) {
    return err(new SimulationConfigError({
      code: SimulationErrorCode.INVALID_CONFIG,
      message: parsed.error.issues
        .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
        .join('; '),
      details: { issues: parsed.error.issues },
    }));
  }

  const input = parsed.data;
  let sampler: SamplerConfig = DEFAULT_SIMULATION_CONFIG.sampler;
  if (input.fixedCount !== undefined) {
    sampler = { kind: 'FIXED', corruptedCount: input.fixedCount };
  } else if (input.ratio !== undefined) {
    sampler = { kind: 'BINOMIAL', ratio: input.ratio };
  }

  const config: SimulationConfig = {
    iterations: input.iterations ?? DEFAULT_SIMULATION_CONFIG.iterations,
    layers: input.layers ?? DEFAULT_SIMULATION_CONFIG.layers,
    quorumSize: input.quorumSize ?? DEFAULT_SIMULATION_CONFIG.quorumSize,
    sampler,
    seed: input.seed,
    partitions: input.partitions ?? DEFAULT_SIMULATION_CONFIG.partitions,
  };

  if (config.partitions > config.iterations) {
    return err(new SimulationConfigError({
      code: SimulationErrorCode.INVALID_PARTITIONS,
      message: `Partitions (${config.partitions}) cannot exceed iterations (${config.iterations})`,
      details: { partitions: config.partitions, iterations: config.iterations },
    }));
  }

  return ok(config);
}

/**
 * Configuration from the environment alone
 */
export function loadSimulationConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<SimulationConfig, SimulationConfigError> {
  return parseSimulationConfig(readEnvConfig(env));
}
