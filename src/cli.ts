#!/usr/bin/env node
/**
 * Quorum Sim - Command Line
 *
 * Runs one simulation and prints the report. Options override SIM_*
 * environment variables, which override the reference defaults
 * (10000 iterations, 10 layers, quorums of 11).
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  SimulationEngine,
  SimulationResult,
  createReporter,
  logger,
  parseSimulationConfig,
  readEnvConfig,
  toSimulationConfigError,
  tryCatch,
} from './quorum-sim';

const log = logger({ module: 'cli' });

export function buildParser(argv: string[]) {
  return yargs(argv)
    .scriptName('quorum-sim')
    .usage('$0 [options]')
    .option('iterations', { type: 'number', describe: 'Monte Carlo iterations' })
    .option('layers', { type: 'number', describe: 'Number of layers (one quorum each)' })
    .option('quorum-size', { type: 'number', describe: 'Validators per quorum' })
    .option('ratio', { type: 'number', describe: 'Binomial corruption ratio' })
    .option('fixed-count', { type: 'number', describe: 'Corrupt exactly this many validators every iteration' })
    .option('seed', { type: 'number', describe: 'Random seed' })
    .option('partitions', { type: 'number', describe: 'Independent random streams' })
    .option('json', { type: 'boolean', default: false, describe: 'Print the result as JSON' })
    .conflicts('ratio', 'fixed-count')
    .strict()
    .help();
}

export function main(argv: string[] = hideBin(process.argv)): number {
  const args = buildParser(argv).parseSync();

  const configResult = parseSimulationConfig(readEnvConfig(), {
    iterations: args.iterations,
    layers: args.layers,
    quorumSize: args.quorumSize,
    ratio: args.ratio,
    fixedCount: args.fixedCount,
    seed: args.seed,
    partitions: args.partitions,
  });
  if (!configResult.ok) {
    log.error({ error: configResult.error.toJSON() }, 'invalid configuration');
    return 1;
  }

  const runResult = tryCatch((): SimulationResult => {
    const engine = new SimulationEngine(configResult.value);
    engine.setProgressCallback((iteration, total) => {
      log.debug({ iteration, total }, 'progress');
    });
    return engine.run();
  }, toSimulationConfigError);

  if (!runResult.ok) {
    log.error({ error: runResult.error.toJSON() }, 'simulation rejected');
    return 1;
  }

  const output = args.json
    ? JSON.stringify(runResult.value, null, 2)
    : createReporter().generateReport(runResult.value);
  process.stdout.write(`${output}\n`);
  return 0;
}

if (require.main === module) {
  process.exitCode = main();
}
