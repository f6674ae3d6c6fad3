/**
 * Quorum Sim - Reporter
 *
 * Renders a result curve for the terminal: the per-threshold pairs and a
 * horizontal bar chart of attack success probability against n_min.
 */

import { ResultCurve, SamplerConfig, SimulationResult } from '../types/simulation';

// ============================================
// REPORTER
// ============================================

export interface ReporterConfig {
  title: string;
  xLabel: string;
  yLabel: string;
  /** Characters for a probability of 1 */
  barWidth: number;
  /** Decimal places in the chart column */
  precision: number;
}

export const DEFAULT_REPORTER_CONFIG: ReporterConfig = {
  title: 'Threshold Attack Success Probability',
  xLabel: 'n_min',
  yLabel: 'Attack Success Probability',
  barWidth: 40,
  precision: 4,
};

/**
 * Formats simulation output
 */
export class Reporter {
  private config: ReporterConfig;

  constructor(config?: Partial<ReporterConfig>) {
    this.config = { ...DEFAULT_REPORTER_CONFIG, ...config };
  }

  /**
   * One "( threshold, probability )" line per point
   */
  formatPairs(curve: ResultCurve): string[] {
    return curve.threshold.map((t, i) => `( ${t}, ${curve.attackSuccessfulProb[i]} )`);
  }

  /**
   * Horizontal bar chart, one row per threshold
   */
  renderBarChart(curve: ResultCurve): string[] {
    const { title, xLabel, yLabel, barWidth, precision } = this.config;
    const labelWidth = Math.max(xLabel.length, ...curve.threshold.map(t => String(t).length));

    const rows = curve.threshold.map((t, i) => {
      const probability = curve.attackSuccessfulProb[i];
      const bar = '#'.repeat(Math.round(probability * barWidth)).padEnd(barWidth);
      return `${String(t).padStart(labelWidth)} | ${bar} | ${probability.toFixed(precision)}`;
    });

    return [title, `${xLabel.padStart(labelWidth)} | ${yLabel}`, ...rows];
  }

  /**
   * Full text report for a run
   */
  generateReport(result: SimulationResult): string {
    const { config, summary } = result;
    const lines = [
      `Validators: ${summary.validatorCount} (${config.layers} layers x ${config.quorumSize})`,
      `Iterations: ${config.iterations} across ${summary.partitions} partition(s)`,
      `Sampler: ${describeSampler(config.sampler)}`,
      `Seed: ${summary.seed}`,
      `Thresholds: [${summary.bounds.min}, ${summary.bounds.max}]`,
      '',
      ...this.formatPairs(result.curve),
      '',
      ...this.renderBarChart(result.curve),
    ];

    if (!summary.invariantsMaintained) {
      lines.push('', ...summary.invariantViolations.map(v => `WARNING ${v}`));
    }

    return lines.join('\n');
  }
}

export function describeSampler(sampler: SamplerConfig): string {
  switch (sampler.kind) {
    case 'BINOMIAL':
      return `binomial (ratio ${sampler.ratio})`;
    case 'FIXED':
      return `fixed (${sampler.corruptedCount} corrupted)`;
  }
}

export function createReporter(config?: Partial<ReporterConfig>): Reporter {
  return new Reporter(config);
}
