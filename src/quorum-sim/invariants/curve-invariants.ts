/**
 * Quorum Sim - Curve Invariants
 *
 * Properties every result curve must satisfy, checked after finalization.
 */

import { ResultCurve } from '../types/simulation';
import { CurveInvariant, InvariantCheckResult } from '../types/invariant';

/**
 * CURVE-01: probability(t1) >= probability(t2) whenever t1 < t2
 */
export function checkMonotonicity(curve: ResultCurve): InvariantCheckResult {
  const increases: Array<{ from: number; to: number; fromProb: number; toProb: number }> = [];
  const probs = curve.attackSuccessfulProb;

  for (let i = 1; i < probs.length; i++) {
    if (probs[i] > probs[i - 1]) {
      increases.push({
        from: curve.threshold[i - 1],
        to: curve.threshold[i],
        fromProb: probs[i - 1],
        toProb: probs[i],
      });
    }
  }
  const holds = increases.length === 0;

  return {
    holds,
    violation: holds ? undefined : {
      description: 'Monotonicity violated: a stricter threshold has a higher probability',
      expected: 'Non-increasing probabilities',
      actual: `${increases.length} increasing steps`,
      details: { increases },
    },
  };
}

/**
 * CURVE-02: 0 <= probability <= 1
 */
export function checkBounds(curve: ResultCurve): InvariantCheckResult {
  const outOfRange = curve.threshold
    .map((threshold, i) => ({ threshold, probability: curve.attackSuccessfulProb[i] }))
    .filter(p => !(p.probability >= 0 && p.probability <= 1));
  const holds = outOfRange.length === 0;

  return {
    holds,
    violation: holds ? undefined : {
      description: 'Bounds violated: probability outside [0, 1]',
      expected: 'All probabilities in [0, 1]',
      actual: `${outOfRange.length} out of range`,
      details: { outOfRange },
    },
  };
}

/**
 * CURVE-03: arrays aligned and thresholds strictly ascending
 */
export function checkAlignment(curve: ResultCurve): InvariantCheckResult {
  const aligned = curve.threshold.length === curve.attackSuccessfulProb.length;
  const ascending = curve.threshold.every((t, i) => i === 0 || t > curve.threshold[i - 1]);
  const holds = aligned && ascending;

  return {
    holds,
    violation: holds ? undefined : {
      description: 'Alignment violated: thresholds and probabilities do not pair up',
      expected: 'Equal lengths, strictly ascending thresholds',
      actual: `${curve.threshold.length} thresholds, ${curve.attackSuccessfulProb.length} probabilities, ascending=${ascending}`,
    },
  };
}

export const CURVE_INVARIANTS: CurveInvariant[] = [
  { id: 'CURVE-01', name: 'Monotonicity', check: checkMonotonicity },
  { id: 'CURVE-02', name: 'Bounds', check: checkBounds },
  { id: 'CURVE-03', name: 'Alignment', check: checkAlignment },
];

/**
 * Run every curve invariant and collect violation messages
 */
export function checkCurveInvariants(curve: ResultCurve): { holds: boolean; violations: string[] } {
  const violations: string[] = [];
  for (const invariant of CURVE_INVARIANTS) {
    const result = invariant.check(curve);
    if (!result.holds && result.violation) {
      violations.push(`${invariant.id}: ${result.violation.description}`);
    }
  }
  return { holds: violations.length === 0, violations };
}
