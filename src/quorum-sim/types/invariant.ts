/**
 * Quorum Sim - Invariant Types
 *
 * Checks run against a finished result curve.
 */

import { ResultCurve } from './simulation';

/** Invariant identifiers */
export type CurveInvariantId =
  | 'CURVE-01'   // Probabilities non-increasing as threshold grows
  | 'CURVE-02'   // Probabilities within [0, 1]
  | 'CURVE-03';  // Threshold and probability arrays aligned, thresholds ascending

/** Violation details */
export interface InvariantViolation {
  description: string;
  expected: string;
  actual: string;
  details?: Record<string, unknown>;
}

/** Result of a single invariant check */
export interface InvariantCheckResult {
  holds: boolean;
  violation?: InvariantViolation;
}

/** A named check over a curve */
export interface CurveInvariant {
  id: CurveInvariantId;
  name: string;
  check: (curve: ResultCurve) => InvariantCheckResult;
}
