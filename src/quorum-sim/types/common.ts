/**
 * Quorum Sim - Common Types
 *
 * Fundamental type aliases and shared helpers used across the simulator.
 */

// ============================================
// CORE TYPE ALIASES
// ============================================

/** Position of a validator within the flat population (0..N-1) */
export type ValidatorIndex = number;

/** Validator state within one corruption assignment: 0 = honest, 1 = corrupted */
export type CorruptionFlag = 0 | 1;

/** Minimum number of corrupted validators within a quorum to call it corrupted */
export type Threshold = number;

/** Empirical probability in [0, 1] */
export type Probability = number;

/** Unix timestamp in milliseconds */
export type Timestamp = number;

// ============================================
// UTILITY FUNCTIONS
// ============================================

/** Get current timestamp */
export function now(): Timestamp {
  return Date.now();
}

/** True for finite integers >= 1 */
export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/** True for finite integers >= 0 */
export function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
