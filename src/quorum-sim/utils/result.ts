/**
 * Quorum Sim - Result Type
 *
 * Discriminated union for success or failure, used where configuration
 * arrives from outside and may be rejected without throwing.
 */

// ============================================
// RESULT TYPE
// ============================================

/** Successful result */
export interface Ok<T> {
  ok: true;
  value: T;
}

/** Failed result */
export interface Err<E> {
  ok: false;
  error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

// ============================================
// CONSTRUCTORS
// ============================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================
// UTILITY FUNCTIONS
// ============================================

/** Run a function, capturing a thrown value as an error result */
export function tryCatch<T, E>(fn: () => T, errorMapper: (e: unknown) => E): Result<T, E> {
  try {
    return ok(fn());
  } catch (e) {
    return err(errorMapper(e));
  }
}
