/**
 * Quorum Sim - Errors
 */

import { SimulationError, SimulationErrorCode } from '../types/simulation';

/**
 * Raised synchronously, before any iteration runs, when a run is misconfigured.
 */
export class SimulationConfigError extends Error {
  public readonly code: SimulationErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: SimulationError) {
    super(error.message);
    this.name = 'SimulationConfigError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): SimulationError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** Wrap anything thrown into a SimulationConfigError */
export function toSimulationConfigError(e: unknown): SimulationConfigError {
  if (e instanceof SimulationConfigError) {
    return e;
  }
  return new SimulationConfigError({
    code: SimulationErrorCode.INVALID_CONFIG,
    message: e instanceof Error ? e.message : String(e),
  });
}
