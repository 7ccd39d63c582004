/**
 * Tolerance model and numeric context
 *
 * Every proximity, collinearity and coplanarity decision in one operation
 * goes through a single length tolerance (eps). The tolerance travels with
 * each call inside a NumericContext; there is no process-wide setting.
 */

import type { GeometryOperationType, GeometryResult } from '../result.js';
import { failure, success, toleranceError } from '../result.js';
import { ToleranceSchema } from '../validate/schema.js';

/**
 * Tolerance values for an operation
 */
export interface Tolerances {
  /** Model-space length tolerance (absolute distance) */
  length: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  readonly tol: Readonly<Tolerances>;
}

/**
 * Default tolerances: 0.001 model units, which is 1 micron for models in mm
 */
export const DEFAULT_TOLERANCES: Readonly<Tolerances> = {
  length: 1e-3,
};

/**
 * Create a numeric context, filling gaps from DEFAULT_TOLERANCES
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
    },
  };
}

/**
 * Turn a caller-supplied eps into a context, rejecting negative or
 * non-finite values.
 */
export function resolveTolerance(
  eps: number | undefined,
  operation: GeometryOperationType
): GeometryResult<NumericContext> {
  if (eps === undefined) {
    return success(createNumericContext());
  }
  const parsed = ToleranceSchema.safeParse(eps);
  if (!parsed.success) {
    return failure(
      toleranceError(`Tolerance must be a finite non-negative number, got ${eps}`, operation, { eps })
    );
  }
  return success(createNumericContext({ length: parsed.data }));
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}

/**
 * Check if two lengths are equal within tolerance
 */
export function eqLength(a: number, b: number, ctx: NumericContext): boolean {
  return Math.abs(a - b) <= ctx.tol.length;
}
