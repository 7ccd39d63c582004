/**
 * Geometry operation result types
 *
 * Every public operation returns a GeometryResult<T> rather than throwing, so
 * the host can turn a failure into a message and abort its open transaction
 * without touching the model.
 */

// ============================================================================
// Operation Types
// ============================================================================

/**
 * Operation that produced an error
 */
export type GeometryOperationType =
  | `orderPaths`
  | `loftPaths`
  | `fitDominantPlane`
  | `fitPlane`
  | `edgeNormals`
  | `findIntersections`
  | `scaleToReference`
  | `validate`;

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error kinds
 *
 * - insufficientInput: fewer than the minimum number of curves, lines, edges or points
 * - mismatchedLength: paths meant to be lofted together have differing point counts
 * - degenerateInput: no usable triple or direction (collinear points, zero-length vectors)
 * - noSolution: the search finished without a result within tolerance
 * - toleranceMisconfigured: eps was negative or not a finite number
 */
export type GeometryErrorKind =
  | `insufficientInput`
  | `mismatchedLength`
  | `degenerateInput`
  | `noSolution`
  | `toleranceMisconfigured`;

/**
 * Hint for the host UI to help users fix their selection
 */
export interface GeometryHint {
  /** Short description of what might be wrong */
  summary: string;
  /** Suggested action to fix the issue */
  suggestion?: string;
  /** Related option or input names */
  relatedParameters?: string[];
}

/**
 * Detailed error information from a geometry operation
 */
export interface GeometryError {
  kind: GeometryErrorKind;
  /** Human-readable error message */
  message: string;
  operation: GeometryOperationType;
  hints?: GeometryHint[];
  /** Additional details for debugging */
  details?: Record<string, unknown>;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result of a geometry operation
 *
 * Usage:
 * ```ts
 * const result = orderPaths(paths);
 * if (result.ok) {
 *   const ordered = result.value;
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type GeometryResult<T> =
  | { ok: true; value: T; warnings?: string[] }
  | { ok: false; error: GeometryError };

/**
 * Thrown by unwrapResult only; the geometry layer itself never throws it.
 */
export class GeometryOperationError extends Error {
  readonly error: GeometryError;

  constructor(error: GeometryError) {
    super(`Geometry operation ${error.operation} failed: ${error.message}`);
    this.name = `GeometryOperationError`;
    this.error = error;
  }
}

// ============================================================================
// Result Constructors
// ============================================================================

/**
 * Create a successful result. Empty warning lists are dropped.
 */
export function success<T>(value: T, warnings?: string[]): GeometryResult<T> {
  if (warnings && warnings.length > 0) {
    return { ok: true, value, warnings };
  }
  return { ok: true, value };
}

/**
 * Create a failed result
 */
export function failure<T>(error: GeometryError): GeometryResult<T> {
  return { ok: false, error };
}

/**
 * Create a geometry error
 */
export function createGeometryError(
  kind: GeometryErrorKind,
  message: string,
  operation: GeometryOperationType,
  options?: {
    hints?: GeometryHint[];
    details?: Record<string, unknown>;
  }
): GeometryError {
  return {
    kind,
    message,
    operation,
    ...options,
  };
}

export function insufficientInputError(
  message: string,
  operation: GeometryOperationType,
  hints?: GeometryHint[]
): GeometryError {
  return createGeometryError(`insufficientInput`, message, operation, { hints });
}

export function mismatchedLengthError(
  message: string,
  operation: GeometryOperationType,
  details?: Record<string, unknown>
): GeometryError {
  return createGeometryError(`mismatchedLength`, message, operation, {
    hints: [
      {
        summary: `Curves have different segment counts`,
        suggestion: `Redraw the curves with the same number of segments`,
      },
    ],
    details,
  });
}

export function degenerateInputError(
  message: string,
  operation: GeometryOperationType,
  hints?: GeometryHint[]
): GeometryError {
  return createGeometryError(`degenerateInput`, message, operation, { hints });
}

export function noSolutionError(
  message: string,
  operation: GeometryOperationType,
  details?: Record<string, unknown>
): GeometryError {
  return createGeometryError(`noSolution`, message, operation, { details });
}

export function toleranceError(
  message: string,
  operation: GeometryOperationType,
  details?: Record<string, unknown>
): GeometryError {
  return createGeometryError(`toleranceMisconfigured`, message, operation, {
    hints: [
      {
        summary: `Tolerance must be a finite, non-negative length`,
        relatedParameters: [`eps`],
      },
    ],
    details,
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Check if a result is successful
 */
export function isSuccess<T>(
  result: GeometryResult<T>
): result is { ok: true; value: T; warnings?: string[] } {
  return result.ok;
}

/**
 * Check if a result is a failure
 */
export function isFailure<T>(
  result: GeometryResult<T>
): result is { ok: false; error: GeometryError } {
  return !result.ok;
}

/**
 * Map over a successful result
 */
export function mapResult<T, U>(result: GeometryResult<T>, fn: (value: T) => U): GeometryResult<U> {
  if (result.ok) {
    return success(fn(result.value), result.warnings);
  }
  return result;
}

/**
 * Chain geometry operations (flatMap), combining warnings
 */
export function chainResult<T, U>(
  result: GeometryResult<T>,
  fn: (value: T) => GeometryResult<U>
): GeometryResult<U> {
  if (!result.ok) {
    return result;
  }
  const nextResult = fn(result.value);
  if (nextResult.ok && result.warnings) {
    return success(nextResult.value, [...result.warnings, ...(nextResult.warnings ?? [])]);
  }
  return nextResult;
}

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapResult<T>(result: GeometryResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new GeometryOperationError(result.error);
}

/**
 * Extract the value from a result, or return a default
 */
export function unwrapOr<T>(result: GeometryResult<T>, defaultValue: T): T {
  if (result.ok) {
    return result.value;
  }
  return defaultValue;
}
