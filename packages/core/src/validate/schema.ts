/**
 * Host Input Validation - Zod Schemas
 *
 * The host hands geometry over as plain data (often straight from a plugin
 * bridge as JSON). These schemas check that shape before any of it reaches the
 * geometry layer, which assumes finite coordinates throughout.
 */

import { z } from 'zod';
import type { GeometryOperationType, GeometryResult } from '../result.js';
import { createGeometryError, failure, success } from '../result.js';

// ============================================================================
// Shared Primitives
// ============================================================================

export const FiniteNumber = z.number().finite();

export const Vec3Schema = z.tuple([FiniteNumber, FiniteNumber, FiniteNumber]);

export const ToleranceSchema = FiniteNumber.nonnegative();

export const SampleCountSchema = z.number().int().nonnegative();

export const PlaneSamplingSchema = z.object({
  maxSamples: SampleCountSchema,
  exhaustiveLimit: SampleCountSchema,
});

// ============================================================================
// Geometric Values
// ============================================================================

export const SegmentSchema = z.object({
  start: Vec3Schema,
  end: Vec3Schema,
});

export const LineSchema = z.object({
  origin: Vec3Schema,
  direction: Vec3Schema,
});

export const PathSchema = z.array(Vec3Schema).min(2);

export const LinearEntitySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('line'), line: LineSchema }),
  z.object({ kind: z.literal('segment'), segment: SegmentSchema }),
]);

export const PathListSchema = z.array(PathSchema);
export const SegmentListSchema = z.array(SegmentSchema);
export const LineListSchema = z.array(LineSchema);
export const PointListSchema = z.array(Vec3Schema);
export const LinearEntityListSchema = z.array(LinearEntitySchema);

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse unknown host data against a schema.
 *
 * Length issues ("too small") are reported as insufficientInput, anything
 * else (wrong shape, NaN or infinite coordinates) as degenerateInput.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  operation: GeometryOperationType
): GeometryResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return success(result.data);
  }

  const issues = result.error.issues;
  const errors = issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  const tooSmall = issues.some((issue) => issue.code === 'too_small');

  return failure(
    createGeometryError(
      tooSmall ? `insufficientInput` : `degenerateInput`,
      `Invalid input: ${errors.join('; ')}`,
      operation,
      { details: { issues: errors } }
    )
  );
}
