/**
 * Sampled curve paths
 */

import type { Vec3 } from '../num/vec3.js';
import type { GeometryOperationType, GeometryResult } from '../result.js';
import { failure, insufficientInputError, mismatchedLengthError, success } from '../result.js';

/**
 * Ordered point sequence sampled from a curve (at least two points)
 */
export type Path = readonly Vec3[];

/**
 * Check the shared preconditions of ordering and lofting: at least two
 * paths, at least two points each, and one common point count.
 *
 * Returns the common point count.
 */
export function checkPathSet(paths: readonly Path[], operation: GeometryOperationType): GeometryResult<number> {
  if (paths.length < 2) {
    return failure(
      insufficientInputError(`At least two curves are required, got ${paths.length}`, operation, [
        { summary: `Select at least two curves or arcs` },
      ])
    );
  }

  const expected = paths[0].length;
  if (expected < 2) {
    return failure(
      insufficientInputError(`Each curve needs at least two points, got ${expected}`, operation)
    );
  }

  const mismatched = paths.findIndex((path) => path.length !== expected);
  if (mismatched !== -1) {
    return failure(
      mismatchedLengthError(
        `Not all curves have the same segment count (path 0 has ${expected} points, path ${mismatched} has ${paths[mismatched].length})`,
        operation,
        { expected, index: mismatched, actual: paths[mismatched].length }
      )
    );
  }

  return success(expected);
}

/**
 * Reversed copy of a path
 */
export function reversePath(path: Path): Path {
  return [...path].reverse();
}
