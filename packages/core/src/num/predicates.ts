/**
 * Geometric predicates
 *
 * Classification tests for directions, points and lines. Exact coplanarity
 * uses Shewchuk-style adaptive precision via mourner/robust-predicates; every
 * other test is tolerance-aware and takes a NumericContext.
 */

import type { Vec3 } from './vec3.js';
import type { NumericContext } from './tolerance.js';
import type { Line3D, Segment3D } from '../geom/line3d.js';
import { add3, cross3, dist3, length3, mul3, sub3 } from './vec3.js';
import { orient3d as robustOrient3d } from 'robust-predicates';

/**
 * 3D orientation test using ROBUST predicates (Shewchuk)
 *
 * Returns the exact sign of the determinant for orient3d:
 * - positive (>0): d is above the plane through a, b, c
 * - negative (<0): d is below the plane
 * - zero (0): d is coplanar with a, b, c
 *
 * Note: robust-predicates uses the opposite sign convention, so we negate the result.
 */
export function orient3DRobust(a: Vec3, b: Vec3, c: Vec3, d: Vec3): number {
  return -robustOrient3d(
    a[0], a[1], a[2],
    b[0], b[1], b[2],
    c[0], c[1], c[2],
    d[0], d[1], d[2]
  );
}

// Unit vector, or null for an exact zero vector. Parallelism is decided on
// unit vectors so that it does not depend on how long the directions are.
function unit3(v: Vec3): Vec3 | null {
  const len = length3(v);
  return len === 0 ? null : mul3(v, 1 / len);
}

/**
 * Check if two directions are parallel (or anti-parallel).
 *
 * True iff |û × v̂| ≤ eps. A zero vector is not parallel to anything.
 */
export function isParallel3(u: Vec3, v: Vec3, ctx: NumericContext): boolean {
  const uu = unit3(u);
  const vv = unit3(v);
  if (!uu || !vv) {
    return false;
  }
  return length3(cross3(uu, vv)) <= ctx.tol.length;
}

/**
 * Check if a point lies on a segment.
 *
 * Uses the degenerate triangle inequality:
 * |dist(p, start) + dist(p, end) - length| ≤ eps
 */
export function isPointOnSegment3D(point: Vec3, seg: Segment3D, ctx: NumericContext): boolean {
  const length = dist3(seg.start, seg.end);
  const slack = dist3(point, seg.start) + dist3(point, seg.end) - length;
  return Math.abs(slack) <= ctx.tol.length;
}

/**
 * Check if a point lies within eps of an infinite line
 */
export function isPointOnLine3D(point: Vec3, line: Line3D, ctx: NumericContext): boolean {
  const dir = unit3(line.direction);
  if (!dir) {
    return dist3(point, line.origin) <= ctx.tol.length;
  }
  const offset = cross3(sub3(point, line.origin), dir);
  return length3(offset) <= ctx.tol.length;
}

/**
 * Exact coplanarity of two lines (no tolerance)
 */
export function linesAreCoplanar(l1: Line3D, l2: Line3D): boolean {
  return (
    orient3DRobust(
      l1.origin,
      add3(l1.origin, l1.direction),
      l2.origin,
      add3(l2.origin, l2.direction)
    ) === 0
  );
}
