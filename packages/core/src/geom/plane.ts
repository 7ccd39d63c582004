/**
 * Planes in Hessian normal form
 *
 * A plane is a unit normal plus a signed offset, so that for any point p:
 *   signedDistance(p) = dot(normal, p) - offset
 */

import type { Vec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { sub3, mul3, dot3, cross3, length3, centroid3 } from '../num/vec3.js';
import { covariance3, symmetricEigen3 } from '../num/eigen3.js';

export interface Plane {
  /** Unit normal */
  readonly normal: Vec3;
  /** Signed distance of the plane from the origin along `normal` */
  readonly offset: number;
}

/**
 * Plane through three points, oriented by the right-hand rule (p1 → p2 → p3).
 *
 * Returns null for a degenerate triple: either edge vector from p1, or their
 * cross product, no longer than eps.
 */
export function planeFromThreePoints(p1: Vec3, p2: Vec3, p3: Vec3, ctx: NumericContext): Plane | null {
  const v1 = sub3(p2, p1);
  const v2 = sub3(p3, p1);
  if (length3(v1) <= ctx.tol.length || length3(v2) <= ctx.tol.length) {
    return null;
  }
  const n = cross3(v1, v2);
  const len = length3(n);
  if (len <= ctx.tol.length) {
    return null;
  }
  const normal = mul3(n, 1 / len);
  return { normal, offset: dot3(normal, p1) };
}

export function signedDistanceToPlane(point: Vec3, plane: Plane): number {
  return dot3(plane.normal, point) - plane.offset;
}

export function projectPointToPlane(point: Vec3, plane: Plane): Vec3 {
  return sub3(point, mul3(plane.normal, signedDistanceToPlane(point, plane)));
}

/**
 * Largest absolute distance of any point from the plane (0 for no points)
 */
export function maxPlaneDeviation(points: readonly Vec3[], plane: Plane): number {
  let max = 0;
  for (const p of points) {
    max = Math.max(max, Math.abs(signedDistanceToPlane(p, plane)));
  }
  return max;
}

/**
 * Least-squares plane through a point set.
 *
 * The plane passes through the centroid; its normal is the direction of least
 * variance. Returns null for fewer than three points or when the points are
 * collinear within eps (no second direction of spread). The normal is flipped
 * so that its largest component is positive, which makes the result
 * independent of point order.
 */
export function fitPlaneToPoints(points: readonly Vec3[], ctx: NumericContext): Plane | null {
  if (points.length < 3) {
    return null;
  }
  const center = centroid3(points);
  const { values, vectors } = symmetricEigen3(covariance3(points, center));

  // values[1] is the variance along the second principal axis
  if (Math.sqrt(Math.max(values[1], 0)) <= ctx.tol.length) {
    return null;
  }

  let normal = vectors[0];
  const len = length3(normal);
  if (len === 0) {
    return null;
  }
  normal = mul3(normal, 1 / len);

  let dominant = 0;
  for (let i = 1; i < 3; i++) {
    if (Math.abs(normal[i]) > Math.abs(normal[dominant])) {
      dominant = i;
    }
  }
  if (normal[dominant] < 0) {
    normal = mul3(normal, -1);
  }

  return { normal, offset: dot3(normal, center) };
}
