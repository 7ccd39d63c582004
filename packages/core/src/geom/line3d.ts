/**
 * 3D lines and segments
 *
 * A Line3D is infinite (an anchor plus a non-zero direction); a Segment3D is
 * the finite edge between two points. Hosts hand over construction lines as
 * Line3D and model edges as Segment3D.
 */

import type { Vec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { add3, sub3, mul3, dot3, dist3 } from '../num/vec3.js';
import { isParallel3 } from '../num/predicates.js';

/**
 * Infinite line through `origin` along `direction`
 */
export interface Line3D {
  readonly origin: Vec3;
  readonly direction: Vec3;
}

/**
 * Finite segment (edge) between two points
 */
export interface Segment3D {
  readonly start: Vec3;
  readonly end: Vec3;
}

export function line3(origin: Vec3, direction: Vec3): Line3D {
  return { origin, direction };
}

export function segment3(start: Vec3, end: Vec3): Segment3D {
  return { start, end };
}

export function segmentLength(seg: Segment3D): number {
  return dist3(seg.start, seg.end);
}

/**
 * Supporting line of a segment, directed start → end
 */
export function lineFromSegment(seg: Segment3D): Line3D {
  return { origin: seg.start, direction: sub3(seg.end, seg.start) };
}

/**
 * Point at parameter t along the line: origin + direction * t
 */
export function pointOnLineAt(line: Line3D, t: number): Vec3 {
  return add3(line.origin, mul3(line.direction, t));
}

/**
 * Orthogonal projection of a point onto a line.
 * A zero direction projects everything onto the origin.
 */
export function closestPointOnLine(point: Vec3, line: Line3D): Vec3 {
  const dd = dot3(line.direction, line.direction);
  if (dd === 0) {
    return line.origin;
  }
  const t = dot3(sub3(point, line.origin), line.direction) / dd;
  return pointOnLineAt(line, t);
}

/**
 * Closest points between two infinite lines.
 *
 * Returns [pointOnL1, pointOnL2], or null when the lines are parallel
 * (their closest points are not unique).
 */
export function closestPointsBetweenLines(
  l1: Line3D,
  l2: Line3D,
  ctx: NumericContext
): [Vec3, Vec3] | null {
  if (isParallel3(l1.direction, l2.direction, ctx)) {
    return null;
  }

  const d1 = l1.direction;
  const d2 = l2.direction;
  const w0 = sub3(l1.origin, l2.origin);

  const a = dot3(d1, d1);
  const b = dot3(d1, d2);
  const c = dot3(d2, d2);
  const d = dot3(d1, w0);
  const e = dot3(d2, w0);

  // Zero for a zero-length direction as well as for exact parallels
  const denom = a * c - b * b;
  if (denom === 0) {
    return null;
  }

  const s = (b * e - c * d) / denom;
  const t = (a * e - b * d) / denom;
  return [pointOnLineAt(l1, s), pointOnLineAt(l2, t)];
}
