/**
 * Line and segment intersection in 3D
 *
 * Two infinite lines either meet exactly (coplanar, not parallel), pass
 * within eps of each other (skew, reported as a "near" intersection at the
 * midpoint of their closest points), or miss. Segments additionally require
 * the point to lie on both finite extents, and collinear overlapping
 * segments are reported as an overlap rather than as a crossing.
 */

import type { Vec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Line3D, Segment3D } from '../geom/line3d.js';
import { add3, dist3, dot3, length3, midpoint3, mul3, sub3, tryNormalize3 } from '../num/vec3.js';
import { isParallel3, isPointOnLine3D, isPointOnSegment3D, linesAreCoplanar } from '../num/predicates.js';
import { closestPointsBetweenLines, lineFromSegment, segmentLength } from '../geom/line3d.js';

/**
 * Either an infinite line or a finite segment
 */
export type LinearEntity =
  | { kind: 'line'; line: Line3D }
  | { kind: 'segment'; segment: Segment3D };

export type MissReason = 'degenerate' | 'parallel' | 'skew' | 'outsideExtent';

/**
 * Result of intersecting two infinite lines
 */
export type LineHit =
  | { kind: 'point'; point: Vec3; exact: boolean; gap: number }
  | { kind: 'none'; reason: Exclude<MissReason, 'outsideExtent'> };

/**
 * Result of intersecting two linear entities
 */
export type EntityHit =
  | { kind: 'point'; point: Vec3; exact: boolean }
  /** Collinear and sharing points. `extent` is null when both are infinite lines. */
  | { kind: 'overlap'; extent: readonly [Vec3, Vec3] | null }
  | { kind: 'none'; reason: MissReason };

export function lineEntity(line: Line3D): LinearEntity {
  return { kind: 'line', line };
}

export function segmentEntity(segment: Segment3D): LinearEntity {
  return { kind: 'segment', segment };
}

/**
 * Supporting line of an entity
 */
export function supportLine(entity: LinearEntity): Line3D {
  return entity.kind === 'line' ? entity.line : lineFromSegment(entity.segment);
}

/**
 * Check if an entity is unusable: a line with a zero direction, or a segment
 * no longer than eps. A line's direction only fixes its heading, so any
 * non-zero length is accepted.
 */
export function isDegenerateEntity(entity: LinearEntity, ctx: NumericContext): boolean {
  return entity.kind === 'line'
    ? length3(entity.line.direction) === 0
    : segmentLength(entity.segment) <= ctx.tol.length;
}

/**
 * Check if a point lies on an entity (on the extent, for segments)
 */
export function entityContains(entity: LinearEntity, point: Vec3, ctx: NumericContext): boolean {
  return entity.kind === 'line'
    ? isPointOnLine3D(point, entity.line, ctx)
    : isPointOnSegment3D(point, entity.segment, ctx);
}

/**
 * Intersect two infinite lines
 */
export function intersectLines(l1: Line3D, l2: Line3D, ctx: NumericContext): LineHit {
  if (length3(l1.direction) === 0 || length3(l2.direction) === 0) {
    return { kind: 'none', reason: 'degenerate' };
  }

  const closest = closestPointsBetweenLines(l1, l2, ctx);
  if (!closest) {
    return { kind: 'none', reason: 'parallel' };
  }

  const [p1, p2] = closest;
  const gap = dist3(p1, p2);

  if (gap > ctx.tol.length) {
    return { kind: 'none', reason: 'skew' };
  }
  // add3 in linesAreCoplanar can round back onto a far-off origin, so it only
  // picks the hit form here
  if (linesAreCoplanar(l1, l2)) {
    return { kind: 'point', point: p1, exact: true, gap };
  }
  return { kind: 'point', point: midpoint3(p1, p2), exact: false, gap };
}

// Shared part of two collinear segments, measured along the first one
function collinearSegmentOverlap(s1: Segment3D, s2: Segment3D, ctx: NumericContext): EntityHit {
  const length = segmentLength(s1);
  const u = tryNormalize3(sub3(s1.end, s1.start), ctx);
  if (!u) {
    return { kind: 'none', reason: 'degenerate' };
  }

  const ta = dot3(sub3(s2.start, s1.start), u);
  const tb = dot3(sub3(s2.end, s1.start), u);
  const lo = Math.max(0, Math.min(ta, tb));
  const hi = Math.min(length, Math.max(ta, tb));

  if (lo > hi + ctx.tol.length) {
    return { kind: 'none', reason: 'parallel' };
  }
  const end = Math.max(lo, hi);
  return {
    kind: 'overlap',
    extent: [add3(s1.start, mul3(u, lo)), add3(s1.start, mul3(u, end))],
  };
}

function collinearOverlap(a: LinearEntity, b: LinearEntity, ctx: NumericContext): EntityHit {
  if (a.kind === 'segment' && b.kind === 'segment') {
    return collinearSegmentOverlap(a.segment, b.segment, ctx);
  }
  if (a.kind === 'segment') {
    return { kind: 'overlap', extent: [a.segment.start, a.segment.end] };
  }
  if (b.kind === 'segment') {
    return { kind: 'overlap', extent: [b.segment.start, b.segment.end] };
  }
  return { kind: 'overlap', extent: null };
}

/**
 * Intersect two linear entities (any mix of lines and segments)
 */
export function intersectEntities(a: LinearEntity, b: LinearEntity, ctx: NumericContext): EntityHit {
  if (isDegenerateEntity(a, ctx) || isDegenerateEntity(b, ctx)) {
    return { kind: 'none', reason: 'degenerate' };
  }

  const la = supportLine(a);
  const lb = supportLine(b);

  if (isParallel3(la.direction, lb.direction, ctx)) {
    if (!isPointOnLine3D(lb.origin, la, ctx)) {
      return { kind: 'none', reason: 'parallel' };
    }
    return collinearOverlap(a, b, ctx);
  }

  const hit = intersectLines(la, lb, ctx);
  if (hit.kind === 'none') {
    return hit;
  }
  if (!entityContains(a, hit.point, ctx) || !entityContains(b, hit.point, ctx)) {
    return { kind: 'none', reason: 'outsideExtent' };
  }
  return { kind: 'point', point: hit.point, exact: hit.exact };
}

/**
 * Intersect two finite segments
 */
export function intersectSegments(s1: Segment3D, s2: Segment3D, ctx: NumericContext): EntityHit {
  return intersectEntities(segmentEntity(s1), segmentEntity(s2), ctx);
}
