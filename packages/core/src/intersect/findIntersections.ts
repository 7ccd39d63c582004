/**
 * Batch intersection marking
 *
 * Tests every pair of the given lines/segments once and collects the
 * crossing points that are not already marked. The point set is seeded with
 * the markers the host already has, so running the search again over the
 * same selection adds nothing.
 */

import type { Vec3 } from '../num/vec3.js';
import type { Line3D, Segment3D } from '../geom/line3d.js';
import type { GeometryResult } from '../result.js';
import type { LinearEntity } from './lineLine.js';
import { resolveTolerance } from '../num/tolerance.js';
import { PointSet } from '../num/pointSet.js';
import { chainResult, failure, insufficientInputError, success } from '../result.js';
import { intersectEntities, isDegenerateEntity, lineEntity, segmentEntity } from './lineLine.js';

export interface FindIntersectionsOptions {
  /** Coincidence and near-intersection distance (default DEFAULT_TOLERANCES.length) */
  eps?: number;
  /** Markers already present in the target context */
  knownPoints?: Iterable<Vec3>;
  /** Log pair and point counts */
  verbose?: boolean;
}

export interface IntersectionReport {
  /** Newly found points, in discovery order */
  points: Vec3[];
  /** Input index pairs (i < j) of collinear entities that overlap */
  overlaps: Array<readonly [number, number]>;
  /** Intersections dropped because a marker already existed within eps */
  duplicates: number;
  pairsTested: number;
}

/**
 * Find the deduplicated intersection points of a set of lines and segments
 */
export function findIntersections(
  entities: readonly LinearEntity[],
  options: FindIntersectionsOptions = {}
): GeometryResult<IntersectionReport> {
  return chainResult(resolveTolerance(options.eps, `findIntersections`), (ctx) => {
    const usable: number[] = [];
    const dropped: number[] = [];
    entities.forEach((entity, i) => {
      (isDegenerateEntity(entity, ctx) ? dropped : usable).push(i);
    });

    if (usable.length < 2) {
      return failure(
        insufficientInputError(
          `At least two usable lines are required, got ${usable.length} of ${entities.length}`,
          `findIntersections`,
          [{ summary: `Select at least two construction lines or edges` }]
        )
      );
    }

    const known = new PointSet(ctx, options.knownPoints ?? []);
    const points: Vec3[] = [];
    const overlaps: Array<readonly [number, number]> = [];
    let duplicates = 0;
    let pairsTested = 0;

    for (let a = 0; a < usable.length - 1; a++) {
      for (let b = a + 1; b < usable.length; b++) {
        const i = usable[a];
        const j = usable[b];
        pairsTested++;

        const hit = intersectEntities(entities[i], entities[j], ctx);
        if (hit.kind === 'overlap') {
          overlaps.push([i, j]);
        } else if (hit.kind === 'point') {
          if (known.add(hit.point)) {
            points.push(hit.point);
          } else {
            duplicates++;
          }
        }
      }
    }

    if (options.verbose) {
      console.log(
        `[intersect] ${pairsTested} pairs, ${points.length} new points, ` +
          `${duplicates} duplicates, ${overlaps.length} overlaps`
      );
    }

    const warnings =
      dropped.length > 0
        ? [`Ignored ${dropped.length} zero-length line(s) at index ${dropped.join(', ')}`]
        : undefined;
    return success({ points, overlaps, duplicates, pairsTested }, warnings);
  });
}

/**
 * Find intersections among infinite lines (construction lines)
 */
export function findLineIntersections(
  lines: readonly Line3D[],
  options: FindIntersectionsOptions = {}
): GeometryResult<IntersectionReport> {
  return findIntersections(lines.map(lineEntity), options);
}

/**
 * Find intersections among finite segments (edges)
 */
export function findSegmentIntersections(
  segments: readonly Segment3D[],
  options: FindIntersectionsOptions = {}
): GeometryResult<IntersectionReport> {
  return findIntersections(segments.map(segmentEntity), options);
}
