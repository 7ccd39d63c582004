/**
 * Path ordering for lofting
 *
 * Curves arrive from a selection in arbitrary order. Before lofting they are
 * chained into a traversal sequence: start at the extreme curve along the
 * axis where the curves are most spread out, then repeatedly step to the
 * nearest unvisited curve.
 */

import type { Vec3 } from '../num/vec3.js';
import type { GeometryResult } from '../result.js';
import type { Path } from './types.js';
import { centroid3, dist3 } from '../num/vec3.js';
import { mapResult } from '../result.js';
import { checkPathSet } from './types.js';

/** Coordinate axis index: 0 = x, 1 = y, 2 = z */
export type Axis = 0 | 1 | 2;

/**
 * Centroid (mean point) of a path
 */
export function pathCentroid(path: Path): Vec3 {
  return centroid3(path);
}

/**
 * Mean distance between corresponding points of two paths.
 *
 * Compares the paths index by index over their shared length, both as given
 * and with `b` read backwards, and returns the smaller mean. This makes the
 * metric blind to the direction each curve was drawn in.
 */
export function meanPathDistance(a: Path, b: Path): number {
  const len = Math.min(a.length, b.length);
  if (len === 0) {
    return 0;
  }

  let sumForward = 0;
  let sumReverse = 0;
  for (let i = 0; i < len; i++) {
    sumForward += dist3(a[i], b[i]);
    sumReverse += dist3(a[i], b[len - 1 - i]);
  }

  return Math.min(sumForward, sumReverse) / len;
}

/**
 * Axis with the largest spread (max - min) of the given points.
 * Ties prefer x, then y.
 */
export function dominantAxis(points: readonly Vec3[]): Axis {
  const range = (axis: Axis): number => {
    let min = Infinity;
    let max = -Infinity;
    for (const p of points) {
      min = Math.min(min, p[axis]);
      max = Math.max(max, p[axis]);
    }
    return max - min;
  };

  const rx = range(0);
  const ry = range(1);
  const rz = range(2);

  if (rx >= ry && rx >= rz) return 0;
  if (ry >= rz) return 1;
  return 2;
}

/**
 * Compute the traversal order of a path set as indices into `paths`.
 *
 * Input must already satisfy checkPathSet; use orderPaths for the checked
 * entry point.
 */
export function greedyPathOrder(paths: readonly Path[]): number[] {
  const centroids = paths.map(pathCentroid);
  const axis = dominantAxis(centroids);

  let start = 0;
  for (let i = 1; i < centroids.length; i++) {
    if (centroids[i][axis] < centroids[start][axis]) {
      start = i;
    }
  }

  const order = [start];
  const remaining = paths.map((_, i) => i).filter((i) => i !== start);

  while (remaining.length > 0) {
    const last = paths[order[order.length - 1]];
    let bestPos = 0;
    let bestDist = meanPathDistance(last, paths[remaining[0]]);
    for (let pos = 1; pos < remaining.length; pos++) {
      const d = meanPathDistance(last, paths[remaining[pos]]);
      if (d < bestDist) {
        bestDist = d;
        bestPos = pos;
      }
    }
    order.push(remaining[bestPos]);
    remaining.splice(bestPos, 1);
  }

  return order;
}

/**
 * Validate a path set and return its traversal order as input indices
 */
export function orderPathIndices(paths: readonly Path[]): GeometryResult<number[]> {
  return mapResult(checkPathSet(paths, `orderPaths`), () => greedyPathOrder(paths));
}

/**
 * Order a path set for lofting.
 *
 * Returns a new array holding the same path objects in traversal order; the
 * input array and the paths themselves are left untouched.
 */
export function orderPaths(paths: readonly Path[]): GeometryResult<Path[]> {
  return mapResult(orderPathIndices(paths), (order) => order.map((i) => paths[i]));
}
