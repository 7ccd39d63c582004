/**
 * In-plane edge normals
 *
 * For a set of (roughly) coplanar edges, produce one construction line per
 * edge: through the edge midpoint, perpendicular to the edge, and lying in
 * the edges' plane. When the selection is not coplanar within eps it is
 * first trimmed to its dominant plane.
 */

import type { Vec3 } from '../num/vec3.js';
import type { Mat4 } from '../num/mat4.js';
import type { NumericContext } from '../num/tolerance.js';
import type { Line3D, Segment3D } from '../geom/line3d.js';
import type { Plane } from '../geom/plane.js';
import type { GeometryResult } from '../result.js';
import type { DominantPlaneOptions } from './dominantPlane.js';
import { cross3, length3, midpoint3, sub3, tryNormalize3 } from '../num/vec3.js';
import { transformDirection3, transformPoint3 } from '../num/mat4.js';
import { resolveTolerance } from '../num/tolerance.js';
import { fitPlaneToPoints, maxPlaneDeviation } from '../geom/plane.js';
import {
  chainResult,
  degenerateInputError,
  failure,
  insufficientInputError,
  noSolutionError,
  success,
} from '../result.js';
import { fitDominantPlane, uniquePoints } from './dominantPlane.js';

export interface EdgeNormalsOptions extends DominantPlaneOptions {
  /**
   * Map the output lines into another frame, e.g. from a group's local
   * coordinates to world coordinates.
   */
  transform?: Mat4;
}

export interface EdgeNormalsResult {
  /** Least-squares plane of the edges that were used */
  plane: Plane;
  /** One line per usable edge, in edge order */
  lines: Line3D[];
  /** Edges the lines were built from (after trimming) */
  edges: Segment3D[];
  /** Set when the selection had to be trimmed to its dominant plane */
  trim: { kept: number; removed: number } | null;
  /** Edges skipped for being shorter than eps or parallel to the normal */
  skippedEdges: number;
}

const endpointsOf = (edges: readonly Segment3D[]): Vec3[] =>
  uniquePoints(edges.flatMap((e) => [e.start, e.end]));

/**
 * Construction line through the edge midpoint along normal × edge, or null
 * when the edge is too short or the cross product vanishes
 */
export function inPlaneNormalLine(edge: Segment3D, normal: Vec3, ctx: NumericContext): Line3D | null {
  const v = sub3(edge.end, edge.start);
  if (length3(v) <= ctx.tol.length) {
    return null;
  }
  const dir = tryNormalize3(cross3(normal, v), ctx);
  if (!dir) {
    return null;
  }
  return { origin: midpoint3(edge.start, edge.end), direction: dir };
}

function transformLine(line: Line3D, m: Mat4, ctx: NumericContext): Line3D | null {
  const direction = tryNormalize3(transformDirection3(m, line.direction), ctx);
  if (!direction) {
    return null;
  }
  return { origin: transformPoint3(m, line.origin), direction };
}

/**
 * Build in-plane perpendicular construction lines for a set of edges
 */
export function computeEdgeNormals(
  edges: readonly Segment3D[],
  options: EdgeNormalsOptions = {}
): GeometryResult<EdgeNormalsResult> {
  return chainResult(resolveTolerance(options.eps, `edgeNormals`), (ctx) => {
    if (edges.length === 0) {
      return failure(
        insufficientInputError(`No edges given`, `edgeNormals`, [{ summary: `Select one or more edges` }])
      );
    }

    const initial = fitPlaneToPoints(endpointsOf(edges), ctx);
    if (!initial) {
      return failure(
        degenerateInputError(`The edges do not span a plane`, `edgeNormals`, [
          { summary: `All selected edges lie on one line`, suggestion: `Select edges that span a plane` },
        ])
      );
    }

    let used: readonly Segment3D[] = edges;
    let plane = initial;
    let trim: EdgeNormalsResult['trim'] = null;
    const warnings: string[] = [];

    if (maxPlaneDeviation(endpointsOf(edges), initial) > ctx.tol.length) {
      const dominant = fitDominantPlane(edges, { ...options, eps: ctx.tol.length });
      if (!dominant.ok) {
        return dominant;
      }
      const { inliers, outliers } = dominant.value;
      if (inliers.length === 0) {
        return failure(
          noSolutionError(`No coplanar subset found within tolerance (eps = ${ctx.tol.length})`, `edgeNormals`, {
            eps: ctx.tol.length,
          })
        );
      }

      trim = { kept: inliers.length, removed: outliers.length };
      warnings.push(
        `Trimmed selection to coplanar edges: kept ${inliers.length}, removed ${outliers.length} (eps = ${ctx.tol.length})`
      );
      used = inliers;
      // A lone inlier edge cannot define a plane by itself
      plane = fitPlaneToPoints(endpointsOf(inliers), ctx) ?? dominant.value.plane;
    }

    const lines: Line3D[] = [];
    const usedEdges: Segment3D[] = [];
    let skipped = 0;

    for (const edge of used) {
      const local = inPlaneNormalLine(edge, plane.normal, ctx);
      const line = local && options.transform ? transformLine(local, options.transform, ctx) : local;
      if (!line) {
        skipped++;
        continue;
      }
      lines.push(line);
      usedEdges.push(edge);
    }

    return success({ plane, lines, edges: usedEdges, trim, skippedEdges: skipped }, warnings);
  });
}
