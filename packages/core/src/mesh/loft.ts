/**
 * Loft mesher
 *
 * Builds a triangulated surface between consecutive paths. Each pair of
 * neighbouring paths is treated as a strip of quads; every quad
 *
 *   p01 ---- p11        left[n+1]   right[n+1]
 *    |     / |
 *    |   /   |
 *   p00 ---- p10        left[n]     right[n]
 *
 * becomes triangles (p00, p10, p11) and (p00, p11, p01) split along the
 * diagonal p00-p11, which is recorded as a seam edge.
 */

import type { NumericContext } from '../num/tolerance.js';
import type { Vec3 } from '../num/vec3.js';
import type { GeometryResult } from '../result.js';
import type { Path } from '../path/types.js';
import type { LoftMesh, SeamEdge, Triangle } from './types.js';
import { dist3 } from '../num/vec3.js';
import { resolveTolerance } from '../num/tolerance.js';
import { planeFromThreePoints } from '../geom/plane.js';
import { chainResult, success } from '../result.js';
import { checkPathSet, reversePath } from '../path/types.js';
import { orderPaths } from '../path/orderPaths.js';
import { asSeamEdgeId } from './types.js';

export interface LoftOptions {
  /** Length tolerance for degenerate triangles (default DEFAULT_TOLERANCES.length) */
  eps?: number;
  /** Log a summary of the generated mesh */
  verbose?: boolean;
}

/**
 * Orient `right` so that it runs the same way as `left`.
 *
 * Only the first point of `left` is consulted: if it is closer to the last
 * point of `right` than to the first, a reversed copy of `right` is returned.
 */
export function alignPath(left: Path, right: Path): Path {
  const dStart = dist3(left[0], right[0]);
  const dEnd = dist3(left[0], right[right.length - 1]);
  return dEnd < dStart ? reversePath(right) : right;
}

/**
 * Check if a triangle has (near) zero area
 */
export function isDegenerateTriangle(a: Vec3, b: Vec3, c: Vec3, ctx: NumericContext): boolean {
  return planeFromThreePoints(a, b, c, ctx) === null;
}

/**
 * Triangulate the strip between two aligned paths of equal length, appending
 * to `out`.
 */
function loftStrip(left: Path, right: Path, ctx: NumericContext, out: LoftMesh): void {
  for (let n = 0; n < left.length - 1; n++) {
    const p00 = left[n];
    const p01 = left[n + 1];
    const p10 = right[n];
    const p11 = right[n + 1];

    const first: Triangle = [p00, p10, p11];
    const second: Triangle = [p00, p11, p01];

    const firstIdx = emit(first, ctx, out);
    const secondIdx = emit(second, ctx, out);

    if (firstIdx !== -1 && secondIdx !== -1) {
      const seam: SeamEdge = {
        id: asSeamEdgeId(out.seamEdges.length),
        start: p00,
        end: p11,
        faces: [firstIdx, secondIdx],
      };
      out.seamEdges.push(seam);
    }
  }
}

function emit(tri: Triangle, ctx: NumericContext, out: LoftMesh): number {
  if (isDegenerateTriangle(tri[0], tri[1], tri[2], ctx)) {
    out.skippedTriangles++;
    return -1;
  }
  out.triangles.push(tri);
  return out.triangles.length - 1;
}

/**
 * Loft an ordered path sequence into triangles.
 *
 * Each path is aligned to its (already aligned) predecessor before the strip
 * between them is built, so a reversal carries forward along the sequence.
 * Degenerate triangles are skipped; a quad that loses a triangle gets no
 * seam edge.
 */
export function loftPaths(orderedPaths: readonly Path[], options: LoftOptions = {}): GeometryResult<LoftMesh> {
  return chainResult(resolveTolerance(options.eps, `loftPaths`), (ctx) =>
    chainResult(checkPathSet(orderedPaths, `loftPaths`), () => {
      const mesh: LoftMesh = { triangles: [], seamEdges: [], skippedTriangles: 0 };

      let left = orderedPaths[0];
      for (let i = 1; i < orderedPaths.length; i++) {
        const right = alignPath(left, orderedPaths[i]);
        loftStrip(left, right, ctx, mesh);
        left = right;
      }

      if (options.verbose) {
        console.log(
          `[loft] ${orderedPaths.length - 1} strips, ${mesh.triangles.length} triangles, ` +
            `${mesh.seamEdges.length} seams, ${mesh.skippedTriangles} degenerate`
        );
      }

      const warnings =
        mesh.skippedTriangles > 0
          ? [`Skipped ${mesh.skippedTriangles} degenerate triangle(s)`]
          : undefined;
      return success(mesh, warnings);
    })
  );
}

/**
 * Order a set of curves and loft faces between them
 */
export function loftCurves(paths: readonly Path[], options: LoftOptions = {}): GeometryResult<LoftMesh> {
  return chainResult(orderPaths(paths), (ordered) => loftPaths(ordered, options));
}
