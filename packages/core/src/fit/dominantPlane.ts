/**
 * Dominant plane fitting (RANSAC-style)
 *
 * Finds the plane supported by the most edge endpoints in a noisy selection
 * and splits the edges into those lying in it and the rest.
 *
 * Candidate planes come from point triples: every triple when the point set
 * is small, otherwise a fixed number of random triples. Each candidate is
 * scored by the number of endpoints within eps of it; the first candidate to
 * reach the best score wins.
 *
 * Known limitation: ties between equally scored planes go to whichever was
 * enumerated first. On symmetric inputs this is an arbitrary but
 * deterministic choice (for the exhaustive branch).
 */

import type { Vec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import type { PRNG } from '../num/random.js';
import type { Plane } from '../geom/plane.js';
import type { Segment3D } from '../geom/line3d.js';
import type { GeometryResult } from '../result.js';
import { cross3, length3, sub3 } from '../num/vec3.js';
import { resolveTolerance } from '../num/tolerance.js';
import { PlaneSamplingSchema } from '../validate/schema.js';
import { sampleDistinctIndices, systemRandom } from '../num/random.js';
import { planeFromThreePoints, signedDistanceToPlane } from '../geom/plane.js';
import {
  chainResult,
  createGeometryError,
  degenerateInputError,
  failure,
  insufficientInputError,
  noSolutionError,
  success,
} from '../result.js';

export interface DominantPlaneOptions {
  /** Inlier distance (default DEFAULT_TOLERANCES.length) */
  eps?: number;
  /** Random triples to try when the point set is too large to enumerate */
  maxSamples?: number;
  /** Largest unique-point count for which every triple is tried */
  exhaustiveLimit?: number;
  /** Random source for the sampled branch (default Math.random) */
  random?: PRNG;
  /** Log candidate counts and the winning score */
  verbose?: boolean;
}

export const DEFAULT_DOMINANT_PLANE_OPTIONS = {
  maxSamples: 400,
  exhaustiveLimit: 12,
} as const;

export interface PlaneFitResult<T> {
  plane: Plane;
  /** Items whose every endpoint lies within eps of the plane */
  inliers: T[];
  outliers: T[];
  /** Endpoints within eps of the plane */
  score: number;
  /** Total endpoint count, the best possible score */
  maxScore: number;
  /** Non-degenerate candidate planes that were scored */
  candidatesTested: number;
}

type Triple = readonly [number, number, number];

interface PlaneSampling {
  maxSamples: number;
  exhaustiveLimit: number;
}

/**
 * Fill the sampling limits from the defaults and reject anything that is not
 * a non-negative integer
 */
function resolveSampling(options: DominantPlaneOptions): GeometryResult<PlaneSampling> {
  const parsed = PlaneSamplingSchema.safeParse({
    maxSamples: options.maxSamples ?? DEFAULT_DOMINANT_PLANE_OPTIONS.maxSamples,
    exhaustiveLimit: options.exhaustiveLimit ?? DEFAULT_DOMINANT_PLANE_OPTIONS.exhaustiveLimit,
  });
  if (parsed.success) {
    return success(parsed.data);
  }

  const names = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
  return failure(
    createGeometryError(
      `toleranceMisconfigured`,
      `${names.join(', ')} must be a non-negative integer`,
      `fitDominantPlane`,
      {
        hints: [{ summary: `Sampling limits must be non-negative integers`, relatedParameters: names }],
        details: { maxSamples: options.maxSamples, exhaustiveLimit: options.exhaustiveLimit },
      }
    )
  );
}

/**
 * Distinct positions in first-seen order (exact coordinate equality)
 */
export function uniquePoints(points: Iterable<Vec3>): Vec3[] {
  const seen = new Set<string>();
  const out: Vec3[] = [];
  for (const p of points) {
    const key = `${p[0]},${p[1]},${p[2]}`;
    if (!seen.has(key)) {
      seen.add(key);
      out.push(p);
    }
  }
  return out;
}

/**
 * Check whether any triple (scanned in index order) spans a plane within eps
 */
export function hasNonCollinearTriple(points: readonly Vec3[], ctx: NumericContext): boolean {
  const eps = ctx.tol.length;
  for (let i = 0; i < points.length - 2; i++) {
    for (let j = i + 1; j < points.length - 1; j++) {
      const v1 = sub3(points[j], points[i]);
      if (length3(v1) <= eps) continue;
      for (let k = j + 1; k < points.length; k++) {
        const v2 = sub3(points[k], points[i]);
        if (length3(v2) <= eps) continue;
        if (length3(cross3(v1, v2)) > eps) return true;
      }
    }
  }
  return false;
}

/**
 * All 3-combinations of [0, n) in lexicographic order
 */
export function allTriples(n: number): Triple[] {
  const triples: Triple[] = [];
  for (let i = 0; i < n - 2; i++) {
    for (let j = i + 1; j < n - 1; j++) {
      for (let k = j + 1; k < n; k++) {
        triples.push([i, j, k]);
      }
    }
  }
  return triples;
}

function sampledTriples(n: number, count: number, rng: PRNG): Triple[] {
  const triples: Triple[] = [];
  for (let s = 0; s < count; s++) {
    const [i, j, k] = sampleDistinctIndices(n, 3, rng);
    triples.push([i, j, k]);
  }
  return triples;
}

function countInlierEndpoints<T>(
  items: readonly T[],
  endpointsOf: (item: T) => readonly Vec3[],
  plane: Plane,
  eps: number
): number {
  let count = 0;
  for (const item of items) {
    for (const p of endpointsOf(item)) {
      if (Math.abs(signedDistanceToPlane(p, plane)) <= eps) count++;
    }
  }
  return count;
}

/**
 * Core fit over any item type that exposes its endpoints
 */
function fitDominant<T>(
  items: readonly T[],
  endpointsOf: (item: T) => readonly Vec3[],
  options: DominantPlaneOptions,
  { maxSamples, exhaustiveLimit }: PlaneSampling,
  ctx: NumericContext
): GeometryResult<PlaneFitResult<T>> {
  const eps = ctx.tol.length;
  const rng = options.random ?? systemRandom;

  const pts = uniquePoints(items.flatMap((item) => [...endpointsOf(item)]));

  if (pts.length < 3) {
    return failure(
      insufficientInputError(`A plane needs at least 3 distinct points, got ${pts.length}`, `fitDominantPlane`, [
        { summary: `Select more edges`, suggestion: `Select at least two non-collinear edges` },
      ])
    );
  }

  if (!hasNonCollinearTriple(pts, ctx)) {
    return failure(
      degenerateInputError(`All ${pts.length} points are collinear within tolerance`, `fitDominantPlane`, [
        {
          summary: `The selection does not span a plane`,
          suggestion: `Add an edge that leaves the common line, or lower the tolerance`,
          relatedParameters: [`eps`],
        },
      ])
    );
  }

  const exhaustive = pts.length <= exhaustiveLimit;
  const candidates = exhaustive ? allTriples(pts.length) : sampledTriples(pts.length, maxSamples, rng);
  const maxScore = items.reduce((sum, item) => sum + endpointsOf(item).length, 0);

  if (options.verbose) {
    console.log(
      `[planeFit] ${pts.length} unique points, ${candidates.length} ${exhaustive ? `exhaustive` : `sampled`} candidates`
    );
  }

  let bestPlane: Plane | null = null;
  let bestScore = -1;
  let tested = 0;

  for (const [i, j, k] of candidates) {
    const plane = planeFromThreePoints(pts[i], pts[j], pts[k], ctx);
    if (!plane) continue;
    tested++;

    const score = countInlierEndpoints(items, endpointsOf, plane, eps);
    if (score > bestScore) {
      bestScore = score;
      bestPlane = plane;
      if (bestScore === maxScore) break;
    }
  }

  // Without a plane every item is an outlier
  if (!bestPlane) {
    return failure(
      noSolutionError(`None of the ${candidates.length} candidate triples spanned a plane`, `fitDominantPlane`, {
        candidates: candidates.length,
        outliers: [...items],
      })
    );
  }

  const plane = bestPlane;
  const inliers: T[] = [];
  const outliers: T[] = [];
  for (const item of items) {
    const inside = endpointsOf(item).every((p) => Math.abs(signedDistanceToPlane(p, plane)) <= eps);
    (inside ? inliers : outliers).push(item);
  }

  if (options.verbose) {
    console.log(
      `[planeFit] best score ${bestScore}/${maxScore} after ${tested} planes: ` +
        `${inliers.length} inliers, ${outliers.length} outliers`
    );
  }

  return success({
    plane,
    inliers,
    outliers,
    score: bestScore,
    maxScore,
    candidatesTested: tested,
  });
}

const segmentEndpoints = (edge: Segment3D): readonly Vec3[] => [edge.start, edge.end];
const pointItself = (p: Vec3): readonly Vec3[] => [p];

/**
 * Fit the plane supported by the most edge endpoints and partition the edges.
 *
 * An edge is an inlier only if both of its endpoints are within eps of the
 * plane.
 */
export function fitDominantPlane(
  edges: readonly Segment3D[],
  options: DominantPlaneOptions = {}
): GeometryResult<PlaneFitResult<Segment3D>> {
  return chainResult(resolveTolerance(options.eps, `fitDominantPlane`), (ctx) =>
    chainResult(resolveSampling(options), (sampling) => fitDominant(edges, segmentEndpoints, options, sampling, ctx))
  );
}

/**
 * Fit the plane supported by the most points and partition the points
 */
export function fitDominantPlaneToPoints(
  points: readonly Vec3[],
  options: DominantPlaneOptions = {}
): GeometryResult<PlaneFitResult<Vec3>> {
  return chainResult(resolveTolerance(options.eps, `fitDominantPlane`), (ctx) =>
    chainResult(resolveSampling(options), (sampling) => fitDominant(points, pointItself, options, sampling, ctx))
  );
}
