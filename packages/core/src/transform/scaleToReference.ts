/**
 * Scale to a reference length
 *
 * Calibrates an imported drawing or image: the user marks an edge whose real
 * length is known, and the whole group is scaled uniformly so that edge gets
 * that length.
 */

import type { Vec3 } from '../num/vec3.js';
import type { Mat4 } from '../num/mat4.js';
import type { Segment3D } from '../geom/line3d.js';
import type { GeometryResult } from '../result.js';
import { ZERO3 } from '../num/vec3.js';
import { scalingAbout4, transformPoint3 } from '../num/mat4.js';
import { resolveTolerance } from '../num/tolerance.js';
import { segmentLength } from '../geom/line3d.js';
import { chainResult, degenerateInputError, failure, success } from '../result.js';

export interface ScaleToReferenceOptions {
  /** Fixed point of the scaling (default: world origin) */
  anchor?: Vec3;
  /**
   * Transform from the edge's local frame to world space, so the measured
   * length accounts for any scaling the group already carries
   */
  frame?: Mat4;
  eps?: number;
}

export interface ReferenceScale {
  factor: number;
  /** World-space length of the reference edge before scaling */
  currentLength: number;
  /** Uniform scaling about the anchor */
  transform: Mat4;
}

/**
 * Compute the uniform scaling that brings `reference` to `targetLength`
 */
export function scaleToReference(
  reference: Segment3D,
  targetLength: number,
  options: ScaleToReferenceOptions = {}
): GeometryResult<ReferenceScale> {
  return chainResult(resolveTolerance(options.eps, `scaleToReference`), (ctx) => {
    if (!Number.isFinite(targetLength) || targetLength <= 0) {
      return failure(
        degenerateInputError(`Target length must be positive, got ${targetLength}`, `scaleToReference`, [
          { summary: `Enter the real length of the reference edge`, relatedParameters: [`targetLength`] },
        ])
      );
    }

    const world: Segment3D = options.frame
      ? { start: transformPoint3(options.frame, reference.start), end: transformPoint3(options.frame, reference.end) }
      : reference;
    const currentLength = segmentLength(world);

    if (currentLength <= ctx.tol.length) {
      return failure(
        degenerateInputError(`Reference edge has zero length`, `scaleToReference`, [
          { summary: `Pick an edge with a visible length` },
        ])
      );
    }

    const factor = targetLength / currentLength;
    return success({
      factor,
      currentLength,
      transform: scalingAbout4(options.anchor ?? ZERO3, factor),
    });
  });
}
