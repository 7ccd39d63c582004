/**
 * Loose triangles → indexed mesh
 */

import type { Vec3 } from '../num/vec3.js';
import type { GeometryResult } from '../result.js';
import type { LoftMesh, Mesh } from './types.js';
import { add3, cross3, length3, mul3, sub3 } from '../num/vec3.js';
import { resolveTolerance } from '../num/tolerance.js';
import { PointSet } from '../num/pointSet.js';
import { mapResult } from '../result.js';

export interface IndexedMeshOptions {
  /** Vertices closer than this are welded into one (default DEFAULT_TOLERANCES.length) */
  eps?: number;
}

/**
 * Weld a loft's triangles into an indexed mesh.
 *
 * Vertex normals are the area-weighted average of the incident face normals,
 * giving the smooth shading that the softened seams call for. Seam edges are
 * carried over as pairs of welded vertex indices.
 */
export function toIndexedMesh(loft: LoftMesh, options: IndexedMeshOptions = {}): GeometryResult<Mesh> {
  return mapResult(resolveTolerance(options.eps, `loftPaths`), (ctx) => {
    const vertices = new PointSet(ctx);
    const indices: number[] = [];
    const normalSums: Vec3[] = [];

    for (const [a, b, c] of loft.triangles) {
      // Unnormalised: its length is twice the triangle area
      const faceNormal = cross3(sub3(b, a), sub3(c, a));
      for (const corner of [a, b, c]) {
        const idx = vertices.insert(corner);
        normalSums[idx] = add3(normalSums[idx] ?? [0, 0, 0], faceNormal);
        indices.push(idx);
      }
    }

    const seams: number[] = [];
    for (const seam of loft.seamEdges) {
      seams.push(vertices.insert(seam.start), vertices.insert(seam.end));
    }

    const points = vertices.toArray();
    const positions = new Float32Array(points.length * 3);
    const normals = new Float32Array(points.length * 3);
    points.forEach((p, i) => {
      positions.set(p, i * 3);
      const sum = normalSums[i] ?? [0, 0, 0];
      const len = length3(sum);
      if (len > 0) {
        normals.set(mul3(sum, 1 / len), i * 3);
      }
    });

    return {
      positions,
      normals,
      indices: new Uint32Array(indices),
      seamEdges: new Uint32Array(seams),
    };
  });
}
