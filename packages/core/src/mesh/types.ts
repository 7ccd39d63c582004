/**
 * Mesh types
 *
 * The loft mesher works on loose triangles; hosts that build faces from
 * shared vertices (and renderers) take the indexed form below instead.
 */

import type { Vec3 } from '../num/vec3.js';

/**
 * Triangle as three corner points
 */
export type Triangle = readonly [Vec3, Vec3, Vec3];

/**
 * Branded type for seam edge identifiers
 */
export type SeamEdgeId = number & { __brand: 'SeamEdgeId' };

/**
 * Create a SeamEdgeId from a number
 * @internal
 */
export function asSeamEdgeId(id: number): SeamEdgeId {
  return id as SeamEdgeId;
}

/**
 * Diagonal shared by the two triangles of one quad. Hosts soften, smooth and
 * hide it so that the quad reads as a single surface.
 */
export interface SeamEdge {
  id: SeamEdgeId;
  start: Vec3;
  end: Vec3;
  /** Indices of the two triangles sharing this edge */
  faces: readonly [number, number];
}

/**
 * Result of lofting a path sequence
 */
export interface LoftMesh {
  triangles: Triangle[];
  seamEdges: SeamEdge[];
  /** Degenerate (zero-area) triangles that were not emitted */
  skippedTriangles: number;
}

/**
 * Indexed triangle mesh
 *
 * - positions: vertex positions (xyzxyz...)
 * - normals: vertex normals (xyzxyz...), same length as positions
 * - indices: triangle indices (abc, abc, ...)
 * - seamEdges: vertex index pairs of seam edges (ab, ab, ...)
 */
export interface Mesh {
  positions: Float32Array;
  normals: Float32Array;
  indices: Uint32Array;
  seamEdges: Uint32Array;
}

/**
 * Get the number of vertices in a mesh
 */
export function getMeshVertexCount(mesh: Mesh): number {
  return mesh.positions.length / 3;
}

/**
 * Get the number of triangles in a mesh
 */
export function getMeshTriangleCount(mesh: Mesh): number {
  return mesh.indices.length / 3;
}
