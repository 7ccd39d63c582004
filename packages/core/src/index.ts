/**
 * @edgekit/core - geometry kernel for CAD host tools
 *
 * Pure functions over in-memory values; the host supplies points, lines,
 * edges and sampled curves and applies the results inside its own undoable
 * operation.
 *
 * ## Operations
 * - orderPaths / loftPaths / loftCurves: loft faces between curves
 * - fitDominantPlane: RANSAC-style plane fit with inlier/outlier partition
 * - computeEdgeNormals: in-plane perpendicular lines for coplanar edges
 * - findIntersections: deduplicated line/segment intersection markers
 * - scaleToReference: uniform scale from a reference edge
 *
 * Every operation returns a GeometryResult and takes its tolerance (eps)
 * explicitly; DEFAULT_TOLERANCES applies only when eps is omitted.
 */

// =============================================================================
// Results and errors
// =============================================================================
export * from './result.js';

// =============================================================================
// num: numeric backbone & tolerances
// =============================================================================
export * from './num/vec3.js';
export * from './num/mat4.js';
export * from './num/tolerance.js';
export * from './num/predicates.js';
export * from './num/eigen3.js';
export * from './num/random.js';
export { PointSet } from './num/pointSet.js';

// =============================================================================
// geom: lines, segments, planes
// =============================================================================
export * from './geom/line3d.js';
export * from './geom/plane.js';

// =============================================================================
// Path ordering and lofting
// =============================================================================
export { type Path, checkPathSet, reversePath } from './path/types.js';
export {
  type Axis,
  pathCentroid,
  meanPathDistance,
  dominantAxis,
  greedyPathOrder,
  orderPathIndices,
  orderPaths,
} from './path/orderPaths.js';
export * from './mesh/types.js';
export { type LoftOptions, alignPath, isDegenerateTriangle, loftPaths, loftCurves } from './mesh/loft.js';
export { type IndexedMeshOptions, toIndexedMesh } from './mesh/indexedMesh.js';

// =============================================================================
// Plane fitting
// =============================================================================
export {
  type DominantPlaneOptions,
  type PlaneFitResult,
  DEFAULT_DOMINANT_PLANE_OPTIONS,
  uniquePoints,
  hasNonCollinearTriple,
  allTriples,
  fitDominantPlane,
  fitDominantPlaneToPoints,
} from './fit/dominantPlane.js';
export {
  type EdgeNormalsOptions,
  type EdgeNormalsResult,
  inPlaneNormalLine,
  computeEdgeNormals,
} from './fit/edgeNormals.js';

// =============================================================================
// Intersections
// =============================================================================
export * from './intersect/lineLine.js';
export * from './intersect/findIntersections.js';

// =============================================================================
// Transforms
// =============================================================================
export * from './transform/scaleToReference.js';

// =============================================================================
// Host input validation
// =============================================================================
export * from './validate/schema.js';
export * from './validate/parse.js';
