/**
 * Typed parsers for host-supplied geometry
 */

import type { Vec3 } from '../num/vec3.js';
import type { Line3D, Segment3D } from '../geom/line3d.js';
import type { Path } from '../path/types.js';
import type { LinearEntity } from '../intersect/lineLine.js';
import type { GeometryResult } from '../result.js';
import {
  LineListSchema,
  LinearEntityListSchema,
  PathListSchema,
  PointListSchema,
  SegmentListSchema,
  parseWith,
} from './schema.js';

export function parsePaths(input: unknown): GeometryResult<Path[]> {
  return parseWith(PathListSchema, input, `orderPaths`);
}

export function parseSegments(input: unknown): GeometryResult<Segment3D[]> {
  return parseWith(SegmentListSchema, input, `validate`);
}

export function parseLines(input: unknown): GeometryResult<Line3D[]> {
  return parseWith(LineListSchema, input, `findIntersections`);
}

export function parsePoints(input: unknown): GeometryResult<Vec3[]> {
  return parseWith(PointListSchema, input, `validate`);
}

export function parseEntities(input: unknown): GeometryResult<LinearEntity[]> {
  return parseWith(LinearEntityListSchema, input, `findIntersections`);
}
