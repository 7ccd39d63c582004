/**
 * 3D vector operations
 *
 * Vectors and points share one representation: a readonly tuple [x, y, z].
 * All operations are pure functions and return new tuples; nothing here
 * mutates its arguments.
 */

import type { NumericContext } from './tolerance.js';

export type Vec3 = readonly [number, number, number];

/**
 * Create a 3D vector
 */
export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

/**
 * Zero vector
 */
export const ZERO3: Vec3 = [0, 0, 0];

/**
 * Unit vectors along axes
 */
export const X_AXIS: Vec3 = [1, 0, 0];
export const Y_AXIS: Vec3 = [0, 1, 0];
export const Z_AXIS: Vec3 = [0, 0, 1];

/**
 * Add two vectors: a + b
 */
export function add3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/**
 * Subtract two vectors: a - b
 */
export function sub3(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

/**
 * Multiply vector by scalar: v * s
 */
export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/**
 * Dot product: a · b
 */
export function dot3(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

/**
 * Cross product: a × b
 */
export function cross3(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/**
 * Squared length of vector
 */
export function lengthSq3(v: Vec3): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2];
}

/**
 * Length of vector
 */
export function length3(v: Vec3): number {
  return Math.sqrt(lengthSq3(v));
}

/**
 * Normalize vector to unit length.
 *
 * Returns null when the length is within the context's length tolerance,
 * since such a vector has no meaningful direction.
 */
export function tryNormalize3(v: Vec3, ctx: NumericContext): Vec3 | null {
  const len = length3(v);
  if (len <= ctx.tol.length || len === 0) {
    return null;
  }
  return [v[0] / len, v[1] / len, v[2] / len];
}

/**
 * Distance between two points
 */
export function dist3(a: Vec3, b: Vec3): number {
  return length3(sub3(a, b));
}

/**
 * Linear interpolation: a + (b - a) * t
 */
export function lerp3(a: Vec3, b: Vec3, t: number): Vec3 {
  return [
    a[0] + (b[0] - a[0]) * t,
    a[1] + (b[1] - a[1]) * t,
    a[2] + (b[2] - a[2]) * t,
  ];
}

/**
 * Midpoint of two points
 */
export function midpoint3(a: Vec3, b: Vec3): Vec3 {
  return lerp3(a, b, 0.5);
}

/**
 * Arithmetic mean of a non-empty point list
 */
export function centroid3(points: readonly Vec3[]): Vec3 {
  let sx = 0;
  let sy = 0;
  let sz = 0;
  for (const p of points) {
    sx += p[0];
    sy += p[1];
    sz += p[2];
  }
  const n = points.length;
  return [sx / n, sy / n, sz / n];
}

/**
 * Exact component-wise equality
 */
export function equals3(a: Vec3, b: Vec3): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}
