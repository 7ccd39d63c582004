/**
 * 4x4 affine transform operations
 *
 * Matrices are represented as 16-element arrays in column-major order:
 * [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 *
 * This matches the layout most CAD hosts and graphics libraries hand out, so a
 * host's edit transform can be passed through unchanged. All operations are
 * pure functions.
 */

import type { Vec3 } from './vec3.js';

export type Mat4 = readonly [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/**
 * Identity matrix
 */
export function identity4(): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/**
 * Multiply two matrices: A * B (B is applied first)
 */
export function mul4(a: Mat4, b: Mat4): Mat4 {
  const r: number[] = new Array<number>(16).fill(0);
  for (let i = 0; i < 4; i++) {
    for (let j = 0; j < 4; j++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[i + k * 4] * b[k + j * 4];
      }
      r[i + j * 4] = sum;
    }
  }
  return [
    r[0], r[1], r[2], r[3],
    r[4], r[5], r[6], r[7],
    r[8], r[9], r[10], r[11],
    r[12], r[13], r[14], r[15],
  ];
}

/**
 * Translation by t
 */
export function translation4(t: Vec3): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    t[0], t[1], t[2], 1,
  ];
}

/**
 * Uniform scaling about a fixed point
 */
export function scalingAbout4(anchor: Vec3, factor: number): Mat4 {
  const scale: Mat4 = [
    factor, 0, 0, 0,
    0, factor, 0, 0,
    0, 0, factor, 0,
    0, 0, 0, 1,
  ];
  const back = translation4(anchor);
  const toOrigin = translation4([-anchor[0], -anchor[1], -anchor[2]]);
  return mul4(back, mul4(scale, toOrigin));
}

/**
 * Transform a 3D point by a 4x4 matrix (assumes w=1)
 */
export function transformPoint3(m: Mat4, v: Vec3): Vec3 {
  const x = m[0] * v[0] + m[4] * v[1] + m[8] * v[2] + m[12];
  const y = m[1] * v[0] + m[5] * v[1] + m[9] * v[2] + m[13];
  const z = m[2] * v[0] + m[6] * v[1] + m[10] * v[2] + m[14];
  return [x, y, z];
}

/**
 * Transform a 3D direction vector by a 4x4 matrix (assumes w=0, ignores translation)
 */
export function transformDirection3(m: Mat4, v: Vec3): Vec3 {
  const x = m[0] * v[0] + m[4] * v[1] + m[8] * v[2];
  const y = m[1] * v[0] + m[5] * v[1] + m[9] * v[2];
  const z = m[2] * v[0] + m[6] * v[1] + m[10] * v[2];
  return [x, y, z];
}
