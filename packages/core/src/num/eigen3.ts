/**
 * Eigen-decomposition of symmetric 3x3 matrices (Jacobi rotations)
 *
 * Used for principal component analysis of point sets: the eigenvector of
 * the smallest eigenvalue of a covariance matrix is the normal of the
 * least-squares plane.
 */

import type { Vec3 } from './vec3.js';

/**
 * Symmetric 3x3 matrix as rows. Only the upper triangle is read.
 */
export type Mat3 = readonly [Vec3, Vec3, Vec3];

export interface SymmetricEigen3 {
  /** Eigenvalues, ascending */
  values: [number, number, number];
  /** Unit eigenvectors, matching `values` */
  vectors: [Vec3, Vec3, Vec3];
}

const MAX_ROTATIONS = 64;
const OFF_DIAGONAL_EPS = 1e-15;

/**
 * Covariance matrix of a non-empty point set (population covariance)
 */
export function covariance3(points: readonly Vec3[], mean: Vec3): Mat3 {
  let cxx = 0, cxy = 0, cxz = 0, cyy = 0, cyz = 0, czz = 0;
  for (const p of points) {
    const dx = p[0] - mean[0];
    const dy = p[1] - mean[1];
    const dz = p[2] - mean[2];
    cxx += dx * dx; cxy += dx * dy; cxz += dx * dz;
    cyy += dy * dy; cyz += dy * dz; czz += dz * dz;
  }
  const n = points.length;
  return [
    [cxx / n, cxy / n, cxz / n],
    [cxy / n, cyy / n, cyz / n],
    [cxz / n, cyz / n, czz / n],
  ];
}

/**
 * Jacobi eigen-decomposition of a symmetric 3x3 matrix.
 *
 * Repeatedly zeroes the largest off-diagonal element until the matrix is
 * diagonal to working precision.
 */
export function symmetricEigen3(m: Mat3): SymmetricEigen3 {
  const a = [
    [m[0][0], m[0][1], m[0][2]],
    [m[0][1], m[1][1], m[1][2]],
    [m[0][2], m[1][2], m[2][2]],
  ];
  const v = [
    [1, 0, 0],
    [0, 1, 0],
    [0, 0, 1],
  ];

  for (let iter = 0; iter < MAX_ROTATIONS; iter++) {
    let p = 0, q = 1;
    if (Math.abs(a[0][2]) > Math.abs(a[p][q])) { p = 0; q = 2; }
    if (Math.abs(a[1][2]) > Math.abs(a[p][q])) { p = 1; q = 2; }

    const scale = Math.abs(a[0][0]) + Math.abs(a[1][1]) + Math.abs(a[2][2]);
    if (a[p][q] === 0 || Math.abs(a[p][q]) <= OFF_DIAGONAL_EPS * scale) break;

    const theta = 0.5 * Math.atan2(2 * a[p][q], a[q][q] - a[p][p]);
    const c = Math.cos(theta);
    const s = Math.sin(theta);

    const app = c * c * a[p][p] - 2 * s * c * a[p][q] + s * s * a[q][q];
    const aqq = s * s * a[p][p] + 2 * s * c * a[p][q] + c * c * a[q][q];

    for (let k = 0; k < 3; k++) {
      if (k !== p && k !== q) {
        const akp = c * a[k][p] - s * a[k][q];
        const akq = s * a[k][p] + c * a[k][q];
        a[k][p] = a[p][k] = akp;
        a[k][q] = a[q][k] = akq;
      }
    }

    a[p][p] = app;
    a[q][q] = aqq;
    a[p][q] = a[q][p] = 0;

    for (let i = 0; i < 3; i++) {
      const vip = c * v[i][p] - s * v[i][q];
      const viq = s * v[i][p] + c * v[i][q];
      v[i][p] = vip;
      v[i][q] = viq;
    }
  }

  const order = [0, 1, 2].sort((i, j) => a[i][i] - a[j][j]);
  const column = (j: number): Vec3 => [v[0][j], v[1][j], v[2][j]];

  return {
    values: [a[order[0]][order[0]], a[order[1]][order[1]], a[order[2]][order[2]]],
    vectors: [column(order[0]), column(order[1]), column(order[2])],
  };
}
