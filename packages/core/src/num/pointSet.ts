/**
 * Tolerance-aware point set
 *
 * Holds points such that no two are within eps of each other. Used to
 * deduplicate intersection markers and to weld mesh vertices.
 *
 * Points are bucketed in a uniform grid with cell size eps, so a lookup only
 * has to scan the 27 cells around the query point. With eps = 0 the grid
 * degenerates to exact coordinate keys.
 */

import type { Vec3 } from './vec3.js';
import type { NumericContext } from './tolerance.js';
import { dist3 } from './vec3.js';

export class PointSet {
  private readonly points: Vec3[] = [];
  private readonly cells = new Map<string, number[]>();
  private readonly eps: number;

  constructor(ctx: NumericContext, initial: Iterable<Vec3> = []) {
    this.eps = ctx.tol.length;
    for (const p of initial) {
      this.insert(p);
    }
  }

  get size(): number {
    return this.points.length;
  }

  /** Points in insertion order */
  toArray(): Vec3[] {
    return [...this.points];
  }

  /** Index of a stored point within eps of `p`, or -1 */
  indexOf(p: Vec3): number {
    if (this.eps === 0) {
      return this.cells.get(exactKey(p))?.[0] ?? -1;
    }

    const [cx, cy, cz] = this.cellOf(p);
    let best = -1;
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (let dz = -1; dz <= 1; dz++) {
          const bucket = this.cells.get(cellKey(cx + dx, cy + dy, cz + dz));
          if (!bucket) continue;
          for (const idx of bucket) {
            if ((best === -1 || idx < best) && dist3(this.points[idx], p) <= this.eps) {
              best = idx;
            }
          }
        }
      }
    }
    return best;
  }

  has(p: Vec3): boolean {
    return this.indexOf(p) !== -1;
  }

  /** Add `p` unless a point within eps exists. Returns true if it was added. */
  add(p: Vec3): boolean {
    if (this.has(p)) {
      return false;
    }
    this.push(p);
    return true;
  }

  /** Index of the point within eps of `p`, adding `p` first if there is none */
  insert(p: Vec3): number {
    const existing = this.indexOf(p);
    return existing !== -1 ? existing : this.push(p);
  }

  private push(p: Vec3): number {
    const idx = this.points.length;
    this.points.push(p);
    const key = this.eps === 0 ? exactKey(p) : cellKey(...this.cellOf(p));
    const bucket = this.cells.get(key);
    if (bucket) {
      bucket.push(idx);
    } else {
      this.cells.set(key, [idx]);
    }
    return idx;
  }

  private cellOf(p: Vec3): [number, number, number] {
    return [
      Math.floor(p[0] / this.eps),
      Math.floor(p[1] / this.eps),
      Math.floor(p[2] / this.eps),
    ];
  }
}

function cellKey(x: number, y: number, z: number): string {
  return `${x},${y},${z}`;
}

function exactKey(p: Vec3): string {
  return `${p[0]},${p[1]},${p[2]}`;
}
