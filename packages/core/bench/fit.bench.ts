/**
 * Plane fitting benchmarks
 *
 * Exhaustive (small selections) against sampled (large selections) dominant
 * plane search, and the edge-normal pipeline on a noisy selection.
 */

import {
  computeEdgeNormals,
  createPRNG,
  fitDominantPlane,
  type Segment3D,
  type Vec3,
} from '../src/index.js';
import { printResult, runBenchmark, type BenchmarkResult } from './utils.js';

function polygonWithStrays(sides: number, strays: number): Segment3D[] {
  const ring: Vec3[] = Array.from({ length: sides }, (_, i): Vec3 => {
    const t = (2 * Math.PI * i) / sides;
    return [20 * Math.cos(t), 20 * Math.sin(t), 0];
  });
  const edges: Segment3D[] = ring.map((start, i) => ({ start, end: ring[(i + 1) % sides] }));
  for (let s = 0; s < strays; s++) {
    edges.push({ start: ring[s % sides], end: [s, -s, 5 + s] });
  }
  return edges;
}

export function runFitBenchmarks(): BenchmarkResult[] {
  console.log(`Plane Fit Benchmarks`);
  console.log(`====================`);

  const small = polygonWithStrays(8, 2);
  const large = polygonWithStrays(200, 20);

  const results = [
    runBenchmark(`fit exhaustive`, () => fitDominantPlane(small), { iterations: 200 }),
    runBenchmark(`fit sampled`, () => fitDominantPlane(large, { random: createPRNG(1) }), { iterations: 20 }),
    runBenchmark(`edge normals`, () => computeEdgeNormals(large, { random: createPRNG(1) }), { iterations: 20 }),
  ];
  results.forEach(printResult);
  return results;
}
