/**
 * Loft benchmarks
 *
 * Ordering and lofting of sampled arcs, from a handful of curves up to a
 * dense sweep, plus welding the result into an indexed mesh.
 */

import { loftCurves, loftPaths, orderPaths, toIndexedMesh, unwrapResult, type Path, type Vec3 } from '../src/index.js';
import { printResult, runBenchmark, type BenchmarkResult } from './utils.js';

function arcSweep(curves: number, samples: number): Path[] {
  const paths: Path[] = [];
  for (let c = 0; c < curves; c++) {
    const radius = 10 + Math.sin(c / 3);
    const path: Vec3[] = [];
    for (let i = 0; i < samples; i++) {
      const t = Math.PI * (i / (samples - 1));
      path.push([c, radius * Math.cos(t), radius * Math.sin(t)]);
    }
    // Alternate drawing direction so alignment has work to do
    paths.push(c % 2 === 0 ? path : path.reverse());
  }
  // Shuffle deterministically
  return paths.map((p, i) => ({ p, key: (i * 7919) % curves })).sort((a, b) => a.key - b.key).map(({ p }) => p);
}

export function runLoftBenchmarks(): BenchmarkResult[] {
  console.log(`Loft Benchmarks`);
  console.log(`===============`);

  const small = arcSweep(8, 16);
  const large = arcSweep(64, 64);
  const orderedLarge = unwrapResult(orderPaths(large));
  const loftLarge = unwrapResult(loftPaths(orderedLarge));

  const results = [
    runBenchmark(`loft 8x16`, () => loftCurves(small), { iterations: 500 }),
    runBenchmark(`order 64`, () => orderPaths(large), { iterations: 50 }),
    runBenchmark(`loft 64x64`, () => loftPaths(orderedLarge), { iterations: 50 }),
    runBenchmark(`weld 64x64`, () => toIndexedMesh(loftLarge), { iterations: 20 }),
  ];
  results.forEach(printResult);
  return results;
}
