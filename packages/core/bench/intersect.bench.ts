/**
 * Intersection benchmarks
 *
 * All-pairs search over a grid of construction lines, and the same search
 * re-run against its own markers (the dedupe path).
 */

import { findLineIntersections, unwrapResult, type Line3D } from '../src/index.js';
import { printResult, runBenchmark, type BenchmarkResult } from './utils.js';

function lineGrid(n: number): Line3D[] {
  const lines: Line3D[] = [];
  for (let i = 0; i < n; i++) {
    lines.push({ origin: [0, i, 0], direction: [1, 0, 0] });
    lines.push({ origin: [i, 0, 0], direction: [0, 1, 0] });
  }
  return lines;
}

export function runIntersectBenchmarks(): BenchmarkResult[] {
  console.log(`Intersection Benchmarks`);
  console.log(`=======================`);

  const grid = lineGrid(40);
  const known = unwrapResult(findLineIntersections(grid)).points;

  const results = [
    runBenchmark(`intersect 80`, () => findLineIntersections(grid), { iterations: 20 }),
    runBenchmark(`re-intersect 80`, () => findLineIntersections(grid, { knownPoints: known }), { iterations: 20 }),
  ];
  results.forEach(printResult);
  return results;
}
