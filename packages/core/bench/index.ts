/**
 * Geometry kernel benchmarks
 *
 * Informative timings for lofting, plane fitting and intersection search.
 *
 * Usage:
 *   npm run bench
 */

import { runLoftBenchmarks } from './loft.bench.js';
import { runFitBenchmarks } from './fit.bench.js';
import { runIntersectBenchmarks } from './intersect.bench.js';
import { summarizeResults, type BenchmarkResult } from './utils.js';

export function runAllBenchmarks(): void {
  console.log(`Date: ${new Date().toISOString()}`);
  console.log(`Node: ${process.version}`);
  console.log(``);

  const allResults: BenchmarkResult[] = [
    ...runLoftBenchmarks(),
    ...runFitBenchmarks(),
    ...runIntersectBenchmarks(),
  ];

  console.log(`=`.repeat(60));
  console.log(`SUMMARY`);
  console.log(`=`.repeat(60));
  console.log(summarizeResults(allResults));
  console.log(``);

  const slowest = allResults.reduce((a, b) => (a.avgMs > b.avgMs ? a : b));
  const fastest = allResults.reduce((a, b) => (a.avgMs < b.avgMs ? a : b));
  console.log(`  Fastest: ${fastest.name} (${fastest.avgMs.toFixed(3)} ms avg)`);
  console.log(`  Slowest: ${slowest.name} (${slowest.avgMs.toFixed(3)} ms avg)`);
}

runAllBenchmarks();
