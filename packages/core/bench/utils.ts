/**
 * Timing helpers for the geometry benchmarks
 */

export interface BenchmarkResult {
  name: string;
  iterations: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  stdDevMs: number;
  /** Based on the average */
  opsPerSec: number;
}

export interface BenchmarkOptions {
  /** Timed iterations (default: 100) */
  iterations?: number;
  /** Untimed iterations run first (default: 5) */
  warmup?: number;
}

const DEFAULT_OPTIONS: Required<BenchmarkOptions> = {
  iterations: 100,
  warmup: 5,
};

function summarizeTimes(name: string, times: number[]): BenchmarkResult {
  const totalMs = times.reduce((a, b) => a + b, 0);
  const avgMs = totalMs / times.length;
  const variance = times.reduce((sum, t) => sum + (t - avgMs) ** 2, 0) / times.length;
  return {
    name,
    iterations: times.length,
    totalMs,
    avgMs,
    minMs: Math.min(...times),
    maxMs: Math.max(...times),
    stdDevMs: Math.sqrt(variance),
    opsPerSec: 1000 / avgMs,
  };
}

/**
 * Time `fn` over a number of iterations after a warmup
 */
export function runBenchmark(name: string, fn: () => void, options?: BenchmarkOptions): BenchmarkResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let i = 0; i < opts.warmup; i++) {
    fn();
  }

  const times: number[] = [];
  for (let i = 0; i < opts.iterations; i++) {
    const start = performance.now();
    fn();
    times.push(performance.now() - start);
  }
  return summarizeTimes(name, times);
}

export function printResult(result: BenchmarkResult): void {
  console.log(
    [
      `Benchmark: ${result.name}`,
      `  Iterations: ${result.iterations}`,
      `  Average:    ${result.avgMs.toFixed(3)} ms`,
      `  Min/Max:    ${result.minMs.toFixed(3)} / ${result.maxMs.toFixed(3)} ms`,
      `  Std Dev:    ${result.stdDevMs.toFixed(3)} ms`,
      `  Ops/sec:    ${result.opsPerSec.toFixed(2)}`,
      ``,
    ].join(`\n`)
  );
}

/**
 * Markdown table of results
 */
export function summarizeResults(results: BenchmarkResult[]): string {
  const width = Math.max(9, ...results.map((r) => r.name.length));
  const header = `| ${`Benchmark`.padEnd(width)} | Avg (ms) | Min (ms) | Max (ms) | Ops/sec |`;
  const separator = `|${`-`.repeat(width + 2)}|----------|----------|----------|---------|`;
  const rows = results.map(
    (r) =>
      `| ${r.name.padEnd(width)} | ${r.avgMs.toFixed(3).padStart(8)} | ${r.minMs.toFixed(3).padStart(8)} | ` +
      `${r.maxMs.toFixed(3).padStart(8)} | ${r.opsPerSec.toFixed(1).padStart(7)} |`
  );
  return [header, separator, ...rows].join(`\n`);
}
