/**
 * Benchmark configuration profiles
 */

import type { Bench } from 'tinybench';

export type BenchmarkOptions = NonNullable<ConstructorParameters<typeof Bench>[0]>;

export type BenchmarkProfile = 'quick' | 'standard' | 'precise';

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES = {
  /**
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupTime: 50,
  },

  standard: {
    time: 1000,
    warmupTime: 100,
  },

  /**
   * Longer runtime, collects garbage before each task when run with --expose-gc
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmupTime: 250,
    setup: () => {
      global.gc?.();
    },
  },
} satisfies Record<BenchmarkProfile, BenchmarkOptions>;

function isProfile(value: string): value is BenchmarkProfile {
  return value in BENCHMARK_PROFILES;
}

/**
 * Profile named by BENCHMARK_PROFILE, falling back to `standard`
 */
export function getBenchmarkProfile(): BenchmarkProfile {
  const profile = process.env['BENCHMARK_PROFILE'] ?? 'standard';
  return isProfile(profile) ? profile : 'standard';
}

export function getBenchmarkConfig(profile = getBenchmarkProfile()): BenchmarkOptions {
  return BENCHMARK_PROFILES[profile];
}

/**
 * Mean, spread and stability of a sample of timings
 */
export function analyzeResults(samples: readonly number[]): {
  mean: number;
  median: number;
  stdDev: number;
  cv: number;
  isStable: boolean;
} {
  const sorted = [...samples].sort((a, b) => a - b);
  const n = sorted.length;
  if (n === 0) {
    return { mean: 0, median: 0, stdDev: 0, cv: 0, isStable: false };
  }

  const mean = sorted.reduce((sum, val) => sum + val, 0) / n;
  const middle = Math.floor(n / 2);
  const upper = sorted[middle] ?? 0;
  const lower = sorted[middle - 1] ?? upper;
  const median = n % 2 === 0 ? (lower + upper) / 2 : upper;

  const variance = n > 1 ? sorted.reduce((sum, val) => sum + (val - mean) ** 2, 0) / (n - 1) : 0;
  const stdDev = Math.sqrt(variance);
  const cv = mean === 0 ? 0 : stdDev / mean;

  // Stable when the coefficient of variation is under 5%
  return { mean, median, stdDev, cv, isStable: cv < 0.05 };
}
