/**
 * Standalone addressing benchmark runner using tinybench directly
 */

import { Bench } from 'tinybench';
import { Logger, TensorIndex, increasingFrom } from '@ndstore/core';
import { R2, increasingFrom as increasingRanked } from '@ndstore/ranked';
import { MATRIX_SIZES, TENSOR_3D_SIZES, formatSize, type BenchmarkSize } from '../utils/sizes';
import { getBenchmarkConfig, type BenchmarkOptions } from '../utils/config';

const log = Logger.child('[bench]');

export interface BenchmarkRow {
  name: string;
  opsPerSecond: number;
  meanMs: number;
  samples: number;
}

function lastIndex(size: BenchmarkSize): TensorIndex {
  return TensorIndex.from(size.shape.map((dim) => dim - 1));
}

/**
 * Register unit reads, element copies and views for each size
 */
export function addAddressingTasks(bench: Bench, sizes: readonly BenchmarkSize[]): void {
  for (const size of sizes) {
    log.debug(`adding tasks for ${formatSize(size)}`);
    const tensor = increasingFrom(size.shape, 0);
    const index = lastIndex(size);

    bench.add(`unit by coordinates ${size.name}`, () => {
      tensor.unit(index);
    });
    bench.add(`element copy ${size.name}`, () => {
      tensor.at(0);
    });
    bench.add(`element view ${size.name}`, () => {
      void tensor.view(0).units;
    });
  }
}

export async function runAddressingBenchmarks(
  options: BenchmarkOptions = getBenchmarkConfig(),
): Promise<BenchmarkRow[]> {
  const bench = new Bench(options);
  addAddressingTasks(bench, [...MATRIX_SIZES, ...TENSOR_3D_SIZES]);

  const [first] = MATRIX_SIZES;
  if (first !== undefined) {
    const [rows, columns] = first.shape;
    const matrix = increasingRanked(R2, [rows ?? 0, columns ?? 0], 0);
    bench.add(`ranked row ${first.name}`, () => {
      matrix.at(0);
    });
  }

  const total = bench.tasks.length;
  let completed = 0;
  bench.addEventListener('cycle', () => {
    completed++;
    log.debug(`${completed.toString()}/${total.toString()} tasks complete`);
  });

  log.info(`running ${total.toString()} addressing benchmarks`);
  await bench.run();

  return bench.tasks.map((task) => ({
    name: task.name,
    opsPerSecond: task.result?.hz ?? 0,
    meanMs: task.result?.mean ?? 0,
    samples: task.result?.samples.length ?? 0,
  }));
}
