// Re-export tinybench types
export { Bench } from 'tinybench';
export type { Task, TaskResult } from 'tinybench';

export * from './utils/sizes';
export * from './utils/config';

export { addAddressingTasks, runAddressingBenchmarks } from './runners/addressing';
export type { BenchmarkRow } from './runners/addressing';
