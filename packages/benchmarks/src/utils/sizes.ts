/**
 * Common tensor sizes for benchmarking
 */

export interface BenchmarkSize {
  name: string;
  shape: readonly number[];
  elements: number;
}

export const VECTOR_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: [10], elements: 10 },
  { name: 'small', shape: [100], elements: 100 },
  { name: 'medium', shape: [1000], elements: 1000 },
  { name: 'large', shape: [10000], elements: 10000 },
];

export const MATRIX_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: [10, 10], elements: 100 },
  { name: 'small', shape: [32, 32], elements: 1024 },
  { name: 'medium', shape: [100, 100], elements: 10000 },
];

export const TENSOR_3D_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: [4, 4, 4], elements: 64 },
  { name: 'small', shape: [16, 16, 16], elements: 4096 },
  { name: 'medium', shape: [32, 32, 32], elements: 32768 },
];

export function formatSize(size: BenchmarkSize): string {
  return `${size.name} ${size.shape.join('x')} (${size.elements.toLocaleString()} units)`;
}
