/**
 * Constructors for ranked tensors
 *
 * Each takes the rank tag first so the rank can be inferred:
 *
 * @example
 * const m = repeating(R2, [4, 3], 0);   // RankedTensor<2, number>
 */

import * as core from '@ndstore/core';
import { Tensor } from '@ndstore/core';
import type { Rank } from './rank';
import { R1 } from './rank';
import type { RankedShape } from './shape';
import { RankedTensor } from './tensor';

export type Scalar<T> = RankedTensor<0, T>;
export type Vector<T> = RankedTensor<1, T>;
export type Matrix<T> = RankedTensor<2, T>;
export type Tensor3D<T> = RankedTensor<3, T>;
export type Tensor4D<T> = RankedTensor<4, T>;

/**
 * Wrap an existing dynamic tensor
 *
 * @throws {InvalidElementTypeError} If the tensor's rank is not N
 */
export function wrap<N extends number, T>(rank: Rank<N>, tensor: Tensor<T>): RankedTensor<N, T> {
  return RankedTensor.wrap(rank, tensor);
}

/**
 * Build from a shape and row-major units
 *
 * @throws {ShapeViolationError} If the unit count does not match the shape
 */
export function ranked<N extends number, T>(
  rank: Rank<N>,
  shape: RankedShape<N>,
  units: Iterable<T>,
): RankedTensor<N, T> {
  return RankedTensor.wrap(rank, Tensor.fromShape(shape, units));
}

export function repeating<N extends number, T>(
  rank: Rank<N>,
  shape: RankedShape<N>,
  value: T,
): RankedTensor<N, T> {
  return RankedTensor.wrap(rank, core.repeating(shape, value));
}

export function fromSupplier<N extends number, T>(
  rank: Rank<N>,
  shape: RankedShape<N>,
  supplier: () => T,
): RankedTensor<N, T> {
  return RankedTensor.wrap(rank, core.fromSupplier(shape, supplier));
}

export function increasingFrom<N extends number>(
  rank: Rank<N>,
  shape: RankedShape<N>,
  lowerBound: number,
): RankedTensor<N, number> {
  return RankedTensor.wrap(rank, core.increasingFrom(shape, lowerBound));
}

/** Vector of the integers in `[start, end)` */
export function scalarElements(start: number, end: number): Vector<number> {
  return RankedTensor.wrap(R1, core.scalarElements(start, end));
}

/** Vector of the integers in `[start, end]` */
export function scalarElementsClosed(start: number, end: number): Vector<number> {
  return RankedTensor.wrap(R1, core.scalarElementsClosed(start, end));
}
