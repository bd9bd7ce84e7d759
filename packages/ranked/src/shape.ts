/**
 * Fixed-arity shapes for ranked tensors
 */

import { InvalidElementTypeError, TensorShape } from '@ndstore/core';
import type { TupleOf } from '@ndstore/core';

/**
 * Shape of a rank-N tensor: exactly N dimensions
 *
 * @example
 * const shape: RankedShape<2> = [4, 3];
 */
export type RankedShape<N extends number> = TupleOf<number, N> & readonly number[];

export function isRankedShape<N extends number>(
  dims: readonly number[],
  rank: N,
): dims is RankedShape<N> {
  return dims.length === rank;
}

/**
 * Narrow a dynamic shape to rank N
 *
 * @throws {InvalidElementTypeError} If the shape has a different rank
 */
export function toRankedShape<N extends number>(shape: TensorShape, rank: N): RankedShape<N> {
  const dims = shape.dims;
  if (!isRankedShape(dims, rank)) {
    throw new InvalidElementTypeError(rank, dims.length);
  }
  return dims;
}

export function toDynamicShape(shape: readonly number[]): TensorShape {
  return TensorShape.from(shape);
}
