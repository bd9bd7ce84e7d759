/**
 * Shared read contract of owning tensors and slices
 */

import type { TensorShape } from '../shape/runtime';
import type { Shape } from '../shape/types';
import type { TensorIndex } from '../index/tensor-index';

/**
 * Anything that exposes a shape and a row-major unit buffer
 *
 * Both {@link Tensor} and {@link TensorSlice} satisfy this interface, so
 * writes and equality checks accept either.
 */
export interface TensorLike<T> {
  /** Full shape; the scalar shape for a scalar */
  readonly shape: TensorShape;
  /** Shape of one element along the leading axis, `null` for a scalar */
  readonly elementShape: TensorShape | null;
  /** Row-major copy of the units */
  readonly units: readonly T[];
  readonly isScalar: boolean;
  /** Number of elements along the leading axis; 1 for a scalar */
  readonly count: number;
}

/**
 * Shape argument accepted by constructors
 */
export type ShapeLike = TensorShape | Shape;

/**
 * Coordinate argument accepted by multi-axis accessors
 */
export type IndexLike = TensorIndex | readonly number[];

/**
 * Position of a single unit: a flat offset or a full coordinate list
 */
export type UnitPosition = number | IndexLike;

/**
 * Options for {@link formatTensor}
 */
export interface FormatOptions {
  /** Units above which the output is truncated (default: 1000) */
  maxUnits?: number;
  /** Elements kept at each edge of a truncated axis (default: 3) */
  edgeItems?: number;
}
