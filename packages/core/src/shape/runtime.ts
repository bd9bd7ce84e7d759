/**
 * Runtime shape management and validation
 *
 * This module provides the runtime shape value used throughout the tensor
 * engine, bridging the compile-time shape types and runtime execution.
 */

import type { Shape } from './types';
import type { TensorIndex } from '../index/tensor-index';
import { MAX_TENSOR_SIZE } from '../config';
import { IndexOutOfRangeError, ShapeViolationError } from '../errors';

// =============================================================================
// Tensor Shape Class
// =============================================================================

/**
 * Ordered sequence of dimension sizes with derived row-major metadata
 *
 * Shapes are immutable values; every operation returns a new shape.
 *
 * @example
 * const shape = new TensorShape([3, 4, 5]);
 * shape.contiguousSize; // 60
 * shape.strides;        // [20, 5, 1]
 * shape.dropFirst();    // TensorShape [4, 5]
 */
export class TensorShape<S extends Shape = Shape> implements Iterable<number> {
  readonly dims: S;
  private readonly _size: number;
  private readonly _strides: readonly number[];

  constructor(dims: S) {
    this.dims = dims;
    TensorShape.validate(this.dims);
    this._size = computeSize(this.dims);
    this._strides = computeStrides(this.dims);

    if (this._size > MAX_TENSOR_SIZE) {
      throw new ShapeViolationError(
        `size ${this._size.toString()} exceeds maximum safe size of ${MAX_TENSOR_SIZE.toString()}`,
        { shape: [...this.dims] },
      );
    }
  }

  /**
   * Number of dimensions
   */
  get rank(): number {
    return this.dims.length;
  }

  /**
   * Number of units a buffer of this shape holds; 1 for the empty shape
   */
  get contiguousSize(): number {
    return this._size;
  }

  /**
   * Strides for each dimension (row-major order)
   */
  get strides(): readonly number[] {
    return this._strides;
  }

  get isScalar(): boolean {
    return this.dims.length === 0;
  }

  /**
   * Size of dimension `axis`
   */
  dim(axis: number): number {
    const dimension = this.dims[axis];
    if (dimension === undefined || axis < 0) {
      throw new IndexOutOfRangeError('shape dimension', axis, { start: 0, end: this.rank });
    }
    return dimension;
  }

  /**
   * Remove the first `n` dimensions
   *
   * @throws {IndexOutOfRangeError} If `n` is negative or exceeds the rank
   */
  dropFirst(n = 1): TensorShape {
    if (!Number.isInteger(n) || n < 0 || n > this.rank) {
      throw new IndexOutOfRangeError('dropFirst', n, { start: 0, end: this.rank + 1 });
    }
    return new TensorShape(this.dims.slice(n));
  }

  /**
   * Keep only the first `n` dimensions
   */
  prefix(n: number): TensorShape {
    return new TensorShape(this.dims.slice(0, Math.max(0, n)));
  }

  /**
   * Add a leading dimension
   */
  prepending(dimension: number): TensorShape {
    return new TensorShape([dimension, ...this.dims]);
  }

  /**
   * Add a trailing dimension
   */
  appending(dimension: number): TensorShape {
    return new TensorShape([...this.dims, dimension]);
  }

  /**
   * Reverse the dimension order
   */
  transpose(): TensorShape {
    return new TensorShape([...this.dims].reverse());
  }

  /**
   * Element-wise equality of the dimension sequences
   */
  isIsomorphic(other: TensorShape): boolean {
    return TensorShape.equals(this.dims, other.dims);
  }

  /**
   * Alias of {@link isIsomorphic}
   */
  equals(other: TensorShape): boolean {
    return this.isIsomorphic(other);
  }

  /**
   * Equality after stripping leading 1-dimensions from the longer shape
   *
   * This relation is meant for diagnostics. It is not transitive in general
   * and must not replace {@link isIsomorphic} where layout matters.
   *
   * @example
   * TensorShape.of(1, 4, 3).isSimilar(TensorShape.of(4, 3)); // true
   * TensorShape.of(1, 1, 1).isSimilar(TensorShape.scalar);   // true
   */
  isSimilar(other: TensorShape): boolean {
    return TensorShape.similar(this.dims, other.dims);
  }

  /**
   * Row-major unit offset of `index` in this shape
   */
  contiguousIndex(index: TensorIndex): number {
    return index.contiguousIndex(this);
  }

  /**
   * Shape remaining after fixing the leading coordinates in `index`
   *
   * @returns The sub-shape, or `null` if the index is not shorter than the rank
   */
  subshape(index: TensorIndex): TensorShape | null {
    if (index.count >= this.rank) {
      return null;
    }
    return this.dropFirst(index.count);
  }

  [Symbol.iterator](): Iterator<number> {
    return this.dims[Symbol.iterator]();
  }

  toString(): string {
    return `Shape${formatShape(this.dims)}`;
  }

  // =============================================================================
  // Static Utility Methods
  // =============================================================================

  /**
   * The rank-0 shape
   */
  static readonly scalar: TensorShape<readonly []> = new TensorShape([] as const);

  static of<const S extends Shape>(...dims: S): TensorShape<S> {
    return new TensorShape(dims);
  }

  /**
   * Accept a shape or any iterable of dimensions; shapes pass through
   */
  static from(dims: TensorShape | Iterable<number>): TensorShape {
    return dims instanceof TensorShape ? dims : new TensorShape([...dims]);
  }

  /**
   * Check that every dimension is a non-negative integer
   *
   * @throws {ShapeViolationError} On the first invalid dimension
   */
  static validate(dims: Shape): void {
    for (let i = 0; i < dims.length; i++) {
      const dim = dims[i];
      if (dim === undefined || !Number.isInteger(dim) || dim < 0) {
        throw new ShapeViolationError(
          `invalid dimension ${String(dim)} at index ${i.toString()}: dimensions must be non-negative integers`,
          { shape: [...dims] },
        );
      }
    }
  }

  static equals(shape1: Shape, shape2: Shape): boolean {
    if (shape1.length !== shape2.length) {
      return false;
    }

    for (let i = 0; i < shape1.length; i++) {
      if (shape1[i] !== shape2[i]) {
        return false;
      }
    }

    return true;
  }

  static similar(shape1: Shape, shape2: Shape): boolean {
    const [longer, shorter] = shape1.length >= shape2.length ? [shape1, shape2] : [shape2, shape1];
    let start = 0;
    while (longer.length - start > shorter.length && longer[start] === 1) {
      start++;
    }
    return TensorShape.equals(longer.slice(start), shorter);
  }
}

// =============================================================================
// Shape Utilities
// =============================================================================

/**
 * Product of all dimensions
 */
export function computeSize(shape: Shape): number {
  return shape.reduce((prod, dim) => prod * dim, 1);
}

/**
 * Strides for row-major (C-style) layout
 */
export function computeStrides(shape: Shape): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;

  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i] ?? 1;
  }

  return strides;
}

/**
 * Format a shape for display in error messages
 */
export function formatShape(shape: Shape | TensorShape | null): string {
  if (shape === null) {
    return 'scalar';
  }
  const dims = shape instanceof TensorShape ? shape.dims : shape;
  return `[${dims.join(', ')}]`;
}
