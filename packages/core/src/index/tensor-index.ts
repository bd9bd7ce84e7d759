/**
 * Multi-dimensional coordinates and their row-major addressing
 */

import type { TensorShape } from '../shape/runtime';
import { IndexOutOfRangeError, ShapeMismatchError } from '../errors';

/**
 * Ordered coordinates, one per axis or for a leading prefix of the axes
 *
 * @example
 * const index = TensorIndex.of(2, 0, 3);
 * index.contiguousIndex(TensorShape.of(3, 4, 5)); // 43
 */
export class TensorIndex implements Iterable<number> {
  private readonly elements: readonly number[];

  constructor(elements: Iterable<number>) {
    this.elements = [...elements];
  }

  static of(...elements: number[]): TensorIndex {
    return new TensorIndex(elements);
  }

  static repeating(value: number, count: number): TensorIndex {
    return new TensorIndex(new Array<number>(count).fill(value));
  }

  /**
   * Accept either an index or a plain coordinate list
   */
  static from(index: TensorIndex | readonly number[]): TensorIndex {
    return index instanceof TensorIndex ? index : new TensorIndex(index);
  }

  get count(): number {
    return this.elements.length;
  }

  get isEmpty(): boolean {
    return this.elements.length === 0;
  }

  /**
   * Position of the last coordinate (`count - 1`)
   */
  get dimension(): number {
    return this.elements.length - 1;
  }

  get coordinates(): readonly number[] {
    return this.elements;
  }

  get last(): number | undefined {
    return this.elements[this.elements.length - 1];
  }

  at(position: number): number {
    const value = this.elements[position];
    if (value === undefined || position < 0) {
      throw new IndexOutOfRangeError('index coordinate', position, {
        start: 0,
        end: this.count,
      });
    }
    return value;
  }

  /**
   * Copy with the coordinate at `position` replaced
   */
  with(position: number, value: number): TensorIndex {
    this.at(position);
    const next = [...this.elements];
    next[position] = value;
    return new TensorIndex(next);
  }

  slice(start?: number, end?: number): TensorIndex {
    return new TensorIndex(this.elements.slice(start, end));
  }

  /**
   * Row-major unit offset of this index within `shape`
   *
   * Each coordinate is weighted by the stride of its axis in the full
   * shape, so a prefix index addresses the first unit of its sub-tensor.
   *
   * @throws {IndexOutOfRangeError} If the index is longer than the rank or a
   * coordinate is outside its dimension
   */
  contiguousIndex(shape: TensorShape): number {
    if (this.count > shape.rank) {
      throw new IndexOutOfRangeError('index rank', this.count, { start: 0, end: shape.rank + 1 });
    }

    let offset = 0;
    for (let axis = 0; axis < this.elements.length; axis++) {
      const coordinate = this.elements[axis] ?? 0;
      const dim = shape.dim(axis);
      if (!Number.isInteger(coordinate) || coordinate < 0 || coordinate >= dim) {
        throw new IndexOutOfRangeError(
          `axis ${axis.toString()}`,
          coordinate,
          { start: 0, end: dim },
          { index: [...this.elements], shape: [...shape.dims] },
        );
      }
      offset += coordinate * (shape.strides[axis] ?? 1);
    }
    return offset;
  }

  // =============================================================================
  // Ordering
  // =============================================================================

  equals(other: TensorIndex): boolean {
    if (this.count !== other.count) {
      return false;
    }
    return this.elements.every((value, i) => value === other.elements[i]);
  }

  /**
   * Lexicographic comparison; the first differing coordinate decides.
   * When one index is a prefix of the other they compare equal (0).
   */
  compare(other: TensorIndex): -1 | 0 | 1 {
    const length = Math.min(this.count, other.count);
    for (let i = 0; i < length; i++) {
      const x = this.elements[i] ?? 0;
      const y = other.elements[i] ?? 0;
      if (x < y) return -1;
      if (x > y) return 1;
    }
    return 0;
  }

  lessThan(other: TensorIndex): boolean {
    return this.compare(other) < 0;
  }

  // =============================================================================
  // Stride
  // =============================================================================

  /**
   * Advance the innermost coordinate by `n`; other coordinates are untouched
   */
  advanced(n: number): TensorIndex {
    if (this.isEmpty) {
      return this;
    }
    const next = [...this.elements];
    next[next.length - 1] = (next[next.length - 1] ?? 0) + n;
    return new TensorIndex(next);
  }

  /**
   * Difference between the innermost coordinates of `other` and this index
   *
   * @throws {ShapeMismatchError} If the indices have different lengths
   */
  distance(other: TensorIndex): number {
    if (this.count !== other.count) {
      throw new ShapeMismatchError(
        'index distance',
        `${this.count.toString()} coordinates`,
        `${other.count.toString()} coordinates`,
      );
    }
    const selfLast = this.last;
    const otherLast = other.last;
    if (selfLast === undefined || otherLast === undefined) {
      return 0;
    }
    return otherLast - selfLast;
  }

  [Symbol.iterator](): Iterator<number> {
    return this.elements[Symbol.iterator]();
  }

  toString(): string {
    return `Index[${this.elements.join(', ')}]`;
  }
}
