/**
 * Zero-copy views into a tensor's buffer
 *
 * A slice is a path of fixed leading coordinates into its base tensor plus
 * an optional element range on the next axis. Its unit range is recomputed
 * from that path against the base's current shape on every access.
 *
 * Slices record the storage generation they were created at. Once the base
 * is reallocated (append, remove, or a size-changing replace) the slice is
 * stale; see `checkStaleViews` in the configuration.
 */

import { TensorShape, computeSize, formatShape } from '../shape/runtime';
import { TensorIndex } from '../index/tensor-index';
import {
  EMPTY_RANGE,
  assertInRange,
  formatRange,
  assertRangeWithin,
  range,
  rangeCount,
  toRange,
  type Range,
  type RangeLike,
} from '../index/range';
import { getConfig } from '../config';
import { IndexOutOfRangeError, ShapeMismatchError, StaleViewError } from '../errors';
import { Logger } from '../logger';
import { Tensor } from './tensor';
import { elementsEqual, isIsomorphic, isSimilar, unitsEqual } from './equality';
import { formatTensor } from './format';
import type { FormatOptions, IndexLike, ShapeLike, TensorLike, UnitPosition } from './types';

const log = Logger.child('[slice]');

/**
 * Tensor or slice a new slice can be taken from
 */
export type SliceParent<T> = Tensor<T> | TensorSlice<T>;

interface SliceOrigin<T> {
  base: Tensor<T>;
  baseIndices: readonly number[];
  bounds: Range | null;
}

// =============================================================================
// Tensor Slice Class
// =============================================================================

/**
 * Non-owning view of part of a {@link Tensor}
 *
 * A bounded slice keeps its parent's element positions: slicing `2..<4`
 * yields a view whose `indices` are `2..<4`, so `slice.at(2)` is the
 * parent's element 2.
 *
 * @example
 * const t = Tensor.fromShape([3, 4, 5], increasing(60));
 * const row = t.view(1).at(3);
 * row.units;            // [35, 36, 37, 38, 39]
 * row.setAt(0, Tensor.scalar(-1));
 * t.unit([1, 3, 0]);    // -1
 */
export class TensorSlice<T> implements TensorLike<T>, Iterable<TensorSlice<T>> {
  private constructor(
    readonly base: Tensor<T>,
    private readonly baseIndices: readonly number[],
    private readonly bounds: Range | null,
    private readonly viewGeneration: number,
  ) {}

  // =============================================================================
  // Construction
  // =============================================================================

  /**
   * View of the elements of `parent` in `bounds`
   *
   * @throws {IndexOutOfRangeError} If `parent` is a scalar or `bounds` is
   * not within `parent.indices`
   */
  static bounded<T>(parent: SliceParent<T>, bounds: Range): TensorSlice<T> {
    const origin = TensorSlice.origin(parent);
    if (parent.isScalar) {
      throw new IndexOutOfRangeError('slice on a scalar', formatRange(bounds), EMPTY_RANGE);
    }
    assertRangeWithin('slice', bounds, parent.indices);
    return TensorSlice.create(origin.base, origin.baseIndices, bounds);
  }

  /**
   * View of element `index` of `parent`
   *
   * @throws {IndexOutOfRangeError}
   */
  static element<T>(parent: SliceParent<T>, index: number): TensorSlice<T> {
    const origin = TensorSlice.origin(parent);
    if (parent.isScalar) {
      throw new IndexOutOfRangeError('view on a scalar', index, EMPTY_RANGE);
    }
    assertInRange('view', index, parent.indices);
    return TensorSlice.create(origin.base, [...origin.baseIndices, index], null);
  }

  /**
   * View reached by fixing one coordinate per leading axis of `parent`
   *
   * The first coordinate is checked against `parent.indices`, the rest
   * against their dimensions. An empty list yields a view equal to `parent`.
   *
   * @throws {IndexOutOfRangeError}
   */
  static path<T>(parent: SliceParent<T>, index: IndexLike): TensorSlice<T> {
    const origin = TensorSlice.origin(parent);
    const coordinates = [...TensorIndex.from(index)];
    if (coordinates.length === 0) {
      return TensorSlice.create(origin.base, origin.baseIndices, origin.bounds);
    }
    if (parent.isScalar) {
      throw new IndexOutOfRangeError('view on a scalar', `[${coordinates.join(', ')}]`, EMPTY_RANGE);
    }

    const dims = parent.shape.dims;
    if (coordinates.length > dims.length) {
      throw new IndexOutOfRangeError('view index rank', coordinates.length, {
        start: 0,
        end: dims.length + 1,
      });
    }
    coordinates.forEach((coordinate, axis) => {
      const valid = axis === 0 ? parent.indices : range(0, dims[axis] ?? 0);
      assertInRange(`view axis ${axis.toString()}`, coordinate, valid);
    });
    return TensorSlice.create(origin.base, [...origin.baseIndices, ...coordinates], null);
  }

  /**
   * View of all of `parent`
   */
  static of<T>(parent: SliceParent<T>): TensorSlice<T> {
    return parent.isScalar ? TensorSlice.path(parent, []) : TensorSlice.bounded(parent, parent.indices);
  }

  private static create<T>(
    base: Tensor<T>,
    baseIndices: readonly number[],
    bounds: Range | null,
  ): TensorSlice<T> {
    return new TensorSlice(base, baseIndices, bounds, base.storage.generation);
  }

  private static origin<T>(parent: SliceParent<T>): SliceOrigin<T> {
    if (parent instanceof TensorSlice) {
      parent.checkFresh();
      return { base: parent.base, baseIndices: parent.baseIndices, bounds: parent.bounds };
    }
    return { base: parent, baseIndices: [], bounds: null };
  }

  // =============================================================================
  // Properties
  // =============================================================================

  /**
   * Number of coordinates fixed in the base
   */
  get depth(): number {
    return this.baseIndices.length;
  }

  /**
   * Shape of one element; `null` for a scalar view
   */
  get elementShape(): TensorShape | null {
    const baseElementShape = this.base.elementShape;
    if (baseElementShape === null || this.depth === baseElementShape.rank + 1) {
      return null;
    }
    return baseElementShape.dropFirst(this.depth);
  }

  get isScalar(): boolean {
    return this.depth === this.base.shape.rank;
  }

  /**
   * Valid element positions, in the parent's numbering for bounded slices
   */
  get indices(): Range {
    this.checkFresh();
    if (this.bounds !== null) {
      return this.bounds;
    }
    return this.isScalar ? EMPTY_RANGE : range(0, this.base.shape.dim(this.depth));
  }

  /**
   * Number of elements; a scalar view counts as 1
   */
  get count(): number {
    return this.isScalar ? 1 : rangeCount(this.indices);
  }

  get shape(): TensorShape {
    return this.elementShape?.prepending(this.count) ?? TensorShape.scalar;
  }

  get unitCountPerElement(): number {
    return this.elementShape?.contiguousSize ?? 0;
  }

  /**
   * Range of base units this slice covers, computed from the current base shape
   *
   * @throws {StaleViewError} If the base was reallocated and stale views are checked
   */
  get unitRange(): Range {
    this.checkFresh();
    const trimmed = this.base.shape.dims.slice(1);
    let start = 0;
    let end = this.base.unitCount;

    this.baseIndices.forEach((index, k) => {
      const stride = computeSize(trimmed.slice(k));
      start += index * stride;
      if (k === this.depth - 1) {
        end = start + stride;
      }
    });

    if (this.bounds !== null) {
      const stride = computeSize(trimmed.slice(this.depth));
      end = start + this.bounds.end * stride;
      start += this.bounds.start * stride;
    }
    return range(start, end);
  }

  /**
   * Row-major copy of the viewed units
   */
  get units(): readonly T[] {
    return this.base.storage.read(this.unitRange);
  }

  get unitCount(): number {
    return rangeCount(this.unitRange);
  }

  /**
   * Whether the base was reallocated after this slice was created
   */
  get isStale(): boolean {
    return this.base.storage.generation !== this.viewGeneration;
  }

  // =============================================================================
  // Access
  // =============================================================================

  /**
   * Unit at an offset within this slice, or the first unit addressed by a
   * coordinate list
   *
   * @throws {IndexOutOfRangeError}
   */
  unit(at: UnitPosition): T {
    return this.base.storage.unitAt(this.unitOffset('unit', at));
  }

  /**
   * Overwrite one unit in the base buffer
   *
   * @throws {IndexOutOfRangeError}
   */
  updateUnit(at: UnitPosition, value: T): void {
    this.base.storage.setUnit(this.unitOffset('updateUnit', at), value);
  }

  /**
   * View of element `index`
   */
  at(index: number): TensorSlice<T> {
    return TensorSlice.element(this, index);
  }

  /**
   * View addressed by a coordinate list
   */
  get(index: IndexLike): TensorSlice<T> {
    return TensorSlice.path(this, index);
  }

  /**
   * View of the elements in `bounds`
   */
  slice(bounds: RangeLike): TensorSlice<T> {
    return TensorSlice.bounded(this, toRange(bounds));
  }

  // =============================================================================
  // Writes
  // =============================================================================

  /**
   * Overwrite element `index` in the base buffer
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError}
   */
  setAt(index: number, value: TensorLike<T>): void {
    this.writeThrough('setAt', TensorSlice.element(this, index), value);
  }

  /**
   * Overwrite the sub-tensor addressed by a coordinate list
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError}
   */
  set(index: IndexLike, value: TensorLike<T>): void {
    this.writeThrough('set', TensorSlice.path(this, index), value);
  }

  /**
   * Overwrite the elements in `bounds`
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError}
   */
  setSlice(bounds: RangeLike, value: TensorLike<T>): void {
    this.writeThrough('setSlice', TensorSlice.bounded(this, toRange(bounds)), value);
  }

  // =============================================================================
  // Comparison
  // =============================================================================

  unitsEqual(other: TensorLike<T>): boolean {
    return unitsEqual(this, other);
  }

  elementsEqual(other: TensorLike<T>): boolean {
    return elementsEqual(this, other);
  }

  /**
   * Alias of {@link elementsEqual}
   */
  equals(other: TensorLike<T>): boolean {
    return elementsEqual(this, other);
  }

  isIsomorphic(other: TensorLike<T>): boolean {
    return isIsomorphic(this, other);
  }

  isSimilar(other: TensorLike<T>): boolean {
    return isSimilar(this, other);
  }

  // =============================================================================
  // Conversion
  // =============================================================================

  /**
   * Owning copy of the viewed sub-tensor
   */
  toTensor(): Tensor<T> {
    return Tensor.fromShape(this.shape, this.units);
  }

  /**
   * Owning copy of the viewed units in `shape`
   *
   * @returns `null` if the sizes differ
   */
  reshaped(shape: ShapeLike): Tensor<T> | null {
    const target = TensorShape.from(shape);
    if (target.contiguousSize !== this.shape.contiguousSize) {
      log.debug(`cannot reshape ${formatShape(this.shape)} to ${formatShape(target)}: sizes differ`);
      return null;
    }
    return Tensor.fromShape(target, this.units);
  }

  toString(options?: FormatOptions): string {
    return formatTensor(this, options);
  }

  *[Symbol.iterator](): Iterator<TensorSlice<T>> {
    const { start, end } = this.indices;
    for (let i = start; i < end; i++) {
      yield this.at(i);
    }
  }

  // =============================================================================
  // Internal Helpers
  // =============================================================================

  private checkFresh(): void {
    const current = this.base.storage.generation;
    if (current === this.viewGeneration) {
      return;
    }
    if (getConfig().checkStaleViews) {
      throw new StaleViewError(this.viewGeneration, current);
    }
    log.warn(
      `slice from generation ${this.viewGeneration.toString()} used after its base moved to generation ${current.toString()}`,
    );
  }

  private unitOffset(operation: string, at: UnitPosition): number {
    if (typeof at === 'number') {
      const r = this.unitRange;
      assertInRange(operation, at, range(0, rangeCount(r)));
      return r.start + at;
    }
    const target = TensorSlice.path(this, at).unitRange;
    if (rangeCount(target) === 0) {
      throw new IndexOutOfRangeError(operation, TensorIndex.from(at).toString(), target);
    }
    return target.start;
  }

  private writeThrough(operation: string, target: TensorSlice<T>, value: TensorLike<T>): void {
    if (!target.shape.isIsomorphic(value.shape)) {
      throw new ShapeMismatchError(operation, formatShape(target.shape), formatShape(value.shape), {
        expected: [...target.shape.dims],
        actual: [...value.shape.dims],
      });
    }
    this.base.storage.write(target.unitRange.start, value.units);
  }
}
