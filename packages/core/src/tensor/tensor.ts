/**
 * Dynamic-rank tensor owning a contiguous row-major buffer
 *
 * A tensor is a growable sequence of elements along its leading axis. Every
 * element has the same {@link Tensor.elementShape}; a tensor without an
 * element shape is a scalar holding exactly one unit.
 */

import { TensorShape, formatShape } from '../shape/runtime';
import { TensorIndex } from '../index/tensor-index';
import {
  EMPTY_RANGE,
  assertInRange,
  assertRangeWithin,
  formatRange,
  range,
  rangeCount,
  toRange,
  type Range,
  type RangeLike,
} from '../index/range';
import { UnitStorage } from '../storage/unit-storage';
import { IndexOutOfRangeError, ShapeMismatchError, ShapeViolationError } from '../errors';
import { Logger } from '../logger';
import { TensorSlice } from './slice';
import { elementsEqual, isIsomorphic, isSimilar, unitsEqual } from './equality';
import { formatTensor } from './format';
import type { FormatOptions, IndexLike, ShapeLike, TensorLike, UnitPosition } from './types';

const log = Logger.child('[tensor]');

// =============================================================================
// Tensor Class
// =============================================================================

/**
 * Owning tensor of units of type `T`
 *
 * Element reads (`at`, `get`, iteration) return copies. Views over the same
 * buffer come from `slice`, `view`, `viewAt` and `asSlice`.
 *
 * @example
 * const t = Tensor.fromShape([2, 3], [1, 2, 3, 4, 5, 6]);
 * t.at(1).units;            // [4, 5, 6]
 * t.unit([1, 2]);           // 6
 * t.append(Tensor.fromShape([3], [7, 8, 9]));
 * t.shape.dims;             // [3, 3]
 */
export class Tensor<T> implements TensorLike<T>, Iterable<Tensor<T>> {
  private readonly _storage: UnitStorage<T>;
  private readonly _elementShape: TensorShape | null;
  private _count: number;

  private constructor(elementShape: TensorShape | null, units: Iterable<T>, count: number) {
    this._elementShape = elementShape;
    this._storage = new UnitStorage(units);
    this._count = count;
  }

  // =============================================================================
  // Construction
  // =============================================================================

  /**
   * Zero elements of scalar element shape
   */
  static empty<T>(): Tensor<T> {
    return Tensor.withElementShape<T>(TensorShape.scalar);
  }

  /**
   * Zero elements of the given element shape
   */
  static withElementShape<T>(elementShape: ShapeLike): Tensor<T> {
    return new Tensor<T>(TensorShape.from(elementShape), [], 0);
  }

  static scalar<T>(value: T): Tensor<T> {
    return new Tensor<T>(null, [value], 1);
  }

  /**
   * Tensor of `shape` from units in row-major order
   *
   * Units beyond `shape.contiguousSize` are ignored. Missing units are taken
   * from `vacancySupplier` when one is given.
   *
   * @throws {ShapeViolationError} If fewer units than the shape requires are
   * available
   */
  static fromShape<T>(shape: ShapeLike, units: Iterable<T>, vacancySupplier?: () => T): Tensor<T> {
    const target = TensorShape.from(shape);
    const size = target.contiguousSize;

    const prefix: T[] = [];
    for (const unit of units) {
      if (prefix.length >= size) break;
      prefix.push(unit);
    }
    if (vacancySupplier !== undefined) {
      while (prefix.length < size) {
        prefix.push(vacancySupplier());
      }
    }
    if (prefix.length < size) {
      throw new ShapeViolationError(
        `${prefix.length.toString()} units supplied, shape ${formatShape(target)} requires ${size.toString()}`,
        { shape: [...target.dims] },
      );
    }

    if (target.isScalar) {
      return new Tensor<T>(null, prefix, 1);
    }
    return new Tensor<T>(target.dropFirst(), prefix, target.dim(0));
  }

  /**
   * Tensor whose buffer is `units`, split into elements of `elementShape`
   *
   * @throws {ShapeViolationError} If the unit count is not a whole number of
   * elements
   */
  static fromUnits<T>(elementShape: ShapeLike, units: Iterable<T>): Tensor<T> {
    const shape = TensorShape.from(elementShape);
    const buffer = [...units];
    const perElement = shape.contiguousSize;
    const whole = perElement === 0 ? buffer.length === 0 : buffer.length % perElement === 0;
    if (!whole) {
      throw new ShapeViolationError(
        `${buffer.length.toString()} units are not a whole number of elements of shape ${formatShape(shape)}`,
        { elementShape: [...shape.dims] },
      );
    }
    return new Tensor<T>(shape, buffer, perElement === 0 ? 0 : buffer.length / perElement);
  }

  /**
   * Concatenate elements of `elementShape` in order
   *
   * @throws {ShapeMismatchError} If any element has a different shape
   */
  static fromElements<T>(elementShape: ShapeLike, elements: Iterable<TensorLike<T>>): Tensor<T> {
    const tensor = Tensor.withElementShape<T>(elementShape);
    tensor.appendElements(elements);
    return tensor;
  }

  // =============================================================================
  // Properties
  // =============================================================================

  /**
   * Shape of one element; `null` for a scalar
   */
  get elementShape(): TensorShape | null {
    return this._elementShape;
  }

  get isScalar(): boolean {
    return this._elementShape === null;
  }

  /**
   * Units in one element; 0 for a scalar
   */
  get unitCountPerElement(): number {
    return this._elementShape?.contiguousSize ?? 0;
  }

  /**
   * Number of elements along the leading axis; a scalar counts as 1
   */
  get count(): number {
    return this.isScalar ? 1 : this._count;
  }

  /**
   * Valid element positions; empty for a scalar, which has no leading axis
   */
  get indices(): Range {
    return this.isScalar ? EMPTY_RANGE : range(0, this._count);
  }

  get shape(): TensorShape {
    return this._elementShape?.prepending(this._count) ?? TensorShape.scalar;
  }

  /**
   * Row-major copy of the buffer
   */
  get units(): readonly T[] {
    return this._storage.snapshot();
  }

  get unitCount(): number {
    return this._storage.length;
  }

  /**
   * Storage generation; advances whenever the buffer is reallocated
   */
  get generation(): number {
    return this._storage.generation;
  }

  /**
   * @internal Shared with slices over this tensor
   */
  get storage(): UnitStorage<T> {
    return this._storage;
  }

  // =============================================================================
  // Unit Access
  // =============================================================================

  /**
   * Unit at a flat offset, or the first unit addressed by a coordinate list
   *
   * @throws {IndexOutOfRangeError}
   */
  unit(at: UnitPosition): T {
    return this._storage.unitAt(this.unitOffset('unit', at));
  }

  /**
   * @throws {IndexOutOfRangeError}
   */
  updateUnit(at: UnitPosition, value: T): void {
    this._storage.setUnit(this.unitOffset('updateUnit', at), value);
  }

  incrementUnit(this: Tensor<number>, at: UnitPosition, by: number): void {
    this.updateUnit(at, this.unit(at) + by);
  }

  decrementUnit(this: Tensor<number>, at: UnitPosition, by: number): void {
    this.updateUnit(at, this.unit(at) - by);
  }

  multiplyUnit(this: Tensor<number>, at: UnitPosition, by: number): void {
    this.updateUnit(at, this.unit(at) * by);
  }

  divideUnit(this: Tensor<number>, at: UnitPosition, by: number): void {
    this.updateUnit(at, this.unit(at) / by);
  }

  /**
   * Offset of the first unit of element `index`
   */
  unitIndex(index: number): number {
    return this.unitCountPerElement * index;
  }

  /**
   * Unit range covered by the elements in `elements`
   */
  unitSubrange(elements: RangeLike): Range {
    const r = toRange(elements);
    return range(this.unitIndex(r.start), this.unitIndex(r.end));
  }

  // =============================================================================
  // Element Access
  // =============================================================================

  /**
   * Copy of element `index`
   *
   * @throws {IndexOutOfRangeError} If `index` is outside `indices` or the
   * tensor is a scalar
   */
  at(index: number): Tensor<T> {
    const elementShape = this.elementShapeFor('at', index);
    assertInRange('at', index, this.indices);
    return Tensor.fromShape(elementShape, this._storage.read(this.unitSubrange([index, index + 1])));
  }

  /**
   * Copy of the sub-tensor addressed by a coordinate prefix
   *
   * @throws {IndexOutOfRangeError}
   */
  get(index: IndexLike): Tensor<T> {
    const { offset, subshape } = this.locate(index);
    return Tensor.fromShape(
      subshape,
      this._storage.read(range(offset, offset + subshape.contiguousSize)),
    );
  }

  /**
   * Overwrite element `index`
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError} If `value` does not have the element shape
   */
  setAt(index: number, value: TensorLike<T>): void {
    const elementShape = this.elementShapeFor('setAt', index);
    assertInRange('setAt', index, this.indices);
    assertShape('setAt', elementShape, value);
    this._storage.write(this.unitIndex(index), value.units);
  }

  /**
   * Overwrite the sub-tensor addressed by a coordinate prefix
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError}
   */
  set(index: IndexLike, value: TensorLike<T>): void {
    const { offset, subshape } = this.locate(index);
    assertShape('set', subshape, value);
    this._storage.write(offset, value.units);
  }

  /**
   * Overwrite the elements in `bounds`
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError} If `value` is not `bounds.count` elements of
   * the element shape
   */
  setSlice(bounds: RangeLike, value: TensorLike<T>): void {
    const r = toRange(bounds);
    const elementShape = this.elementShapeFor('setSlice', formatRange(r));
    assertRangeWithin('setSlice', r, this.indices);
    assertShape('setSlice', elementShape.prepending(rangeCount(r)), value);
    this._storage.write(this.unitIndex(r.start), value.units);
  }

  // =============================================================================
  // Views
  // =============================================================================

  /**
   * View of the elements in `bounds`; indices stay those of this tensor
   */
  slice(bounds: RangeLike): TensorSlice<T> {
    return TensorSlice.bounded(this, toRange(bounds));
  }

  /**
   * View of element `index`
   */
  view(index: number): TensorSlice<T> {
    return TensorSlice.element(this, index);
  }

  /**
   * View of the sub-tensor addressed by a coordinate list
   */
  viewAt(index: IndexLike): TensorSlice<T> {
    return TensorSlice.path(this, index);
  }

  /**
   * View of the whole tensor
   */
  asSlice(): TensorSlice<T> {
    return TensorSlice.of(this);
  }

  // =============================================================================
  // Growth
  // =============================================================================

  /**
   * Append one element
   *
   * @throws {ShapeViolationError} If this tensor is a scalar
   * @throws {ShapeMismatchError} If `element` does not have the element shape
   */
  append(element: TensorLike<T>): void {
    const elementShape = this.growableElementShape('append');
    assertShape('append', elementShape, element);
    this.grow(element.units, 1, 'append');
  }

  /**
   * Append every element of another tensor or slice with the same element shape
   *
   * @throws {ShapeViolationError} If this tensor is a scalar
   * @throws {ShapeMismatchError}
   */
  appendContentsOf(other: TensorLike<T>): void {
    const elementShape = this.growableElementShape('appendContentsOf');
    if (other.elementShape === null || !other.elementShape.isIsomorphic(elementShape)) {
      throw new ShapeMismatchError(
        'appendContentsOf',
        `elements of shape ${formatShape(elementShape)}`,
        `elements of shape ${formatShape(other.elementShape)}`,
      );
    }
    this.grow(other.units, other.count, 'appendContentsOf');
  }

  /**
   * Append a sequence of elements; nothing is appended unless all match
   *
   * @throws {ShapeViolationError} If this tensor is a scalar
   * @throws {ShapeMismatchError}
   */
  appendElements(elements: Iterable<TensorLike<T>>): void {
    const elementShape = this.growableElementShape('appendElements');
    const { units, count } = flatten('appendElements', elementShape, elements);
    this.grow(units, count, 'appendElements');
  }

  /**
   * Remove element `index`
   *
   * @returns The removed element
   * @throws {IndexOutOfRangeError}
   */
  remove(index: number): Tensor<T> {
    const elementShape = this.elementShapeFor('remove', index);
    assertInRange('remove', index, this.indices);
    const before = this._storage.generation;
    const removed = this._storage.splice(this.unitSubrange([index, index + 1]), []);
    this.commitCount(this._count - 1, before, 'remove');
    return Tensor.fromShape(elementShape, removed);
  }

  /**
   * Replace the elements in `bounds` with `elements`
   *
   * Every replacement is shape-checked before the buffer is touched.
   *
   * @throws {IndexOutOfRangeError}
   * @throws {ShapeMismatchError}
   */
  replaceSubrange(bounds: RangeLike, elements: Iterable<TensorLike<T>>): void {
    const r = toRange(bounds);
    const elementShape = this.elementShapeFor('replaceSubrange', formatRange(r));
    assertRangeWithin('replaceSubrange', r, this.indices);
    const { units, count } = flatten('replaceSubrange', elementShape, elements);
    const before = this._storage.generation;
    this._storage.splice(this.unitSubrange(r), units);
    this.commitCount(this._count - rangeCount(r) + count, before, 'replaceSubrange');
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
   * Copy with the same shape and units
   */
  clone(): Tensor<T> {
    return new Tensor<T>(this._elementShape, this._storage.snapshot(), this._count);
  }

  /**
   * New tensor with the same units in `shape`
   *
   * @returns `null` if the sizes differ
   */
  reshaped(shape: ShapeLike): Tensor<T> | null {
    const target = TensorShape.from(shape);
    if (target.contiguousSize !== this.shape.contiguousSize) {
      log.debug(`cannot reshape ${formatShape(this.shape)} to ${formatShape(target)}: sizes differ`);
      return null;
    }
    return Tensor.fromShape(target, this._storage.snapshot());
  }

  toString(options?: FormatOptions): string {
    return formatTensor(this, options);
  }

  *[Symbol.iterator](): Iterator<Tensor<T>> {
    for (let i = 0; i < this.indices.end; i++) {
      yield this.at(i);
    }
  }

  // =============================================================================
  // Internal Helpers
  // =============================================================================

  private elementShapeFor(operation: string, index: number | string): TensorShape {
    if (this._elementShape === null) {
      throw new IndexOutOfRangeError(`${operation} on a scalar`, index, EMPTY_RANGE);
    }
    return this._elementShape;
  }

  private growableElementShape(operation: string): TensorShape {
    if (this._elementShape === null) {
      throw new ShapeViolationError(`${operation} needs a leading axis and the tensor is a scalar`);
    }
    return this._elementShape;
  }

  private unitOffset(operation: string, at: UnitPosition): number {
    const offset =
      typeof at === 'number' ? at : TensorIndex.from(at).contiguousIndex(this.shape);
    assertInRange(operation, offset, range(0, this._storage.length));
    return offset;
  }

  private locate(index: IndexLike): { offset: number; subshape: TensorShape } {
    const tensorIndex = TensorIndex.from(index);
    const offset = tensorIndex.contiguousIndex(this.shape);
    return { offset, subshape: this.shape.dropFirst(tensorIndex.count) };
  }

  private grow(units: readonly T[], added: number, reason: string): void {
    const before = this._storage.generation;
    this._storage.append(units);
    this.commitCount(this._count + added, before, reason);
  }

  /**
   * Record a new element count. Elements of size zero change the count
   * without touching the buffer, so the generation is advanced here.
   */
  private commitCount(count: number, generationBefore: number, reason: string): void {
    if (count !== this._count && this._storage.generation === generationBefore) {
      this._storage.invalidate(reason);
    }
    this._count = count;
  }
}

// =============================================================================
// Shape Checks
// =============================================================================

function assertShape<T>(operation: string, expected: TensorShape, value: TensorLike<T>): void {
  if (!expected.isIsomorphic(value.shape)) {
    throw new ShapeMismatchError(operation, formatShape(expected), formatShape(value.shape), {
      expected: [...expected.dims],
      actual: [...value.shape.dims],
    });
  }
}

/**
 * Shape-check every element, then concatenate their units
 */
function flatten<T>(
  operation: string,
  elementShape: TensorShape,
  elements: Iterable<TensorLike<T>>,
): { units: T[]; count: number } {
  const units: T[] = [];
  let count = 0;
  for (const element of elements) {
    assertShape(operation, elementShape, element);
    for (const unit of element.units) {
      units.push(unit);
    }
    count++;
  }
  return { units, count };
}
