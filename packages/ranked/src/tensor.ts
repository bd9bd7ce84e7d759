/**
 * Owning tensor whose rank is part of its type
 */

import { InvalidElementTypeError } from '@ndstore/core';
import type {
  FormatOptions,
  Range,
  RangeLike,
  Tensor,
  TensorLike,
  TensorShape,
  UnitPosition,
} from '@ndstore/core';
import type { ElementOf, Rank, SliceElementOf } from './rank';
import { toRankedShape, type RankedShape } from './shape';
import { RankedTensorSlice } from './slice';

// =============================================================================
// Ranked Tensor
// =============================================================================

/**
 * Rank-N wrapper over a dynamic {@link Tensor}
 *
 * Elements come back as the closed {@link ElementOf} union for the rank, so a
 * matrix yields vectors and a vector yields values.
 *
 * @example
 * const m = increasingFrom(R2, [2, 3], 0);
 * const row = m.at(1);       // { kind: 'tensor', tensor: RankedTensor<1, number> }
 * row.tensor.scalarAt(2);    // 5
 */
export class RankedTensor<N extends number, T>
  implements TensorLike<T>, Iterable<ElementOf<N, T>>
{
  private constructor(
    readonly rankTag: Rank<N>,
    private readonly tensor: Tensor<T>,
  ) {}

  /**
   * Wrap a dynamic tensor without copying
   *
   * @throws {InvalidElementTypeError} If the tensor's rank is not N
   */
  static wrap<N extends number, T>(rank: Rank<N>, tensor: Tensor<T>): RankedTensor<N, T> {
    if (tensor.shape.rank !== rank.rank) {
      throw new InvalidElementTypeError(rank.rank, tensor.shape.rank);
    }
    return new RankedTensor(rank, tensor);
  }

  // ===========================================================================
  // Shape
  // ===========================================================================

  get rank(): N {
    return this.rankTag.rank;
  }

  get shape(): TensorShape {
    return this.tensor.shape;
  }

  /** Dimensions as a fixed-length tuple */
  get dims(): RankedShape<N> {
    return toRankedShape(this.tensor.shape, this.rankTag.rank);
  }

  get elementShape(): TensorShape | null {
    return this.tensor.elementShape;
  }

  get isScalar(): boolean {
    return this.tensor.isScalar;
  }

  get count(): number {
    return this.tensor.count;
  }

  get indices(): Range {
    return this.tensor.indices;
  }

  get units(): readonly T[] {
    return this.tensor.units;
  }

  get unitCount(): number {
    return this.tensor.unitCount;
  }

  // ===========================================================================
  // Units
  // ===========================================================================

  unit(at: UnitPosition): T {
    return this.tensor.unit(at);
  }

  updateUnit(at: UnitPosition, value: T): void {
    this.tensor.updateUnit(at, value);
  }

  incrementUnit(this: RankedTensor<N, number>, at: UnitPosition, by: number): void {
    this.tensor.incrementUnit(at, by);
  }

  decrementUnit(this: RankedTensor<N, number>, at: UnitPosition, by: number): void {
    this.tensor.decrementUnit(at, by);
  }

  multiplyUnit(this: RankedTensor<N, number>, at: UnitPosition, by: number): void {
    this.tensor.multiplyUnit(at, by);
  }

  divideUnit(this: RankedTensor<N, number>, at: UnitPosition, by: number): void {
    this.tensor.divideUnit(at, by);
  }

  // ===========================================================================
  // Elements
  // ===========================================================================

  at(index: number): ElementOf<N, T> {
    return this.rankTag.wrapElement(this.tensor.at(index));
  }

  /** Value at `index` of a vector */
  scalarAt(this: RankedTensor<1, T>, index: number): T {
    return this.tensor.at(index).unit(0);
  }

  setAt(index: number, element: ElementOf<N, T>): void {
    this.tensor.setAt(index, this.rankTag.unwrapElement(element));
  }

  append(element: ElementOf<N, T>): void {
    this.tensor.append(this.rankTag.unwrapElement(element));
  }

  appendContentsOf(other: RankedTensor<N, T> | RankedTensorSlice<N, T>): void {
    this.tensor.appendContentsOf(other);
  }

  remove(index: number): ElementOf<N, T> {
    return this.rankTag.wrapElement(this.tensor.remove(index));
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  slice(bounds: RangeLike): RankedTensorSlice<N, T> {
    return RankedTensorSlice.wrap(this.rankTag, this.tensor.slice(bounds));
  }

  view(index: number): SliceElementOf<N, T> {
    return this.rankTag.wrapSliceElement(this.tensor.view(index));
  }

  asSlice(): RankedTensorSlice<N, T> {
    return RankedTensorSlice.wrap(this.rankTag, this.tensor.asSlice());
  }

  // ===========================================================================
  // Comparison
  // ===========================================================================

  unitsEqual(other: TensorLike<T>): boolean {
    return this.tensor.unitsEqual(other);
  }

  elementsEqual(other: TensorLike<T>): boolean {
    return this.tensor.elementsEqual(other);
  }

  equals(other: TensorLike<T>): boolean {
    return this.tensor.equals(other);
  }

  isIsomorphic(other: TensorLike<T>): boolean {
    return this.tensor.isIsomorphic(other);
  }

  isSimilar(other: TensorLike<T>): boolean {
    return this.tensor.isSimilar(other);
  }

  // ===========================================================================
  // Conversion
  // ===========================================================================

  /** Owning dynamic copy */
  toDynamic(): Tensor<T> {
    return this.tensor.clone();
  }

  clone(): RankedTensor<N, T> {
    return new RankedTensor(this.rankTag, this.tensor.clone());
  }

  toString(options?: FormatOptions): string {
    return this.tensor.toString(options);
  }

  *[Symbol.iterator](): Iterator<ElementOf<N, T>> {
    for (const element of this.tensor) {
      yield this.rankTag.wrapElement(element);
    }
  }
}
