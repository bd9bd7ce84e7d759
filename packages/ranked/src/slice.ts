/**
 * Zero-copy view whose rank is part of its type
 */

import { InvalidElementTypeError } from '@ndstore/core';
import type {
  FormatOptions,
  Range,
  RangeLike,
  TensorLike,
  TensorShape,
  TensorSlice,
  UnitPosition,
} from '@ndstore/core';
import type { ElementOf, Rank, SliceElementOf } from './rank';
import { toRankedShape, type RankedShape } from './shape';
import { RankedTensor } from './tensor';

/**
 * Rank-N wrapper over a {@link TensorSlice}
 *
 * Reads see the base tensor's current units and writes land in its buffer.
 * The same staleness rules as the dynamic slice apply.
 */
export class RankedTensorSlice<N extends number, T>
  implements TensorLike<T>, Iterable<SliceElementOf<N, T>>
{
  private constructor(
    readonly rankTag: Rank<N>,
    private readonly view: TensorSlice<T>,
  ) {}

  /**
   * @throws {InvalidElementTypeError} If the slice's rank is not N
   */
  static wrap<N extends number, T>(rank: Rank<N>, slice: TensorSlice<T>): RankedTensorSlice<N, T> {
    if (slice.shape.rank !== rank.rank) {
      throw new InvalidElementTypeError(rank.rank, slice.shape.rank);
    }
    return new RankedTensorSlice(rank, slice);
  }

  get rank(): N {
    return this.rankTag.rank;
  }

  get shape(): TensorShape {
    return this.view.shape;
  }

  get dims(): RankedShape<N> {
    return toRankedShape(this.view.shape, this.rankTag.rank);
  }

  get elementShape(): TensorShape | null {
    return this.view.elementShape;
  }

  get isScalar(): boolean {
    return this.view.isScalar;
  }

  get count(): number {
    return this.view.count;
  }

  /** Element indices, numbered as in the base tensor */
  get indices(): Range {
    return this.view.indices;
  }

  get unitRange(): Range {
    return this.view.unitRange;
  }

  get units(): readonly T[] {
    return this.view.units;
  }

  get isStale(): boolean {
    return this.view.isStale;
  }

  unit(at: UnitPosition): T {
    return this.view.unit(at);
  }

  updateUnit(at: UnitPosition, value: T): void {
    this.view.updateUnit(at, value);
  }

  at(index: number): SliceElementOf<N, T> {
    return this.rankTag.wrapSliceElement(this.view.at(index));
  }

  setAt(index: number, element: ElementOf<N, T>): void {
    this.view.setAt(index, this.rankTag.unwrapElement(element));
  }

  slice(bounds: RangeLike): RankedTensorSlice<N, T> {
    return new RankedTensorSlice(this.rankTag, this.view.slice(bounds));
  }

  unitsEqual(other: TensorLike<T>): boolean {
    return this.view.unitsEqual(other);
  }

  elementsEqual(other: TensorLike<T>): boolean {
    return this.view.elementsEqual(other);
  }

  equals(other: TensorLike<T>): boolean {
    return this.view.equals(other);
  }

  isIsomorphic(other: TensorLike<T>): boolean {
    return this.view.isIsomorphic(other);
  }

  isSimilar(other: TensorLike<T>): boolean {
    return this.view.isSimilar(other);
  }

  /** Copy the viewed units into an owning ranked tensor */
  toTensor(): RankedTensor<N, T> {
    return RankedTensor.wrap(this.rankTag, this.view.toTensor());
  }

  toString(options?: FormatOptions): string {
    return this.view.toString(options);
  }

  *[Symbol.iterator](): Iterator<SliceElementOf<N, T>> {
    for (const element of this.view) {
      yield this.rankTag.wrapSliceElement(element);
    }
  }
}
