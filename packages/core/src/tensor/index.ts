/**
 * Tensor module exports
 *
 * @module tensor
 *
 * The owning {@link Tensor}, its zero-copy {@link TensorSlice} views and the
 * creation helpers.
 */

export { Tensor } from './tensor';
export { TensorSlice } from './slice';
export type { SliceParent } from './slice';
export {
  repeating,
  fromSupplier,
  increasingFrom,
  scalarElements,
  scalarElementsClosed,
} from './creation';
export { unitsEqual, elementsEqual, isIsomorphic, isSimilar } from './equality';
export { formatTensor, formatValue } from './format';
export type { TensorLike, ShapeLike, IndexLike, UnitPosition, FormatOptions } from './types';
