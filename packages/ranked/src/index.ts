/**
 * @ndstore/ranked
 *
 * Tensors and slices whose rank is fixed in the type, with closed element
 * types per rank.
 */

export { R0, R1, R2, R3, R4 } from './rank';
export type {
  Rank,
  ElementOf,
  ElementRank,
  SliceElementOf,
  ScalarElement,
  TensorElement,
} from './rank';
export { isRankedShape, toRankedShape, toDynamicShape } from './shape';
export type { RankedShape } from './shape';
export { RankedTensor } from './tensor';
export { RankedTensorSlice } from './slice';
export {
  wrap,
  ranked,
  repeating,
  fromSupplier,
  increasingFrom,
  scalarElements,
  scalarElementsClosed,
} from './creation';
export type { Scalar, Vector, Matrix, Tensor3D, Tensor4D } from './creation';
