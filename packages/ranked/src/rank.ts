/**
 * Rank tags and the closed element types they produce
 *
 * A rank tag is a runtime value carrying its rank as a literal type. It
 * knows how to wrap an element of a tensor of its rank into the tagged
 * {@link ElementOf} union and how to unwrap one for writing.
 */

import type { Subtract } from 'ts-arithmetic';
import { InvalidElementTypeError, Tensor } from '@ndstore/core';
import type { TensorLike, TensorSlice } from '@ndstore/core';
import { RankedTensor } from './tensor';
import { RankedTensorSlice } from './slice';

// =============================================================================
// Element Types
// =============================================================================

/**
 * Element of a rank-1 tensor
 */
export interface ScalarElement<T> {
  readonly kind: 'scalar';
  readonly value: T;
}

/**
 * Element of a rank-2 or higher tensor
 */
export interface TensorElement<E> {
  readonly kind: 'tensor';
  readonly tensor: E;
}

/**
 * Rank of the elements of a rank-N tensor
 */
export type ElementRank<N extends number> = Subtract<N, 1>;

/**
 * Element read from a rank-N tensor
 *
 * Rank-0 tensors have no elements, rank-1 elements are bare values and
 * everything above is an owning tensor one rank lower.
 */
export type ElementOf<N extends number, T> = N extends 0
  ? never
  : N extends 1
    ? ScalarElement<T>
    : TensorElement<RankedTensor<ElementRank<N>, T>>;

/**
 * Element read through a view of a rank-N tensor
 */
export type SliceElementOf<N extends number, T> = N extends 0
  ? never
  : N extends 1
    ? ScalarElement<T>
    : TensorElement<RankedTensorSlice<ElementRank<N>, T>>;

// =============================================================================
// Rank Tags
// =============================================================================

export interface Rank<N extends number> {
  readonly rank: N;
  /** Wrap an element copy of a rank-N tensor */
  wrapElement<T>(element: Tensor<T>): ElementOf<N, T>;
  /** Wrap an element view of a rank-N tensor */
  wrapSliceElement<T>(element: TensorSlice<T>): SliceElementOf<N, T>;
  /** Turn an element back into something a dynamic tensor accepts */
  unwrapElement<T>(element: ElementOf<N, T>): TensorLike<T>;
}

function expectScalar(element: TensorLike<unknown>): void {
  if (!element.isScalar) {
    throw new InvalidElementTypeError(0, element.shape.rank);
  }
}

export const R0: Rank<0> = {
  rank: 0,
  wrapElement: (element) => {
    throw new InvalidElementTypeError(0, element.shape.rank + 1, {
      reason: 'rank-0 tensors have no elements',
    });
  },
  wrapSliceElement: (element) => {
    throw new InvalidElementTypeError(0, element.shape.rank + 1, {
      reason: 'rank-0 tensors have no elements',
    });
  },
  unwrapElement: (element) => element,
};

export const R1: Rank<1> = {
  rank: 1,
  wrapElement: (element) => {
    expectScalar(element);
    return { kind: 'scalar', value: element.unit(0) };
  },
  wrapSliceElement: (element) => {
    expectScalar(element);
    return { kind: 'scalar', value: element.unit(0) };
  },
  unwrapElement: (element) => Tensor.scalar(element.value),
};

export const R2: Rank<2> = {
  rank: 2,
  wrapElement: (element) => ({ kind: 'tensor', tensor: RankedTensor.wrap(R1, element) }),
  wrapSliceElement: (element) => ({
    kind: 'tensor',
    tensor: RankedTensorSlice.wrap(R1, element),
  }),
  unwrapElement: (element) => element.tensor,
};

export const R3: Rank<3> = {
  rank: 3,
  wrapElement: (element) => ({ kind: 'tensor', tensor: RankedTensor.wrap(R2, element) }),
  wrapSliceElement: (element) => ({
    kind: 'tensor',
    tensor: RankedTensorSlice.wrap(R2, element),
  }),
  unwrapElement: (element) => element.tensor,
};

export const R4: Rank<4> = {
  rank: 4,
  wrapElement: (element) => ({ kind: 'tensor', tensor: RankedTensor.wrap(R3, element) }),
  wrapSliceElement: (element) => ({
    kind: 'tensor',
    tensor: RankedTensorSlice.wrap(R3, element),
  }),
  unwrapElement: (element) => element.tensor,
};
