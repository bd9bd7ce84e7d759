/**
 * Type-level tests for ranked element types
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import { R1, R2, R3 } from './rank';
import type { ElementOf, ElementRank, ScalarElement, SliceElementOf, TensorElement } from './rank';
import type { RankedShape } from './shape';
import type { RankedTensor } from './tensor';
import type { RankedTensorSlice } from './slice';
import { increasingFrom, repeating, scalarElements } from './creation';

describe('Element types', () => {
  it('should close the element type per rank', () => {
    expectTypeOf<ElementOf<0, number>>().toEqualTypeOf<never>();
    expectTypeOf<ElementOf<1, number>>().toEqualTypeOf<ScalarElement<number>>();
    expectTypeOf<ElementOf<2, number>>().toEqualTypeOf<
      TensorElement<RankedTensor<1, number>>
    >();
    expectTypeOf<SliceElementOf<3, string>>().toEqualTypeOf<
      TensorElement<RankedTensorSlice<2, string>>
    >();
  });

  it('should lower the rank by one', () => {
    expectTypeOf<ElementRank<4>>().toEqualTypeOf<3>();
    expectTypeOf<ElementRank<1>>().toEqualTypeOf<0>();
  });
});

describe('Ranked tensors', () => {
  it('should infer the rank from the tag', () => {
    expectTypeOf(repeating(R3, [1, 2, 3], 0)).toEqualTypeOf<RankedTensor<3, number>>();
    expectTypeOf(scalarElements(0, 3)).toEqualTypeOf<RankedTensor<1, number>>();
    expectTypeOf(R2.rank).toEqualTypeOf<2>();
  });

  it('should type elements and views', () => {
    const m = increasingFrom(R2, [2, 3], 0);

    expectTypeOf(m.at(0)).toEqualTypeOf<TensorElement<RankedTensor<1, number>>>();
    expectTypeOf(m.at(0).tensor.at(1)).toEqualTypeOf<ScalarElement<number>>();
    expectTypeOf(m.view(0).tensor).toEqualTypeOf<RankedTensorSlice<1, number>>();
    expectTypeOf(m.slice([0, 1])).toEqualTypeOf<RankedTensorSlice<2, number>>();
    expectTypeOf(m.dims).toEqualTypeOf<RankedShape<2>>();
  });

  it('should restrict scalarAt to vectors', () => {
    expectTypeOf(scalarElements(0, 3).scalarAt(1)).toEqualTypeOf<number>();
    expectTypeOf(R1.wrapElement<string>).returns.toEqualTypeOf<ScalarElement<string>>();
  });
});
