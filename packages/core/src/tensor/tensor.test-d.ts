/**
 * Type-level tests for tensors and slices
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import { Tensor } from './tensor';
import { TensorSlice } from './slice';
import type { TensorLike } from './types';
import { increasingFrom, repeating } from './creation';

describe('Tensor types', () => {
  it('should infer the unit type from construction', () => {
    expectTypeOf(Tensor.fromShape([2], ['a', 'b'])).toEqualTypeOf<Tensor<string>>();
    expectTypeOf(repeating([2, 2], true)).toEqualTypeOf<Tensor<boolean>>();
    expectTypeOf(increasingFrom([3], 0)).toEqualTypeOf<Tensor<number>>();
  });

  it('should return copies from element access and views from slicing', () => {
    const t = increasingFrom([3, 4], 0);

    expectTypeOf(t.at(0)).toEqualTypeOf<Tensor<number>>();
    expectTypeOf(t.view(0)).toEqualTypeOf<TensorSlice<number>>();
    expectTypeOf(t.view(0).at(1)).toEqualTypeOf<TensorSlice<number>>();
    expectTypeOf(t.reshaped([12])).toEqualTypeOf<Tensor<number> | null>();
    expectTypeOf(t.unit(0)).toEqualTypeOf<number>();
  });

  it('should accept tensors and slices wherever a value is written', () => {
    expectTypeOf<Tensor<number>>().toMatchTypeOf<TensorLike<number>>();
    expectTypeOf<TensorSlice<number>>().toMatchTypeOf<TensorLike<number>>();
    expectTypeOf<Tensor<number>['setAt']>().parameter(1).toEqualTypeOf<TensorLike<number>>();
  });

  it('should offer numeric unit updates on numeric tensors', () => {
    expectTypeOf<Tensor<number>['incrementUnit']>().thisParameter.toEqualTypeOf<Tensor<number>>();
  });
});
