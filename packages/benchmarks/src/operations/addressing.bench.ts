/**
 * Addressing benchmarks
 *
 * Unit reads by offset and by coordinates, element copies against views,
 * and appends that reallocate the buffer.
 */

import { bench, describe } from 'vitest';
import { Tensor, TensorIndex, increasingFrom, repeating } from '@ndstore/core';
import { R2, increasingFrom as increasingRanked } from '@ndstore/ranked';
import { MATRIX_SIZES, TENSOR_3D_SIZES, VECTOR_SIZES } from '../utils/sizes';

describe('unit access', () => {
  for (const size of [...MATRIX_SIZES, ...TENSOR_3D_SIZES]) {
    const tensor = increasingFrom(size.shape, 0);
    const index = TensorIndex.from(size.shape.map((dim) => dim - 1));

    bench(`unit by offset ${size.name} ${size.shape.join('x')}`, () => {
      tensor.unit(size.elements - 1);
    });

    bench(`unit by coordinates ${size.name} ${size.shape.join('x')}`, () => {
      tensor.unit(index);
    });
  }
});

describe('element copies and views', () => {
  for (const size of MATRIX_SIZES) {
    const tensor = increasingFrom(size.shape, 0);

    bench(`at ${size.name} ${size.shape.join('x')}`, () => {
      tensor.at(0);
    });

    bench(`view ${size.name} ${size.shape.join('x')}`, () => {
      tensor.view(0).unit(0);
    });

    bench(`write through view ${size.name} ${size.shape.join('x')}`, () => {
      tensor.view(0).updateUnit(0, 1);
    });
  }
});

describe('growth', () => {
  for (const size of VECTOR_SIZES) {
    bench(`append ${size.name} scalars`, () => {
      const tensor = Tensor.empty<number>();
      for (let i = 0; i < size.elements; i++) {
        tensor.append(Tensor.scalar(i));
      }
    });
  }

  bench('append rows to a 100x100 matrix', () => {
    const matrix = repeating([0, 100], 0);
    const row = repeating([100], 1);
    for (let i = 0; i < 100; i++) {
      matrix.append(row);
    }
  });
});

describe('ranked wrappers', () => {
  const matrix = increasingRanked(R2, [100, 100], 0);

  bench('ranked row copy 100x100', () => {
    matrix.at(50);
  });

  bench('ranked row view 100x100', () => {
    matrix.view(50).tensor.at(0);
  });
});
