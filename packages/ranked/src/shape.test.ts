import { describe, it, expect } from 'vitest';
import { InvalidElementTypeError, TensorShape } from '@ndstore/core';
import { isRankedShape, toDynamicShape, toRankedShape } from './shape';

describe('RankedShape', () => {
  it('should check the number of dimensions', () => {
    expect(isRankedShape([4, 3], 2)).toBe(true);
    expect(isRankedShape([4, 3], 3)).toBe(false);
    expect(isRankedShape([], 0)).toBe(true);
  });

  it('should narrow dynamic shapes of the right rank', () => {
    expect(toRankedShape(TensorShape.of(4, 3), 2)).toEqual([4, 3]);
    expect(() => toRankedShape(TensorShape.of(4, 3), 3)).toThrow(InvalidElementTypeError);
    expect(() => toRankedShape(TensorShape.of(4, 3), 3)).toThrow(
      'Invalid element type: expected a rank-3 value, got rank 2',
    );
  });

  it('should convert back to a dynamic shape', () => {
    const shape = toDynamicShape([2, 3, 4]);

    expect(shape.dims).toEqual([2, 3, 4]);
    expect(shape.contiguousSize).toBe(24);
  });
});
