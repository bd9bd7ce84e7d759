/**
 * Runtime tests for the owning Tensor
 */

import { describe, it, expect } from 'vitest';
import { Tensor } from './tensor';
import { increasingFrom, repeating, scalarElements } from './creation';
import { IndexOutOfRangeError, ShapeMismatchError, ShapeViolationError } from '../errors';
import { TensorIndex } from '../index/tensor-index';

const range = (start: number, end: number): number[] =>
  Array.from({ length: end - start }, (_, i) => start + i);

// =============================================================================
// Construction
// =============================================================================

describe('Tensor construction', () => {
  it('should build a tensor from a shape and row-major units', () => {
    const t = Tensor.fromShape([2, 3], [1, 2, 3, 4, 5, 6]);

    expect(t.shape.dims).toEqual([2, 3]);
    expect(t.elementShape?.dims).toEqual([3]);
    expect(t.count).toBe(2);
    expect(t.unitCount).toBe(6);
    expect(t.unitCountPerElement).toBe(3);
    expect(t.isScalar).toBe(false);
    expect(t.indices).toEqual({ start: 0, end: 2 });
  });

  it('should ignore units beyond the shape size', () => {
    expect(Tensor.fromShape([2], [1, 2, 3]).units).toEqual([1, 2]);
  });

  it('should reject too few units', () => {
    expect(() => Tensor.fromShape([2, 2], [1, 2, 3])).toThrow(ShapeViolationError);
    expect(() => Tensor.fromShape([2, 2], [1, 2, 3])).toThrow(
      'Shape violation: 3 units supplied, shape [2, 2] requires 4',
    );
  });

  it('should fill missing units from a vacancy supplier', () => {
    expect(Tensor.fromShape([2, 2], [1, 2], () => 0).units).toEqual([1, 2, 0, 0]);
  });

  it('should split a buffer into whole elements', () => {
    const t = Tensor.fromUnits([3], [1, 2, 3, 4, 5, 6]);

    expect(t.shape.dims).toEqual([2, 3]);
    expect(() => Tensor.fromUnits([3], [1, 2, 3, 4, 5])).toThrow(ShapeViolationError);
  });

  it('should concatenate elements', () => {
    const t = Tensor.fromElements(
      [2],
      [Tensor.fromShape([2], [1, 2]), Tensor.fromShape([2], [3, 4])],
    );

    expect(t.shape.dims).toEqual([2, 2]);
    expect(t.units).toEqual([1, 2, 3, 4]);
  });

  it('should start empty with scalar elements', () => {
    const t = Tensor.empty<number>();

    expect(t.isScalar).toBe(false);
    expect(t.count).toBe(0);
    expect(t.shape.dims).toEqual([0]);
    expect(t.elementShape?.dims).toEqual([]);
  });

  it('should start empty with a fixed element shape', () => {
    const t = Tensor.withElementShape<number>([4, 3]);

    expect(t.count).toBe(0);
    expect(t.shape.dims).toEqual([0, 4, 3]);
    expect(t.unitCountPerElement).toBe(12);
  });
});

// =============================================================================
// Scalars
// =============================================================================

describe('Scalar tensors', () => {
  const scalar = Tensor.scalar(5);

  it('should hold exactly one unit and count as one', () => {
    expect(scalar.isScalar).toBe(true);
    expect(scalar.elementShape).toBeNull();
    expect(scalar.count).toBe(1);
    expect(scalar.unitCountPerElement).toBe(0);
    expect(scalar.shape.dims).toEqual([]);
    expect(scalar.units).toEqual([5]);
  });

  it('should have no element positions', () => {
    expect(scalar.indices).toEqual({ start: 0, end: 0 });
    expect([...scalar]).toEqual([]);
  });

  it('should reject element access', () => {
    expect(() => scalar.at(0)).toThrow(IndexOutOfRangeError);
    expect(() => scalar.at(0)).toThrow(
      'Index 0 out of range for at on a scalar: valid range is [0, 0)',
    );
  });

  it('should read its unit by offset or empty index', () => {
    expect(scalar.unit(0)).toBe(5);
    expect(scalar.unit([])).toBe(5);
    expect(() => scalar.unit([0])).toThrow(IndexOutOfRangeError);
  });

  it('should refuse to grow', () => {
    expect(() => Tensor.scalar(1).append(Tensor.scalar(2))).toThrow(ShapeViolationError);
  });

  it('should be built from the scalar shape', () => {
    const t = Tensor.fromShape([], [9, 10]);

    expect(t.isScalar).toBe(true);
    expect(t.units).toEqual([9]);
  });
});

// =============================================================================
// Element Access
// =============================================================================

describe('Tensor element access', () => {
  const t = increasingFrom([3, 4, 5], 0);

  it('should hold increasing units in row-major order', () => {
    expect(t.units).toEqual(range(0, 60));
  });

  it('should copy contiguous blocks for leading indices', () => {
    expect(t.at(1).units).toEqual(range(20, 40));
    expect(t.at(1).at(3).units).toEqual(range(35, 40));
    expect(t.at(2).at(0).at(3).units).toEqual([43]);
    expect(t.at(2).at(0).at(3).isScalar).toBe(true);
  });

  it('should address sub-tensors by coordinate prefix', () => {
    expect(t.get([1, 3]).units).toEqual(range(35, 40));
    expect(t.get(TensorIndex.of(2, 0, 3)).units).toEqual([43]);
    expect(t.get([]).shape.dims).toEqual([3, 4, 5]);
  });

  it('should read units by offset or coordinates', () => {
    expect(t.unit(43)).toBe(43);
    expect(t.unit([2, 0, 3])).toBe(43);
    expect(t.unit([1])).toBe(20);
  });

  it('should fail on out-of-range indices rather than clamp', () => {
    const vector = Tensor.fromShape([3], [1, 2, 3]);

    expect(() => vector.at(5)).toThrow(IndexOutOfRangeError);
    expect(() => vector.at(-1)).toThrow(IndexOutOfRangeError);
    expect(() => t.get([0, 4])).toThrow(IndexOutOfRangeError);
    expect(() => t.unit(60)).toThrow(IndexOutOfRangeError);
  });

  it('should iterate over element copies', () => {
    const matrix = Tensor.fromShape([2, 2], [1, 2, 3, 4]);

    expect([...matrix].map((element) => element.units)).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('should map element ranges to unit ranges', () => {
    const matrix = increasingFrom([4, 3], 0);

    expect(matrix.unitIndex(2)).toBe(6);
    expect(matrix.unitSubrange([1, 3])).toEqual({ start: 3, end: 9 });
  });

  it('should return copies that do not alias the buffer', () => {
    const copy = t.at(0);
    copy.updateUnit(0, 999);

    expect(t.unit(0)).toBe(0);
  });
});

// =============================================================================
// Writes
// =============================================================================

describe('Tensor writes', () => {
  it('should assign a scalar taken from another tensor', () => {
    const matrix = increasingFrom([4, 3], 0);
    const other = Tensor.fromShape([2, 3], [10, 20, 30, 40, 50, 60]);

    matrix.set([0, 0], other.get([1, 1]));

    expect(matrix.unit([0, 0])).toBe(50);
    expect(matrix.unit(1)).toBe(1);
  });

  it('should overwrite a whole element', () => {
    const matrix = increasingFrom([4, 3], 0);
    matrix.setAt(1, Tensor.fromShape([3], [7, 8, 9]));

    expect(matrix.at(1).units).toEqual([7, 8, 9]);
    expect(matrix.unitCount).toBe(12);
  });

  it('should overwrite a range of elements', () => {
    const matrix = increasingFrom([4, 3], 0);
    matrix.setSlice([2, 4], repeating([2, 3], -1));

    expect(matrix.units).toEqual([0, 1, 2, 3, 4, 5, -1, -1, -1, -1, -1, -1]);
  });

  it('should reject values of the wrong shape', () => {
    const matrix = increasingFrom([4, 3], 0);

    expect(() => matrix.setAt(0, Tensor.fromShape([2], [1, 2]))).toThrow(ShapeMismatchError);
    expect(() => matrix.setAt(0, Tensor.fromShape([2], [1, 2]))).toThrow(
      'Shape mismatch in setAt: expected [3], got [2]',
    );
    expect(() => matrix.set([1], Tensor.scalar(1))).toThrow(ShapeMismatchError);
    expect(() => matrix.setSlice([0, 2], repeating([3, 3], 0))).toThrow(ShapeMismatchError);
    expect(matrix.units).toEqual(range(0, 12));
  });

  it('should update single units', () => {
    const t = Tensor.fromShape([2, 2], ['a', 'b', 'c', 'd']);
    t.updateUnit(3, 'z');
    t.updateUnit([0, 1], 'y');

    expect(t.units).toEqual(['a', 'y', 'c', 'z']);
  });

  it('should apply numeric unit updates', () => {
    const t = Tensor.fromShape([3], [1, 2, 3]);
    t.incrementUnit(0, 5);
    t.decrementUnit(1, 1);
    t.multiplyUnit(2, 4);
    t.divideUnit(0, 4);

    expect(t.units).toEqual([1.5, 1, 12]);
  });
});

// =============================================================================
// Growth
// =============================================================================

describe('Tensor growth', () => {
  it('should restore the buffer after appending then removing an element', () => {
    const t = increasingFrom([2, 3], 0);
    const before = t.units;

    t.append(Tensor.fromShape([3], [10, 11, 12]));
    expect(t.shape.dims).toEqual([3, 3]);

    const removed = t.remove(2);
    expect(removed.units).toEqual([10, 11, 12]);
    expect(removed.shape.dims).toEqual([3]);
    expect(t.units).toEqual(before);
    expect(t.shape.dims).toEqual([2, 3]);
  });

  it('should reject appending an element of another shape', () => {
    const t = increasingFrom([2, 3], 0);

    expect(() => t.append(Tensor.fromShape([2], [1, 2]))).toThrow(
      'Shape mismatch in append: expected [3], got [2]',
    );
    expect(t.count).toBe(2);
  });

  it('should append the contents of another tensor', () => {
    const a = increasingFrom([2, 4, 3], 0);
    const b = increasingFrom([3, 4, 3], 0);
    a.appendContentsOf(b);

    expect(a.shape.dims).toEqual([5, 4, 3]);
    expect(a.units).toEqual([...range(0, 24), ...range(0, 36)]);
  });

  it('should reject contents with a different element shape', () => {
    const a = increasingFrom([2, 4, 3], 0);

    expect(() => a.appendContentsOf(increasingFrom([2, 3, 4], 0))).toThrow(ShapeMismatchError);
    expect(() => a.appendContentsOf(Tensor.scalar(1))).toThrow(ShapeMismatchError);
  });

  it('should append nothing when any element mismatches', () => {
    const t = increasingFrom([2, 2], 0);

    expect(() =>
      t.appendElements([Tensor.fromShape([2], [4, 5]), Tensor.fromShape([3], [6, 7, 8])]),
    ).toThrow(ShapeMismatchError);
    expect(t.units).toEqual([0, 1, 2, 3]);
    expect(t.count).toBe(2);
  });

  it('should remove and report the removed element', () => {
    const t = increasingFrom([3, 2], 0);

    expect(t.remove(1).units).toEqual([2, 3]);
    expect(t.units).toEqual([0, 1, 4, 5]);
    expect(() => t.remove(2)).toThrow(IndexOutOfRangeError);
  });

  it('should replace a range of elements', () => {
    const t = increasingFrom([4, 2], 0);
    t.replaceSubrange([1, 3], [Tensor.fromShape([2], [10, 11])]);

    expect(t.units).toEqual([0, 1, 10, 11, 6, 7]);
    expect(t.count).toBe(3);
  });

  it('should validate every replacement before splicing', () => {
    const t = increasingFrom([4, 2], 0);

    expect(() =>
      t.replaceSubrange(
        [0, 1],
        [Tensor.fromShape([2], [1, 1]), Tensor.fromShape([3], [1, 1, 1])],
      ),
    ).toThrow(ShapeMismatchError);
    expect(() => t.replaceSubrange([3, 5], [])).toThrow(IndexOutOfRangeError);
    expect(t.units).toEqual(range(0, 8));
  });

  it('should grow a tensor of scalar elements', () => {
    const t = Tensor.empty<number>();
    t.append(Tensor.scalar(1));
    t.appendElements([Tensor.scalar(2), Tensor.scalar(3)]);

    expect(t.shape.dims).toEqual([3]);
    expect(t.units).toEqual([1, 2, 3]);
  });

  it('should count elements of size zero', () => {
    const t = Tensor.withElementShape<number>([0]);
    t.append(Tensor.fromShape([0], []));
    t.append(Tensor.fromShape([0], []));

    expect(t.count).toBe(2);
    expect(t.shape.dims).toEqual([2, 0]);
    expect(t.units).toEqual([]);
  });
});

// =============================================================================
// Generations
// =============================================================================

describe('Tensor storage generation', () => {
  it('should advance on reallocating edits only', () => {
    const t = increasingFrom([2, 3], 0);
    expect(t.generation).toBe(0);

    t.setAt(0, Tensor.fromShape([3], [9, 9, 9]));
    t.updateUnit(0, 1);
    expect(t.generation).toBe(0);

    t.append(Tensor.fromShape([3], [1, 2, 3]));
    expect(t.generation).toBe(1);

    t.remove(0);
    expect(t.generation).toBe(2);

    t.replaceSubrange([0, 1], [Tensor.fromShape([3], [4, 5, 6])]);
    expect(t.generation).toBe(2);
  });

  it('should advance when zero-size elements change the count', () => {
    const t = Tensor.withElementShape<number>([0]);
    t.append(Tensor.fromShape([0], []));

    expect(t.generation).toBe(1);
  });
});

// =============================================================================
// Comparison
// =============================================================================

describe('Tensor comparison', () => {
  it('should distinguish unit equality from element equality', () => {
    const units = range(0, 12);
    const a = Tensor.fromShape([1, 4, 3], units);
    const b = Tensor.fromShape([4, 3], units);

    expect(a.unitsEqual(b)).toBe(true);
    expect(a.elementsEqual(b)).toBe(false);
    expect(a.equals(b)).toBe(false);
    expect(a.isSimilar(b)).toBe(true);
    expect(a.isIsomorphic(b)).toBe(false);
  });

  it('should treat a singleton cube as similar to a scalar', () => {
    const cube = Tensor.fromShape([1, 1, 1], [100]);
    const scalar = Tensor.scalar(100);

    expect(cube.isSimilar(scalar)).toBe(true);
    expect(cube.isIsomorphic(scalar)).toBe(false);
    expect(cube.unitsEqual(scalar)).toBe(true);
    expect(cube.elementsEqual(scalar)).toBe(false);
  });

  it('should compare shapes without looking at units', () => {
    const a = increasingFrom([2, 3], 0);
    const b = repeating([2, 3], 7);

    expect(a.isIsomorphic(b)).toBe(true);
    expect(a.unitsEqual(b)).toBe(false);
    expect(a.elementsEqual(b)).toBe(false);
    expect(a.elementsEqual(increasingFrom([2, 3], 0))).toBe(true);
  });
});

// =============================================================================
// Conversion
// =============================================================================

describe('Tensor conversion', () => {
  it('should reshape into a new tensor of the same size', () => {
    const t = increasingFrom([2, 3], 0);
    const reshaped = t.reshaped([3, 2]);

    expect(reshaped?.shape.dims).toEqual([3, 2]);
    expect(reshaped?.units).toEqual(range(0, 6));

    reshaped?.updateUnit(0, 100);
    expect(t.unit(0)).toBe(0);
  });

  it('should return null when the sizes differ', () => {
    expect(increasingFrom([2, 3], 0).reshaped([4])).toBeNull();
  });

  it('should lay out a transposed shape over the same units', () => {
    const t = Tensor.fromShape([2, 3], [1, 2, 3, 4, 5, 6]);
    const transposed = t.reshaped(t.shape.transpose());

    expect(transposed?.shape.dims).toEqual([3, 2]);
    expect(transposed?.at(0).units).toEqual([1, 2]);
  });

  it('should clone into an independent tensor', () => {
    const t = increasingFrom([2, 2], 0);
    const copy = t.clone();
    copy.append(Tensor.fromShape([2], [4, 5]));

    expect(t.count).toBe(2);
    expect(copy.count).toBe(3);
    expect(t.generation).toBe(0);
  });

  it('should render nested brackets', () => {
    expect(scalarElements(1, 6).toString()).toBe('[1, 2, 3, 4, 5]');
    expect(Tensor.fromShape([2, 3], [1, 2, 3, 4, 5, 6]).toString()).toBe('[[1, 2, 3], [4, 5, 6]]');
    expect(increasingFrom([2, 3, 2], 1).toString()).toBe(
      '[[[1, 2], [3, 4], [5, 6]], [[7, 8], [9, 10], [11, 12]]]',
    );
    expect(Tensor.scalar(42).toString()).toBe('42');
  });
});
