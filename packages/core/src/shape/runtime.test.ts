/**
 * Runtime tests for the shape system
 *
 * These tests validate the runtime behavior of the TensorShape class and
 * its utility functions.
 */

import { describe, it, expect } from 'vitest';
import { TensorShape, computeSize, computeStrides, formatShape } from './runtime';
import { TensorIndex } from '../index/tensor-index';
import { IndexOutOfRangeError, ShapeViolationError } from '../errors';

// =============================================================================
// TensorShape Class Tests
// =============================================================================

describe('TensorShape', () => {
  describe('Construction and Basic Properties', () => {
    it('should create a shape from valid dimensions', () => {
      const shape = new TensorShape([3, 4, 5]);

      expect(shape.dims).toEqual([3, 4, 5]);
      expect(shape.rank).toBe(3);
      expect(shape.contiguousSize).toBe(60);
      expect(shape.strides).toEqual([20, 5, 1]);
      expect(shape.isScalar).toBe(false);
    });

    it('should handle the scalar shape', () => {
      const scalar = TensorShape.scalar;

      expect(scalar.dims).toEqual([]);
      expect(scalar.rank).toBe(0);
      expect(scalar.contiguousSize).toBe(1);
      expect(scalar.strides).toEqual([]);
      expect(scalar.isScalar).toBe(true);
    });

    it('should allow zero-sized dimensions', () => {
      const shape = TensorShape.of(2, 0, 3);

      expect(shape.contiguousSize).toBe(0);
      expect(shape.strides).toEqual([0, 3, 1]);
    });

    it('should reject negative or fractional dimensions', () => {
      expect(() => new TensorShape([2, -1])).toThrow(ShapeViolationError);
      expect(() => new TensorShape([1.5])).toThrow(ShapeViolationError);
      expect(() => new TensorShape([2, -1])).toThrow(
        'Shape violation: invalid dimension -1 at index 1: dimensions must be non-negative integers',
      );
    });

    it('should reject shapes larger than the maximum tensor size', () => {
      expect(() => TensorShape.of(2 ** 30, 2 ** 30, 2 ** 30)).toThrow(ShapeViolationError);
    });

    it('should pass existing shapes through from()', () => {
      const shape = TensorShape.of(2, 3);

      expect(TensorShape.from(shape)).toBe(shape);
      expect(TensorShape.from([2, 3]).equals(shape)).toBe(true);
    });

    it('should iterate over its dimensions', () => {
      expect([...TensorShape.of(4, 1, 2)]).toEqual([4, 1, 2]);
    });
  });

  describe('Dimension Access', () => {
    it('should return the size of a dimension', () => {
      const shape = TensorShape.of(3, 4, 5);

      expect(shape.dim(0)).toBe(3);
      expect(shape.dim(2)).toBe(5);
    });

    it('should reject axes outside the rank', () => {
      const shape = TensorShape.of(3, 4);

      expect(() => shape.dim(2)).toThrow(IndexOutOfRangeError);
      expect(() => shape.dim(-1)).toThrow(IndexOutOfRangeError);
    });
  });

  describe('Derivation', () => {
    it('should drop leading dimensions', () => {
      const shape = TensorShape.of(3, 4, 5);

      expect(shape.dropFirst().dims).toEqual([4, 5]);
      expect(shape.dropFirst(2).dims).toEqual([5]);
      expect(shape.dropFirst(3).dims).toEqual([]);
    });

    it('should return an equal shape when dropping nothing', () => {
      const shape = TensorShape.of(3, 4, 5);

      expect(shape.dropFirst(0).equals(shape)).toBe(true);
    });

    it('should reject dropping more dimensions than the rank', () => {
      expect(() => TensorShape.of(3, 4).dropFirst(3)).toThrow(IndexOutOfRangeError);
      expect(() => TensorShape.of(3, 4).dropFirst(-1)).toThrow(IndexOutOfRangeError);
    });

    it('should prepend, append and take prefixes', () => {
      const shape = TensorShape.of(4, 5);

      expect(shape.prepending(3).dims).toEqual([3, 4, 5]);
      expect(shape.appending(6).dims).toEqual([4, 5, 6]);
      expect(TensorShape.of(3, 4, 5).prefix(2).dims).toEqual([3, 4]);
      expect(shape.prefix(0).dims).toEqual([]);
    });

    it('should reverse all dimensions on transpose', () => {
      expect(TensorShape.of(2, 3).transpose().dims).toEqual([3, 2]);
      expect(TensorShape.of(2, 3, 4).transpose().dims).toEqual([4, 3, 2]);
    });

    it('should compute the sub-shape left after indexing', () => {
      const shape = TensorShape.of(3, 4, 5);

      expect(shape.subshape(TensorIndex.of(1))?.dims).toEqual([4, 5]);
      expect(shape.subshape(TensorIndex.of(1, 2))?.dims).toEqual([5]);
      expect(shape.subshape(TensorIndex.of(1, 2, 3))).toBeNull();
    });
  });

  describe('Comparison', () => {
    it('should compare isomorphic shapes element-wise', () => {
      expect(TensorShape.of(4, 3).isIsomorphic(TensorShape.of(4, 3))).toBe(true);
      expect(TensorShape.of(4, 3).isIsomorphic(TensorShape.of(3, 4))).toBe(false);
      expect(TensorShape.of(1, 4, 3).isIsomorphic(TensorShape.of(4, 3))).toBe(false);
    });

    it('should treat leading 1-dimensions as similar', () => {
      expect(TensorShape.of(1, 4, 3).isSimilar(TensorShape.of(4, 3))).toBe(true);
      expect(TensorShape.of(4, 3).isSimilar(TensorShape.of(1, 1, 4, 3))).toBe(true);
      expect(TensorShape.of(1, 1, 1).isSimilar(TensorShape.scalar)).toBe(true);
      expect(TensorShape.of(1, 1, 1).isIsomorphic(TensorShape.scalar)).toBe(false);
    });

    it('should not strip non-leading or non-unit dimensions', () => {
      expect(TensorShape.of(4, 1, 3).isSimilar(TensorShape.of(4, 3))).toBe(false);
      expect(TensorShape.of(2, 4, 3).isSimilar(TensorShape.of(4, 3))).toBe(false);
    });

    it('should only strip until the ranks match', () => {
      expect(TensorShape.of(1, 1).isSimilar(TensorShape.of(1))).toBe(true);
      expect(TensorShape.of(1, 3).isSimilar(TensorShape.of(1, 1, 3))).toBe(true);
    });
  });

  describe('Addressing', () => {
    it('should map full and prefix indices to row-major offsets', () => {
      const shape = TensorShape.of(3, 4, 5);

      expect(shape.contiguousIndex(TensorIndex.of(2, 0, 3))).toBe(43);
      expect(shape.contiguousIndex(TensorIndex.of(1, 3))).toBe(35);
      expect(shape.contiguousIndex(TensorIndex.of(1))).toBe(20);
      expect(shape.contiguousIndex(TensorIndex.of())).toBe(0);
    });
  });

  describe('String Representation', () => {
    it('should format shapes', () => {
      expect(TensorShape.of(2, 3).toString()).toBe('Shape[2, 3]');
      expect(TensorShape.scalar.toString()).toBe('Shape[]');
    });
  });
});

// =============================================================================
// Utility Function Tests
// =============================================================================

describe('Shape Utilities', () => {
  it('should compute sizes and strides', () => {
    expect(computeSize([2, 3, 4])).toBe(24);
    expect(computeSize([])).toBe(1);
    expect(computeStrides([2, 3, 4])).toEqual([12, 4, 1]);
    expect(computeStrides([])).toEqual([]);
  });

  it('should format shapes for messages', () => {
    expect(formatShape([2, 3])).toBe('[2, 3]');
    expect(formatShape(TensorShape.of(5))).toBe('[5]');
    expect(formatShape(null)).toBe('scalar');
  });
});
