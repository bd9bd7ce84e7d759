/**
 * Type-level tests for shape operations
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import type {
  Shape,
  Shape2D,
  TupleOf,
  Product,
  Length,
  Head,
  Tail,
  Drop,
  Take,
  Prepend,
  Reverse,
  Equals,
  StripLeadingOnes,
  ShapeToString,
} from './types';
import { TensorShape } from './runtime';

// =============================================================================
// Basic Shape Types
// =============================================================================

describe('Basic Shape Types', () => {
  it('should build fixed-arity tuples', () => {
    expectTypeOf<TupleOf<number, 3>>().toEqualTypeOf<readonly [number, number, number]>();
    expectTypeOf<TupleOf<number, 0>>().toEqualTypeOf<readonly []>();
    expectTypeOf<TupleOf<number, number>>().toEqualTypeOf<readonly number[]>();
    expectTypeOf<Shape2D>().toEqualTypeOf<TupleOf<number, 2>>();
  });

  it('should keep literal dimensions from TensorShape.of', () => {
    const shape = TensorShape.of(3, 4, 5);
    expectTypeOf(shape.dims).toMatchTypeOf<readonly [3, 4, 5]>();
  });
});

// =============================================================================
// Shape Arithmetic
// =============================================================================

describe('Shape Arithmetic', () => {
  it('should compute products', () => {
    expectTypeOf<Product<readonly [3, 4, 5]>>().toEqualTypeOf<60>();
    expectTypeOf<Product<readonly []>>().toEqualTypeOf<1>();
    expectTypeOf<Product<readonly [2, 0, 3]>>().toEqualTypeOf<0>();
  });

  it('should compute rank and leading dimension', () => {
    expectTypeOf<Length<readonly [3, 4, 5]>>().toEqualTypeOf<3>();
    expectTypeOf<Head<readonly [3, 4, 5]>>().toEqualTypeOf<3>();
    expectTypeOf<Tail<readonly [3, 4, 5]>>().toEqualTypeOf<readonly [4, 5]>();
  });

  it('should drop and take dimensions', () => {
    expectTypeOf<Drop<readonly [2, 3, 4, 5], 2>>().toEqualTypeOf<readonly [4, 5]>();
    expectTypeOf<Drop<readonly [2, 3], 0>>().toEqualTypeOf<readonly [2, 3]>();
    expectTypeOf<Take<readonly [2, 3, 4, 5], 2>>().toEqualTypeOf<readonly [2, 3]>();
  });

  it('should prepend and reverse', () => {
    expectTypeOf<Prepend<readonly [4, 5], 3>>().toEqualTypeOf<readonly [3, 4, 5]>();
    expectTypeOf<Reverse<readonly [2, 3, 4]>>().toEqualTypeOf<readonly [4, 3, 2]>();
  });
});

// =============================================================================
// Shape Comparisons
// =============================================================================

describe('Shape Comparisons', () => {
  it('should compare shapes', () => {
    expectTypeOf<Equals<readonly [4, 3], readonly [4, 3]>>().toEqualTypeOf<true>();
    expectTypeOf<Equals<readonly [4, 3], readonly [3, 4]>>().toEqualTypeOf<false>();
  });

  it('should strip leading ones', () => {
    expectTypeOf<StripLeadingOnes<readonly [1, 1, 4, 3]>>().toEqualTypeOf<readonly [4, 3]>();
    expectTypeOf<StripLeadingOnes<readonly [1, 1, 1]>>().toEqualTypeOf<readonly []>();
  });

  it('should render shapes as strings', () => {
    expectTypeOf<ShapeToString<readonly [2, 3, 4]>>().toEqualTypeOf<'2, 3, 4'>();
    expectTypeOf<ShapeToString<Shape>>().toEqualTypeOf<string>();
  });
});
