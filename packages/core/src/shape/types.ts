/**
 * Type-level shape operations
 *
 * Shapes written as tuple literals keep their dimensions at the type level,
 * so the same operations the runtime {@link TensorShape} performs can be
 * checked at compile time.
 */

import type { Multiply, Subtract } from 'ts-arithmetic';

// =============================================================================
// Basic Shape Types
// =============================================================================

/**
 * A tensor shape represented as a readonly tuple of non-negative integers
 * Each number represents the size of a dimension
 */
export type Shape = readonly number[];

/**
 * A readonly tuple of `N` copies of `T`
 *
 * @example
 * type Coords = TupleOf<number, 3> // readonly [number, number, number]
 */
export type TupleOf<T, N extends number> = number extends N
  ? readonly T[]
  : TupleOfHelper<T, N, readonly []>;

type TupleOfHelper<T, N extends number, Acc extends readonly unknown[]> = Acc['length'] extends N
  ? Acc
  : TupleOfHelper<T, N, readonly [...Acc, T]>;

export type Shape1D = readonly [number];
export type Shape2D = readonly [number, number];
export type Shape3D = readonly [number, number, number];
export type Shape4D = readonly [number, number, number, number];

// =============================================================================
// Shape Arithmetic and Utilities
// =============================================================================

/**
 * Product of all dimensions (number of units)
 *
 * @example
 * type Size = Product<[3, 4, 5]> // 60
 * type ScalarSize = Product<[]> // 1
 */
export type Product<T extends Shape> = T extends readonly []
  ? 1
  : T extends readonly [infer Head, ...infer Tail]
    ? Head extends number
      ? Tail extends Shape
        ? Head extends 0
          ? 0
          : Multiply<Head, Product<Tail>>
        : never
      : never
    : number;

/**
 * Get the length (rank) of a shape
 */
export type Length<T extends Shape> = T['length'];

/**
 * First dimension of a shape
 */
export type Head<T extends Shape> = T extends readonly [infer H, ...unknown[]] ? H : never;

/**
 * All dimensions except the first (the element shape)
 *
 * @example
 * type Element = Tail<[3, 4, 5]> // [4, 5]
 */
export type Tail<T extends Shape> = T extends readonly [unknown, ...infer Rest]
  ? Rest extends Shape
    ? Readonly<Rest>
    : never
  : never;

/**
 * Drop the first N dimensions from a shape
 *
 * @example
 * type LastTwo = Drop<[2, 3, 4, 5], 2> // [4, 5]
 */
export type Drop<T extends Shape, N extends number> = N extends 0
  ? T
  : T extends readonly [unknown, ...infer Rest]
    ? Rest extends Shape
      ? Drop<Readonly<Rest>, Subtract<N, 1>>
      : readonly []
    : readonly [];

/**
 * Take the first N dimensions from a shape
 *
 * @example
 * type FirstTwo = Take<[2, 3, 4, 5], 2> // [2, 3]
 */
export type Take<T extends Shape, N extends number> = TakeHelper<T, N, readonly []>;

type TakeHelper<T extends Shape, N extends number, Acc extends Shape> = Acc['length'] extends N
  ? Acc
  : T extends readonly [infer Head, ...infer Rest]
    ? Head extends number
      ? Rest extends Shape
        ? TakeHelper<Rest, N, readonly [...Acc, Head]>
        : Acc
      : Acc
    : Acc;

/**
 * Add a leading dimension
 *
 * @example
 * type Stacked = Prepend<[4, 5], 3> // [3, 4, 5]
 */
export type Prepend<T extends Shape, N extends number> = readonly [N, ...T];

/**
 * Reverse the order of dimensions in a shape
 *
 * @example
 * type Reversed = Reverse<[2, 3, 4]> // [4, 3, 2]
 */
export type Reverse<T extends Shape> = T extends readonly [...infer Rest, infer Last]
  ? Last extends number
    ? Rest extends Shape
      ? readonly [Last, ...Reverse<Rest>]
      : readonly [Last]
    : readonly []
  : readonly [];

/**
 * Check if two shapes are identical (isomorphic)
 */
export type Equals<A extends Shape, B extends Shape> = A extends B
  ? B extends A
    ? true
    : false
  : false;

/**
 * Strip leading 1-dimensions
 *
 * @example
 * type Stripped = StripLeadingOnes<[1, 1, 4, 3]> // [4, 3]
 */
export type StripLeadingOnes<T extends Shape> = T extends readonly [1, ...infer Rest]
  ? Rest extends Shape
    ? StripLeadingOnes<Readonly<Rest>>
    : T
  : T;

/**
 * Convert shape to string representation for error messages
 *
 * @example
 * type Str = ShapeToString<[2, 3, 4]> // "2, 3, 4"
 */
export type ShapeToString<S extends Shape> = S extends readonly []
  ? ''
  : S extends readonly [infer H]
    ? `${H & number}`
    : S extends readonly [infer H, ...infer T]
      ? T extends Shape
        ? `${H & number}, ${ShapeToString<T>}`
        : never
      : string;
