/**
 * Shape module exports
 *
 * @module shape
 *
 * Shapes are ordered, non-negative dimension sizes laid out row-major:
 * ```typescript
 * const shape = TensorShape.of(3, 4, 5);
 * shape.strides;      // [20, 5, 1]
 * shape.dropFirst();  // [4, 5]
 * ```
 *
 * Two relations compare shapes:
 * - isomorphic: identical dimension sequences
 * - similar: equal after stripping leading 1-dimensions from the longer
 *   shape; diagnostic only, not transitive in general
 */

export type {
  // Core shape types
  Shape,
  TupleOf,

  // Shape operations
  Product,
  Length,
  Head,
  Tail,
  Drop,
  Take,
  Prepend,
  Reverse,
  StripLeadingOnes,

  // Shape comparisons
  Equals,
  ShapeToString,

  // Common shapes
  Shape1D,
  Shape2D,
  Shape3D,
  Shape4D,
} from './types';

// Runtime exports
export { TensorShape, computeSize, computeStrides, formatShape } from './runtime';
