/**
 * The four tensor comparison predicates
 *
 * They are deliberately distinct: two tensors can hold identical units in
 * different shapes, or share a shape with different units.
 *
 * @example
 * const a = Tensor.fromShape([1, 4, 3], units);
 * const b = Tensor.fromShape([4, 3], units);
 * unitsEqual(a, b);    // true
 * elementsEqual(a, b); // false
 * isIsomorphic(a, b);  // false
 * isSimilar(a, b);     // true
 */

import type { TensorLike } from './types';

/**
 * Compare the row-major unit buffers, ignoring shape
 */
export function unitsEqual<T>(a: TensorLike<T>, b: TensorLike<T>): boolean {
  const left = a.units;
  const right = b.units;
  if (left.length !== right.length) {
    return false;
  }
  return left.every((unit, i) => unit === right[i]);
}

/**
 * Same shape and same units
 */
export function elementsEqual<T>(a: TensorLike<T>, b: TensorLike<T>): boolean {
  return isIsomorphic(a, b) && unitsEqual(a, b);
}

/**
 * Same shape, any units
 */
export function isIsomorphic<T>(a: TensorLike<T>, b: TensorLike<T>): boolean {
  return a.shape.isIsomorphic(b.shape);
}

/**
 * Shapes equal modulo leading 1-dimensions; diagnostic only
 */
export function isSimilar<T>(a: TensorLike<T>, b: TensorLike<T>): boolean {
  return a.shape.isSimilar(b.shape);
}
