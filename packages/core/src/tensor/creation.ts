/**
 * Tensor creation functions
 *
 * Convenience constructors layered on {@link Tensor.fromShape} and
 * {@link Tensor.fromUnits}.
 */

import { Tensor } from './tensor';
import { TensorShape } from '../shape/runtime';
import { ShapeViolationError } from '../errors';
import type { ShapeLike } from './types';

/**
 * Tensor of `shape` with every unit set to `value`
 *
 * @example
 * const t = repeating([2, 2], 0);
 * t.units; // [0, 0, 0, 0]
 */
export function repeating<T>(shape: ShapeLike, value: T): Tensor<T> {
  const target = TensorShape.from(shape);
  return Tensor.fromShape(target, new Array<T>(target.contiguousSize).fill(value));
}

/**
 * Tensor of `shape` filled by calling `supplier` once per unit in row-major
 * order
 *
 * @example
 * let n = 0;
 * fromSupplier([2, 3], () => n++).units; // [0, 1, 2, 3, 4, 5]
 */
export function fromSupplier<T>(shape: ShapeLike, supplier: () => T): Tensor<T> {
  const target = TensorShape.from(shape);
  const units: T[] = [];
  for (let i = 0; i < target.contiguousSize; i++) {
    units.push(supplier());
  }
  return Tensor.fromShape(target, units);
}

/**
 * Tensor of `shape` whose units count up by one from `lowerBound`
 *
 * @example
 * increasingFrom([3, 4, 5], 0).get([2, 0, 3]).units; // [43]
 */
export function increasingFrom(shape: ShapeLike, lowerBound: number): Tensor<number> {
  let next = lowerBound;
  return fromSupplier(shape, () => next++);
}

/**
 * Vector of the integers in `[start, end)`
 *
 * @throws {ShapeViolationError} If the bounds are not integers or `end < start`
 */
export function scalarElements(start: number, end: number): Tensor<number> {
  assertIntegerBounds(start, end);
  const units: number[] = [];
  for (let value = start; value < end; value++) {
    units.push(value);
  }
  return Tensor.fromUnits(TensorShape.scalar, units);
}

/**
 * Vector of the integers in `[start, end]`
 *
 * @throws {ShapeViolationError} If the bounds are not integers or `end < start`
 */
export function scalarElementsClosed(start: number, end: number): Tensor<number> {
  assertIntegerBounds(start, end + 1);
  return scalarElements(start, end + 1);
}

function assertIntegerBounds(start: number, end: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end) || end < start) {
    throw new ShapeViolationError(
      `invalid element bounds ${start.toString()}..<${end.toString()}: expected integers with start <= end`,
    );
  }
}
