/**
 * Nested-bracket text rendering of tensors
 */

import { computeSize } from '../shape/runtime';
import type { FormatOptions, TensorLike } from './types';

const DEFAULT_MAX_UNITS = 1000;
const DEFAULT_EDGE_ITEMS = 3;

/**
 * Render a tensor as nested brackets in row-major order
 *
 * A scalar renders as its bare value. Axes longer than `2 * edgeItems` are
 * elided with `...` once the tensor holds more than `maxUnits` units.
 *
 * @example
 * formatTensor(Tensor.fromShape([2, 3], [1, 2, 3, 4, 5, 6]));
 * // '[[1, 2, 3], [4, 5, 6]]'
 */
export function formatTensor<T>(tensor: TensorLike<T>, options: FormatOptions = {}): string {
  const units = tensor.units;
  if (tensor.isScalar) {
    return formatValue(units[0]);
  }

  const maxUnits = options.maxUnits ?? DEFAULT_MAX_UNITS;
  const edgeItems = options.edgeItems ?? DEFAULT_EDGE_ITEMS;
  return formatArray(units, tensor.shape.dims, 0, units.length > maxUnits, edgeItems);
}

/**
 * Format the block of `shape` starting at unit `offset`
 */
function formatArray<T>(
  units: readonly T[],
  shape: readonly number[],
  offset: number,
  shouldTruncate: boolean,
  edgeItems: number,
): string {
  const currentDim = shape[0];
  if (currentDim === undefined) {
    return formatValue(units[offset]);
  }

  const remainingShape = shape.slice(1);
  const stride = computeSize(remainingShape);
  const item = (i: number): string =>
    formatArray(units, remainingShape, offset + i * stride, shouldTruncate, edgeItems);

  const items: string[] = [];
  if (shouldTruncate && currentDim > 2 * edgeItems) {
    for (let i = 0; i < edgeItems; i++) {
      items.push(item(i));
    }
    items.push('...');
    for (let i = currentDim - edgeItems; i < currentDim; i++) {
      items.push(item(i));
    }
  } else {
    for (let i = 0; i < currentDim; i++) {
      items.push(item(i));
    }
  }
  return `[${items.join(', ')}]`;
}

/**
 * Format a single value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return value.toString();
    }
    // Floats to 4 decimal places
    return value.toFixed(4).replace(/\.?0+$/, '');
  }
  return String(value);
}
