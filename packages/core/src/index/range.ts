/**
 * Half-open integer ranges used for element bounds and unit offsets
 */

import { IndexOutOfRangeError } from '../errors';

/**
 * Half-open range `[start, end)`
 */
export interface Range {
  readonly start: number;
  readonly end: number;
}

/**
 * Range argument accepted by public APIs; a `[start, end)` pair or a {@link Range}
 */
export type RangeLike = Range | readonly [number, number];

export const EMPTY_RANGE: Range = { start: 0, end: 0 };

export function range(start: number, end: number): Range {
  return { start, end };
}

export function toRange(r: RangeLike): Range {
  return 'start' in r ? r : { start: r[0], end: r[1] };
}

export function rangeCount(r: Range): number {
  return Math.max(0, r.end - r.start);
}

export function rangeContains(r: Range, value: number): boolean {
  return Number.isInteger(value) && value >= r.start && value < r.end;
}

/**
 * Check that `value` lies in `valid`
 *
 * @throws {IndexOutOfRangeError}
 */
export function assertInRange(operation: string, value: number, valid: Range): void {
  if (!rangeContains(valid, value)) {
    throw new IndexOutOfRangeError(operation, value, valid);
  }
}

/**
 * Check that `inner` is a well-formed range lying within `outer`
 *
 * An empty inner range is accepted anywhere between `outer.start` and
 * `outer.end` inclusive.
 *
 * @throws {IndexOutOfRangeError}
 */
export function assertRangeWithin(operation: string, inner: Range, outer: Range): void {
  const wellFormed =
    Number.isInteger(inner.start) && Number.isInteger(inner.end) && inner.start <= inner.end;
  if (!wellFormed || inner.start < outer.start || inner.end > outer.end) {
    throw new IndexOutOfRangeError(operation, formatRange(inner), outer);
  }
}

export function formatRange(r: Range): string {
  return `${r.start.toString()}..<${r.end.toString()}`;
}
