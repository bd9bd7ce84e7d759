/**
 * Flat unit buffer shared by a tensor and its slices
 *
 * The storage tracks a generation counter that advances whenever the number
 * of units changes. Views record the generation they were created at and
 * compare it on access, which turns use of a view after its base was
 * reallocated into a detectable error.
 */

import type { Range } from '../index/range';
import { IndexOutOfRangeError } from '../errors';
import { Logger } from '../logger';

const log = Logger.child('[storage]');

export class UnitStorage<T> {
  private units: T[];
  private _generation = 0;

  constructor(units: Iterable<T>) {
    this.units = [...units];
  }

  get length(): number {
    return this.units.length;
  }

  /**
   * Incremented whenever the buffer is reallocated
   */
  get generation(): number {
    return this._generation;
  }

  /**
   * @throws {IndexOutOfRangeError} If `offset` is not a valid unit offset
   */
  unitAt(offset: number): T {
    if (Number.isInteger(offset) && offset >= 0) {
      for (const value of this.units.slice(offset, offset + 1)) {
        return value;
      }
    }
    throw new IndexOutOfRangeError('unit offset', offset, { start: 0, end: this.units.length });
  }

  /**
   * Copy of the units in `range`
   */
  read(range: Range): T[] {
    return this.units.slice(range.start, range.end);
  }

  snapshot(): readonly T[] {
    return this.units.slice();
  }

  /**
   * Overwrite units in place starting at `start`; never changes the length
   */
  write(start: number, values: readonly T[]): void {
    values.forEach((value, i) => {
      this.units[start + i] = value;
    });
  }

  setUnit(offset: number, value: T): void {
    this.units[offset] = value;
  }

  append(values: readonly T[]): void {
    if (values.length === 0) {
      return;
    }
    for (const value of values) {
      this.units.push(value);
    }
    this.invalidate('append');
  }

  /**
   * Replace the units in `range` with `values`
   *
   * @returns The removed units
   */
  splice(range: Range, values: readonly T[]): T[] {
    const removed = this.units.slice(range.start, range.end);
    this.units = [...this.units.slice(0, range.start), ...values, ...this.units.slice(range.end)];
    if (removed.length !== values.length) {
      this.invalidate('splice');
    }
    return removed;
  }

  /**
   * Advance the generation, invalidating every outstanding view
   */
  invalidate(reason: string): void {
    this._generation++;
    log.debug(
      `${reason} reallocated buffer to ${this.units.length.toString()} units (generation ${this._generation.toString()})`,
    );
  }
}
