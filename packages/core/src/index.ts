export * from './errors';
export * from './logger';
export * from './config';
export * from './shape';
export { TensorIndex } from './index/tensor-index';
export {
  EMPTY_RANGE,
  range,
  toRange,
  rangeCount,
  rangeContains,
  assertInRange,
  assertRangeWithin,
  formatRange,
} from './index/range';
export type { Range, RangeLike } from './index/range';
export { UnitStorage } from './storage/unit-storage';
export * from './tensor';
