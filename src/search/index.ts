// Barrel-файл модуля поиска.
export type {
  SearchOutcome,
  SearchFunction,
  SearchStrategy,
  StrategyName,
} from './types.js';
export { NOT_FOUND, foundAt } from './types.js';

export { jumpSearch } from './jump.js';
export { interpolationSearch, probePosition } from './interpolation.js';
export { findClosestValues, lowerBound, CLOSEST_LIMIT } from './closest.js';
export {
  jumpSearchStrategy,
  interpolationSearchStrategy,
  STRATEGY_NAMES,
  isStrategyName,
  getSearchStrategy,
  getAllStrategies,
} from './strategies.js';
