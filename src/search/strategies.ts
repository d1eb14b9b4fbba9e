// Выбор стратегии поиска по имени.
import { jumpSearch } from './jump.js';
import { interpolationSearch } from './interpolation.js';
import type { SearchStrategy, StrategyName } from './types.js';

export const jumpSearchStrategy: SearchStrategy = {
  name: 'jump',
  label: 'Jump Search',
  search: jumpSearch,
};

export const interpolationSearchStrategy: SearchStrategy = {
  name: 'interpolation',
  label: 'Interpolation Search',
  search: interpolationSearch,
};

export const STRATEGY_NAMES: readonly StrategyName[] = ['jump', 'interpolation'];

export function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

// Возвращает стратегию по имени.
export function getSearchStrategy(name: StrategyName): SearchStrategy {
  switch (name) {
  case 'jump':
    return jumpSearchStrategy;
  case 'interpolation':
    return interpolationSearchStrategy;
  default:
    throw new Error(`Unsupported search strategy: ${name as string}`);
  }
}

// Все стратегии в порядке STRATEGY_NAMES.
export function getAllStrategies(): SearchStrategy[] {
  return STRATEGY_NAMES.map((name) => getSearchStrategy(name));
}
