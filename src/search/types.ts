// Типы модуля поиска.
import type { Dataset } from '../dataset/types.js';

// Исход поиска: индекс найденного значения либо промах.
export type SearchOutcome =
  | { found: true; index: number }
  | { found: false };

// Промах — единственное значение без данных, переиспользуем один объект.
export const NOT_FOUND: SearchOutcome = Object.freeze({ found: false });

export function foundAt(index: number): SearchOutcome {
  return { found: true, index };
}

// Функция поиска по отсортированному датасету.
export type SearchFunction = (dataset: Dataset, target: number) => SearchOutcome;

// Идентификатор стратегии поиска.
export type StrategyName = 'jump' | 'interpolation';

// Стратегия поиска: имя для CLI, подпись для вывода и сама функция.
export interface SearchStrategy {
  readonly name: StrategyName;
  readonly label: string;
  search: SearchFunction;
}
