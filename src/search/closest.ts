// Ближайшие к цели значения — контекст для промаха.
import type { Dataset } from '../dataset/types.js';

// Максимум значений в результате.
export const CLOSEST_LIMIT = 10;

// Сколько элементов окна берём до точки вставки (остальные — с неё и после).
const ELEMENTS_BEFORE = 5;

// Индекс первого элемента >= target (dataset.length, если таких нет).
export function lowerBound(dataset: Dataset, target: number): number {
  let low = 0;
  let high = dataset.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (dataset[mid]! < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Возвращает до 10 значений датасета вокруг точки вставки target,
 * упорядоченных по возрастанию |value - target|, при равенстве — по значению.
 *
 * Окно — до 5 элементов перед точкой вставки и до 5 с неё; у краёв датасета
 * окно сдвигается внутрь, чтобы по-прежнему содержать 10 элементов
 * (или весь датасет, если он меньше).
 */
export function findClosestValues(dataset: Dataset, target: number): number[] {
  const n = dataset.length;
  if (n === 0) {
    return [];
  }

  const size = Math.min(CLOSEST_LIMIT, n);
  const insertion = lowerBound(dataset, target);
  const start = Math.min(Math.max(insertion - ELEMENTS_BEFORE, 0), n - size);

  const window = dataset.slice(start, start + size);

  window.sort((a, b) => {
    const diff = Math.abs(a - target) - Math.abs(b - target);
    return diff !== 0 ? diff : a - b;
  });

  return window;
}
