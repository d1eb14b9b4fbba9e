// Jump search — поиск блоками по √n с последующим линейным проходом внутри блока.
import { NOT_FOUND, foundAt } from './types.js';
import type { SearchOutcome } from './types.js';
import type { Dataset } from '../dataset/types.js';

/**
 * Ищет target в отсортированном по возрастанию датасете.
 *
 * Шаг блока — floor(√n). Сравниваем target с последним элементом каждого блока,
 * пока не найдём блок, где последний элемент >= target. Внутри блока идём
 * линейно от его начала. Сортировку датасета не проверяет.
 */
export function jumpSearch(dataset: Dataset, target: number): SearchOutcome {
  const n = dataset.length;
  if (n === 0) {
    return NOT_FOUND;
  }

  const blockSize = Math.floor(Math.sqrt(n));
  // Конец текущего блока (исключительно) и его начало.
  let step = blockSize;
  let prev = 0;

  while (dataset[Math.min(step, n) - 1]! < target) {
    prev = step;
    step += blockSize;
    if (prev >= n) {
      return NOT_FOUND;
    }
  }

  // Линейный проход внутри найденного блока.
  while (prev < n && dataset[prev]! < target) {
    prev++;
  }

  if (prev < n && dataset[prev] === target) {
    return foundAt(prev);
  }

  return NOT_FOUND;
}
