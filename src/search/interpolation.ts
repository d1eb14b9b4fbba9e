// Interpolation search — позиция пробы оценивается линейной интерполяцией
// между значениями на границах текущего диапазона.
import { NOT_FOUND, foundAt } from './types.js';
import type { SearchOutcome } from './types.js';
import type { Dataset } from '../dataset/types.js';

/**
 * Вычисляет позицию пробы: low + floor((high - low) * (target - lowValue) / (highValue - lowValue)).
 *
 * Произведение может выйти за 2^53 (индексы и значения — до 2^31 и 2^32),
 * в этом случае считаем в BigInt.
 */
export function probePosition(
  low: number,
  high: number,
  lowValue: number,
  highValue: number,
  target: number,
): number {
  const indexSpan = high - low;
  const valueOffset = target - lowValue;
  const valueSpan = highValue - lowValue;
  const product = indexSpan * valueOffset;

  if (!Number.isSafeInteger(product)) {
    return low + Number((BigInt(indexSpan) * BigInt(valueOffset)) / BigInt(valueSpan));
  }

  // Деление с плавающей точкой может округлить вверх — поправляем до целой части.
  let quotient = Math.floor(product / valueSpan);
  if (quotient * valueSpan > product) {
    quotient--;
  }
  return low + quotient;
}

/**
 * Ищет target в отсортированном по возрастанию датасете без дубликатов.
 *
 * Цикл идёт, пока low <= high и target лежит в [arr[low], arr[high]].
 * Проба вне [low, high] означает, что предположение о равномерности
 * для этого участка не выполнилось — возвращаем промах без повторной попытки.
 */
export function interpolationSearch(dataset: Dataset, target: number): SearchOutcome {
  let low = 0;
  let high = dataset.length - 1;

  while (low <= high && target >= dataset[low]! && target <= dataset[high]!) {
    if (low === high) {
      return dataset[low] === target ? foundAt(low) : NOT_FOUND;
    }

    // low < high и значения строго возрастают, значит highValue > lowValue.
    const pos = probePosition(low, high, dataset[low]!, dataset[high]!, target);
    if (pos < low || pos > high) {
      return NOT_FOUND;
    }

    const probe = dataset[pos]!;
    if (probe === target) {
      return foundAt(pos);
    }

    if (probe < target) {
      low = pos + 1;
    } else {
      high = pos - 1;
    }
  }

  return NOT_FOUND;
}
