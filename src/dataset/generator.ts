// Генерация случайного датасета из уникальных целых чисел.
import { DatasetConfigurationError } from './errors.js';
import { createRandom } from './random.js';
import { ShardedIntegerSet } from './unique-set.js';
import { INT32_MAX, INT32_MIN } from './types.js';
import type { RandomSource } from './random.js';
import type { Dataset, GenerationParams } from './types.js';

// Проверяет параметры генерации до начала выборки.
// Диапазон, в котором меньше различных значений, чем count, — ошибка конфигурации:
// иначе цикл добора уникальных значений никогда бы не завершился.
export function validateGenerationParams(params: GenerationParams): void {
  const { count, min, max } = params;

  if (!Number.isInteger(count) || count < 0) {
    throw new DatasetConfigurationError(`count must be a non-negative integer, got ${count}`);
  }
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new DatasetConfigurationError(`min and max must be integers, got [${min}, ${max}]`);
  }
  if (min < INT32_MIN || max > INT32_MAX) {
    throw new DatasetConfigurationError(
      `range [${min}, ${max}] exceeds 32-bit integer bounds [${INT32_MIN}, ${INT32_MAX}]`,
    );
  }
  if (min > max) {
    throw new DatasetConfigurationError(`min (${min}) must not exceed max (${max})`);
  }

  const available = max - min + 1;
  if (count > available) {
    throw new DatasetConfigurationError(
      `cannot generate ${count} unique values: range [${min}, ${max}] holds only ${available}`,
    );
  }
}

/**
 * Генерирует count различных целых из [min, max] (выборка без возвращения)
 * и возвращает их отсортированными по возрастанию.
 *
 * Повторы отбрасываются накопителем до вставки, поэтому в результат
 * не попадают, даже если генератор выдаёт их многократно. Накопитель
 * шардирован: count может превышать лимит размера одного Set.
 */
export function generateDataset(
  params: GenerationParams,
  random: RandomSource = createRandom(),
): Dataset {
  validateGenerationParams(params);

  const { count, min, max } = params;
  const unique = new ShardedIntegerSet(count);

  while (unique.size < count) {
    unique.add(random.nextInt(min, max));
  }

  return unique.toSortedArray();
}
