// Типы модуля датасетов.

// Отсортированная по возрастанию последовательность уникальных целых чисел.
// Поиск только читает её, поэтому тип — readonly.
export type Dataset = readonly number[];

// Параметры генерации случайного датасета.
export interface GenerationParams {
  count: number;
  min: number;
  max: number;
}

// Причина, по которой строка файла была пропущена.
export type ParseWarningReason = 'invalid' | 'out-of-range';

// Предупреждение о пропущенной строке (не прерывает загрузку).
export interface ParseWarning {
  // Номер строки, 1-based.
  line: number;
  text: string;
  reason: ParseWarningReason;
}

// Результат загрузки датасета из файла.
export interface LoadResult {
  dataset: Dataset;
  warnings: ParseWarning[];
  // Количество успешно распознанных строк до удаления дубликатов.
  rawCount: number;
  duplicatesRemoved: number;
}

// Границы 32-битного знакового целого.
export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
