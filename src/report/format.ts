// Форматирование результатов для вывода в консоль.
import type { ParseWarning } from '../dataset/types.js';
import type { SearchOutcome } from '../search/types.js';
import type { SearchBenchmark } from '../timing/types.js';

// Сколько предупреждений разбора печатать построчно.
export const MAX_PRINTED_WARNINGS = 20;

// Длительность в миллисекундах, как её показывает CLI.
export function formatDuration(micros: number): string {
  return `${(micros / 1000).toFixed(4)} мс`;
}

export function formatOutcome(target: number, outcome: SearchOutcome): string {
  if (outcome.found) {
    return `Значение ${target} найдено по индексу ${outcome.index}.`;
  }
  return `Значение ${target} не найдено.`;
}

export function formatClosestValues(values: readonly number[]): string {
  return `Ближайшие значения в датасете: ${values.join(' ')}`;
}

export function formatTiming(benchmark: SearchBenchmark): string {
  return (
    `${benchmark.label}: ${formatDuration(benchmark.averageMicros)} в среднем ` +
    `за ${benchmark.repetitions} повторов ` +
    `(мин ${formatDuration(benchmark.minMicros)}, макс ${formatDuration(benchmark.maxMicros)})`
  );
}

export function formatParseWarning(warning: ParseWarning): string {
  const reason = warning.reason === 'out-of-range' ? 'вне диапазона int32' : 'не целое число';
  return `Строка ${warning.line}: '${warning.text}' — ${reason}, пропущена`;
}

// Строки предупреждений: первые MAX_PRINTED_WARNINGS и итог по остальным.
export function formatParseWarnings(warnings: readonly ParseWarning[]): string[] {
  const lines = warnings.slice(0, MAX_PRINTED_WARNINGS).map(formatParseWarning);
  const hidden = warnings.length - MAX_PRINTED_WARNINGS;
  if (hidden > 0) {
    lines.push(`... и ещё ${hidden} предупреждений`);
  }
  return lines;
}

const COL_TARGET = 14;
const COL_STRATEGY = 22;
const COL_RESULT = 14;
const COL_TIME = 14;

// Таблица сравнения стратегий: строка на каждый замер.
export function formatComparisonTable(rows: readonly SearchBenchmark[]): string[] {
  const header =
    'Цель'.padEnd(COL_TARGET) + ' ' +
    'Стратегия'.padEnd(COL_STRATEGY) + ' ' +
    'Результат'.padEnd(COL_RESULT) + ' ' +
    'Среднее'.padEnd(COL_TIME) + ' ' +
    'Мин'.padEnd(COL_TIME) + ' ' +
    'Макс';

  const lines = [header, '-'.repeat(header.length + 6)];

  for (const row of rows) {
    const result = row.outcome.found ? `#${row.outcome.index}` : 'не найдено';
    lines.push(
      String(row.target).padEnd(COL_TARGET) + ' ' +
      row.label.padEnd(COL_STRATEGY) + ' ' +
      result.padEnd(COL_RESULT) + ' ' +
      formatDuration(row.averageMicros).padEnd(COL_TIME) + ' ' +
      formatDuration(row.minMicros).padEnd(COL_TIME) + ' ' +
      formatDuration(row.maxMicros),
    );
  }

  return lines;
}
