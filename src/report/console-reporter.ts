// Вывод хода работы и результатов в консоль.
import {
  formatClosestValues,
  formatComparisonTable,
  formatOutcome,
  formatParseWarnings,
  formatTiming,
} from './format.js';
import type { LoadResult } from '../dataset/types.js';
import type { SessionSearchResult } from '../session/session.js';
import type { SearchBenchmark } from '../timing/types.js';

// Интерфейс репортера результатов.
export interface SearchReporter {
  onDatasetGenerated(size: number): void;
  onDatasetLoaded(path: string, result: LoadResult): void;
  onSearchComplete(target: number, result: SessionSearchResult): void;
  onComparison(rows: readonly SearchBenchmark[]): void;
}

export class ConsoleReporter implements SearchReporter {
  onDatasetGenerated(size: number): void {
    console.log(`Датасет сгенерирован и отсортирован: ${size} уникальных элементов.`);
  }

  onDatasetLoaded(path: string, result: LoadResult): void {
    if (result.warnings.length > 0) {
      console.warn(`Предупреждения при чтении '${path}':`);
      for (const line of formatParseWarnings(result.warnings)) {
        console.warn(`  ${line}`);
      }
    }
    console.log(
      `Датасет загружен из '${path}': ${result.dataset.length} элементов ` +
      `(удалено дубликатов: ${result.duplicatesRemoved}).`,
    );
  }

  onSearchComplete(target: number, result: SessionSearchResult): void {
    console.log(formatOutcome(target, result.benchmark.outcome));
    if (result.closest.length > 0) {
      console.log(formatClosestValues(result.closest));
    }
    console.log(formatTiming(result.benchmark));
  }

  onComparison(rows: readonly SearchBenchmark[]): void {
    console.log('');
    for (const line of formatComparisonTable(rows)) {
      console.log(line);
    }
  }
}
