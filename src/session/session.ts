// Сессия: текущий датасет, который CLI заменяет генерацией или загрузкой
// и по которому выполняет поиск.
import { generateDataset } from '../dataset/generator.js';
import { loadDatasetFromFile } from '../dataset/loader.js';
import { findClosestValues } from '../search/closest.js';
import { getSearchStrategy } from '../search/strategies.js';
import { benchmarkSearch } from '../timing/harness.js';
import type { Dataset, GenerationParams, LoadResult } from '../dataset/types.js';
import type { RandomSource } from '../dataset/random.js';
import type { SearchStrategy, StrategyName } from '../search/types.js';
import type { BenchmarkOptions, SearchBenchmark } from '../timing/types.js';

// Поиск по пустой сессии.
export class EmptySessionError extends Error {
  constructor() {
    super('No dataset loaded. Load or generate a dataset first.');
    this.name = 'EmptySessionError';
  }
}

// Результат поиска: замер и, при промахе, ближайшие значения.
export interface SessionSearchResult {
  benchmark: SearchBenchmark;
  closest: number[];
}

/**
 * Замеряет стратегию на датасете и при промахе добавляет ближайшие значения.
 */
export function searchDataset(
  dataset: Dataset,
  strategy: SearchStrategy,
  target: number,
  options: BenchmarkOptions = {},
): SessionSearchResult {
  const benchmark = benchmarkSearch(strategy, dataset, target, options);
  const closest = benchmark.outcome.found ? [] : findClosestValues(dataset, target);
  return { benchmark, closest };
}

export class DatasetSession {
  private dataset: Dataset = [];

  get current(): Dataset {
    return this.dataset;
  }

  get size(): number {
    return this.dataset.length;
  }

  get isEmpty(): boolean {
    return this.dataset.length === 0;
  }

  // Генерирует новый датасет. При ошибке параметров текущий не меняется.
  generate(params: GenerationParams, random?: RandomSource): Dataset {
    const dataset = generateDataset(params, random);
    this.dataset = dataset;
    return dataset;
  }

  // Загружает датасет из файла. При ошибке текущий не меняется.
  async load(path: string): Promise<LoadResult> {
    const result = await loadDatasetFromFile(path);
    this.dataset = result.dataset;
    return result;
  }

  search(
    strategyName: StrategyName,
    target: number,
    options: BenchmarkOptions = {},
  ): SessionSearchResult {
    if (this.isEmpty) {
      throw new EmptySessionError();
    }
    return searchDataset(this.dataset, getSearchStrategy(strategyName), target, options);
  }
}
