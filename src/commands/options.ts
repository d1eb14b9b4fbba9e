// Общие опции команд: разбор чисел, выбор стратегии, получение датасета.
import { InvalidArgumentError } from 'commander';
import { createRandom } from '../dataset/random.js';
import { generateDataset } from '../dataset/generator.js';
import { loadDatasetFromFile, parseIntegerLine } from '../dataset/loader.js';
import { getAllStrategies, getSearchStrategy, isStrategyName } from '../search/strategies.js';
import type { AppConfig } from '../config/schema.js';
import type { Dataset, GenerationParams } from '../dataset/types.js';
import type { SearchReporter } from '../report/console-reporter.js';
import type { SearchStrategy, StrategyName } from '../search/types.js';
import type { BenchmarkOptions } from '../timing/types.js';

// Опции, общие для команд, которым нужен датасет.
export interface DatasetOptions {
  file?: string;
  count?: number;
  min?: number;
  max?: number;
  seed?: number;
}

// Опции замеров.
export interface TimingOptions {
  repetitions?: number;
  warmup?: number;
}

// Разбирает целое число из аргумента командной строки.
export function parseIntegerOption(value: string): number {
  const parsed = parseIntegerLine(value);
  if (!parsed.ok) {
    throw new InvalidArgumentError(`Expected a 32-bit integer, got '${value}'.`);
  }
  return parsed.value;
}

// Накопитель для variadic-опций с целыми числами.
export function collectIntegerOption(value: string, previous: number[] = []): number[] {
  return [...previous, parseIntegerOption(value)];
}

export function parseStrategyOption(value: string): StrategyName | 'all' {
  if (value === 'all' || isStrategyName(value)) {
    return value;
  }
  throw new InvalidArgumentError(`Expected one of: jump, interpolation, all. Got '${value}'.`);
}

// Стратегии для значения опции --strategy.
export function selectStrategies(choice: StrategyName | 'all'): SearchStrategy[] {
  return choice === 'all' ? getAllStrategies() : [getSearchStrategy(choice)];
}

// Параметры генерации: опции командной строки поверх конфига.
export function resolveGenerationParams(
  generation: AppConfig['generation'],
  options: DatasetOptions,
): GenerationParams & { seed?: number } {
  return {
    count: options.count ?? generation.count,
    min: options.min ?? generation.min,
    max: options.max ?? generation.max,
    seed: options.seed ?? generation.seed,
  };
}

// Параметры замеров: опции командной строки поверх конфига.
export function resolveBenchmarkOptions(
  benchmark: AppConfig['benchmark'],
  options: TimingOptions,
): BenchmarkOptions {
  return {
    repetitions: options.repetitions ?? benchmark.repetitions,
    warmupRuns: options.warmup ?? benchmark.warmupRuns,
  };
}

/**
 * Загружает датасет из --file или генерирует его по параметрам.
 * О результате сообщает через reporter.
 */
export async function obtainDataset(
  options: DatasetOptions,
  config: AppConfig,
  reporter: SearchReporter,
): Promise<Dataset> {
  if (options.file) {
    const result = await loadDatasetFromFile(options.file);
    reporter.onDatasetLoaded(options.file, result);
    return result.dataset;
  }

  const { seed, ...params } = resolveGenerationParams(config.generation, options);
  const dataset = generateDataset(params, createRandom(seed));
  reporter.onDatasetGenerated(dataset.length);
  return dataset;
}

/**
 * Цели для сравнения, если они не заданы явно: первый, средний и последний
 * элементы и значение сразу за последним (гарантированный промах).
 */
export function defaultTargets(dataset: Dataset): number[] {
  if (dataset.length === 0) {
    return [];
  }

  const first = dataset[0]!;
  const middle = dataset[Math.floor(dataset.length / 2)]!;
  const last = dataset[dataset.length - 1]!;

  const targets = [first, middle, last, last + 1];
  return targets.filter((value, index) => targets.indexOf(value) === index);
}
