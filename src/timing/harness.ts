// Замер времени поиска.
import type { Dataset } from '../dataset/types.js';
import { NOT_FOUND } from '../search/types.js';
import type { SearchOutcome, SearchStrategy } from '../search/types.js';
import type { BenchmarkOptions, Clock, SearchBenchmark, TimedSearch } from './types.js';

// Число повторов для усреднения по умолчанию.
export const DEFAULT_REPETITIONS = 1000;

export const defaultClock: Clock = () => performance.now();

/**
 * Замеряет один вызов стратегии: читает часы до и после поиска.
 * Возвращает исход и длительность в микросекундах.
 */
export function measureSearch(
  strategy: SearchStrategy,
  dataset: Dataset,
  target: number,
  clock: Clock = defaultClock,
): TimedSearch {
  const start = clock();
  const outcome = strategy.search(dataset, target);
  const end = clock();

  return { outcome, durationMicros: Math.max(0, (end - start) * 1000) };
}

/**
 * Повторяет measureSearch repetitions раз на одних и тех же входных данных
 * и усредняет длительность. Прогревочные вызовы не замеряются.
 */
export function benchmarkSearch(
  strategy: SearchStrategy,
  dataset: Dataset,
  target: number,
  options: BenchmarkOptions = {},
): SearchBenchmark {
  const { repetitions = DEFAULT_REPETITIONS, warmupRuns = 0, clock = defaultClock } = options;

  if (!Number.isInteger(repetitions) || repetitions < 1) {
    throw new Error(`repetitions must be a positive integer, got ${repetitions}`);
  }
  if (!Number.isInteger(warmupRuns) || warmupRuns < 0) {
    throw new Error(`warmupRuns must be a non-negative integer, got ${warmupRuns}`);
  }

  for (let i = 0; i < warmupRuns; i++) {
    strategy.search(dataset, target);
  }

  let totalMicros = 0;
  let minMicros = Number.POSITIVE_INFINITY;
  let maxMicros = 0;
  // repetitions >= 1, так что исход будет перезаписан первым же замером.
  let outcome: SearchOutcome = NOT_FOUND;

  for (let i = 0; i < repetitions; i++) {
    const timed = measureSearch(strategy, dataset, target, clock);
    outcome = timed.outcome;
    totalMicros += timed.durationMicros;
    minMicros = Math.min(minMicros, timed.durationMicros);
    maxMicros = Math.max(maxMicros, timed.durationMicros);
  }

  return {
    strategy: strategy.name,
    label: strategy.label,
    target,
    outcome,
    repetitions,
    totalMicros,
    averageMicros: totalMicros / repetitions,
    minMicros,
    maxMicros,
  };
}

// Серия замеров для каждой стратегии на одной паре (датасет, цель).
export function compareStrategies(
  strategies: readonly SearchStrategy[],
  dataset: Dataset,
  target: number,
  options: BenchmarkOptions = {},
): SearchBenchmark[] {
  return strategies.map((strategy) => benchmarkSearch(strategy, dataset, target, options));
}
