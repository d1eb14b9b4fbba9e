// Типы модуля замеров времени.
import type { SearchOutcome, StrategyName } from '../search/types.js';

// Часы высокого разрешения, миллисекунды.
export type Clock = () => number;

// Результат одного замеренного вызова поиска.
export interface TimedSearch {
  outcome: SearchOutcome;
  durationMicros: number;
}

// Параметры серии замеров.
export interface BenchmarkOptions {
  repetitions?: number;
  warmupRuns?: number;
  clock?: Clock;
}

// Итог серии замеров одной стратегии на одной паре (датасет, цель).
export interface SearchBenchmark {
  strategy: StrategyName;
  label: string;
  target: number;
  outcome: SearchOutcome;
  repetitions: number;
  totalMicros: number;
  averageMicros: number;
  minMicros: number;
  maxMicros: number;
}
