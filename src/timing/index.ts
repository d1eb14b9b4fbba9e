// Barrel-файл модуля замеров.
export type {
  Clock,
  TimedSearch,
  BenchmarkOptions,
  SearchBenchmark,
} from './types.js';

export {
  DEFAULT_REPETITIONS,
  defaultClock,
  measureSearch,
  benchmarkSearch,
  compareStrategies,
} from './harness.js';
