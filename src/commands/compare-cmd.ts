// Команда search-study compare — сравнение стратегий на наборе целей.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { ConsoleReporter } from '../report/index.js';
import { getAllStrategies } from '../search/index.js';
import { compareStrategies } from '../timing/index.js';
import {
  collectIntegerOption,
  defaultTargets,
  obtainDataset,
  parseIntegerOption,
  resolveBenchmarkOptions,
} from './options.js';
import type { DatasetOptions, TimingOptions } from './options.js';

interface CompareOptions extends DatasetOptions, TimingOptions {
  targets?: number[];
  config?: string;
}

export const compareCommand = new Command('compare')
  .description('Compare jump and interpolation search on the same dataset and targets')
  .option('-f, --file <path>', 'Load the dataset from a file instead of generating it')
  .option('-n, --count <n>', 'Number of unique elements to generate', parseIntegerOption)
  .option('--min <n>', 'Minimum generated value', parseIntegerOption)
  .option('--max <n>', 'Maximum generated value', parseIntegerOption)
  .option('--seed <n>', 'Random seed', parseIntegerOption)
  .argument('[targets...]', 'Values to search, negative allowed (default: first, middle, last, last + 1)', collectIntegerOption)
  .option('-t, --targets <n...>', 'Values to search, same as the positional targets', collectIntegerOption)
  .option('-r, --repetitions <n>', 'Timed repetitions to average', parseIntegerOption)
  .option('--warmup <n>', 'Untimed warmup runs', parseIntegerOption)
  .option('-c, --config <path>', 'Path to config file')
  // Отрицательные значения после -t commander считает неизвестными опциями:
  // они попадают в позиционные targets и разбираются parseIntegerOption.
  .allowUnknownOption()
  .action(async (positional: number[] | undefined, options: CompareOptions) => {
    try {
      const config = await loadConfig(options.config);
      const reporter = new ConsoleReporter();
      const dataset = await obtainDataset(options, config, reporter);
      const benchmarkOptions = resolveBenchmarkOptions(config.benchmark, options);

      const requested = [...(options.targets ?? []), ...(positional ?? [])];
      const targets = requested.length > 0 ? requested : defaultTargets(dataset);
      if (targets.length === 0) {
        console.log('Нет целей для сравнения.');
        return;
      }

      const strategies = getAllStrategies();
      const rows = targets.flatMap((target) =>
        compareStrategies(strategies, dataset, target, benchmarkOptions),
      );

      reporter.onComparison(rows);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
