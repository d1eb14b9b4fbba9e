// Команда search-study search — поиск одного значения с замером времени.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { ConsoleReporter } from '../report/index.js';
import { searchDataset } from '../session/index.js';
import {
  obtainDataset,
  parseIntegerOption,
  parseStrategyOption,
  resolveBenchmarkOptions,
  selectStrategies,
} from './options.js';
import type { DatasetOptions, TimingOptions } from './options.js';
import type { StrategyName } from '../search/index.js';

interface SearchOptions extends DatasetOptions, TimingOptions {
  strategy: StrategyName | 'all';
  config?: string;
}

export const searchCommand = new Command('search')
  .description('Search a value with jump and/or interpolation search and time it')
  .argument('<target>', 'Integer value to search for (negative values allowed)', parseIntegerOption)
  // Иначе commander принимает отрицательную цель за неизвестную опцию.
  // Нечисловой текст по-прежнему отклоняет parseIntegerOption.
  .allowUnknownOption()
  .allowExcessArguments(false)
  .option('-f, --file <path>', 'Load the dataset from a file instead of generating it')
  .option('-n, --count <n>', 'Number of unique elements to generate', parseIntegerOption)
  .option('--min <n>', 'Minimum generated value', parseIntegerOption)
  .option('--max <n>', 'Maximum generated value', parseIntegerOption)
  .option('--seed <n>', 'Random seed', parseIntegerOption)
  .option('-s, --strategy <name>', 'jump, interpolation or all', parseStrategyOption, 'all')
  .option('-r, --repetitions <n>', 'Timed repetitions to average', parseIntegerOption)
  .option('--warmup <n>', 'Untimed warmup runs', parseIntegerOption)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (target: number, options: SearchOptions) => {
    try {
      const config = await loadConfig(options.config);
      const reporter = new ConsoleReporter();
      const dataset = await obtainDataset(options, config, reporter);
      const benchmarkOptions = resolveBenchmarkOptions(config.benchmark, options);

      for (const strategy of selectStrategies(options.strategy)) {
        console.log('');
        const result = searchDataset(dataset, strategy, target, benchmarkOptions);
        reporter.onSearchComplete(target, result);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
