// Команда search-study generate — генерация случайного датасета.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createRandom, generateDataset, saveDataset } from '../dataset/index.js';
import { ConsoleReporter } from '../report/index.js';
import { parseIntegerOption, resolveGenerationParams } from './options.js';

interface GenerateOptions {
  count?: number;
  min?: number;
  max?: number;
  seed?: number;
  out?: string;
  config?: string;
}

export const generateCommand = new Command('generate')
  .description('Generate a sorted dataset of unique random integers')
  .option('-n, --count <n>', 'Number of unique elements', parseIntegerOption)
  .option('--min <n>', 'Minimum value (inclusive)', parseIntegerOption)
  .option('--max <n>', 'Maximum value (inclusive)', parseIntegerOption)
  .option('--seed <n>', 'Random seed', parseIntegerOption)
  .option('-o, --out <file>', 'Save the dataset to a file, one integer per line')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: GenerateOptions) => {
    try {
      const config = await loadConfig(options.config);
      const { seed, ...params } = resolveGenerationParams(config.generation, options);

      const dataset = generateDataset(params, createRandom(seed));
      new ConsoleReporter().onDatasetGenerated(dataset.length);

      if (options.out) {
        await saveDataset(options.out, dataset);
        console.log(`Датасет сохранён в '${options.out}'.`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
