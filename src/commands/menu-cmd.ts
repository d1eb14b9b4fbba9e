// Команда search-study menu — интерактивный режим.
import { Command } from 'commander';
import { input, select } from '@inquirer/prompts';
import { loadConfig } from '../config/index.js';
import { parseIntegerLine } from '../dataset/index.js';
import { ConsoleReporter } from '../report/index.js';
import { DatasetSession, runMenu } from '../session/index.js';
import { resolveBenchmarkOptions, resolveGenerationParams } from './options.js';
import type { MenuAction, MenuPrompts } from '../session/index.js';

// Ответы пользователя через @inquirer/prompts.
const inquirerPrompts: MenuPrompts = {
  chooseAction: () =>
    select<MenuAction>({
      message: 'Выберите действие:',
      choices: [
        { name: 'Загрузить датасет из файла', value: 'load' },
        { name: 'Сгенерировать случайный датасет', value: 'generate' },
        { name: 'Поиск (Jump Search)', value: 'jump' },
        { name: 'Поиск (Interpolation Search)', value: 'interpolation' },
        { name: 'Выход', value: 'exit' },
      ],
    }),

  askFilePath: () =>
    input({
      message: 'Путь к файлу:',
      validate: (value) => value.trim().length > 0 || 'Укажите путь к файлу.',
    }).then((value) => value.trim()),

  askTarget: async () => {
    const answer = await input({
      message: 'Значение для поиска:',
      validate: (value) => parseIntegerLine(value).ok || 'Введите целое число (32 бита).',
    });
    const parsed = parseIntegerLine(answer);
    if (!parsed.ok) {
      throw new Error(`Invalid integer: '${answer}'`);
    }
    return parsed.value;
  },
};

export const menuCommand = new Command('menu')
  .description('Interactive menu: load or generate a dataset and run searches')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: { config?: string }) => {
    try {
      const config = await loadConfig(options.config);

      console.log('');
      console.log('=== Search Algorithm Performance Study ===');
      console.log('');

      await runMenu(new DatasetSession(), inquirerPrompts, {
        generation: resolveGenerationParams(config.generation, {}),
        benchmark: resolveBenchmarkOptions(config.benchmark, {}),
        reporter: new ConsoleReporter(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
