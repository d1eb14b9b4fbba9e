// Интерактивное меню поверх сессии: загрузка, генерация, поиск, выход.
import { createRandom } from '../dataset/random.js';
import { DatasetError } from '../dataset/errors.js';
import { EmptySessionError } from './session.js';
import type { DatasetSession } from './session.js';
import type { GenerationParams } from '../dataset/types.js';
import type { SearchReporter } from '../report/console-reporter.js';
import type { StrategyName } from '../search/types.js';
import type { BenchmarkOptions } from '../timing/types.js';

export type MenuAction = 'load' | 'generate' | StrategyName | 'exit';

// Источник ответов пользователя (в CLI — @inquirer/prompts, в тестах — заглушка).
export interface MenuPrompts {
  chooseAction(): Promise<MenuAction>;
  askFilePath(): Promise<string>;
  askTarget(): Promise<number>;
}

export interface MenuOptions {
  generation: GenerationParams & { seed?: number };
  benchmark: BenchmarkOptions;
  reporter: SearchReporter;
}

// Выполняет одно действие меню.
async function runAction(
  action: Exclude<MenuAction, 'exit'>,
  session: DatasetSession,
  prompts: MenuPrompts,
  options: MenuOptions,
): Promise<void> {
  switch (action) {
  case 'load': {
    const path = await prompts.askFilePath();
    const result = await session.load(path);
    options.reporter.onDatasetLoaded(path, result);
    return;
  }
  case 'generate': {
    const { seed, ...params } = options.generation;
    const dataset = session.generate(params, createRandom(seed));
    options.reporter.onDatasetGenerated(dataset.length);
    return;
  }
  case 'jump':
  case 'interpolation': {
    if (session.isEmpty) {
      throw new EmptySessionError();
    }
    const target = await prompts.askTarget();
    const result = session.search(action, target, options.benchmark);
    options.reporter.onSearchComplete(target, result);
    return;
  }
  default:
    throw new Error(`Unsupported menu action: ${action as string}`);
  }
}

/**
 * Цикл меню до выбора 'exit'.
 *
 * Ошибки датасета и поиск без датасета печатаются, и меню продолжает работу.
 * Остальные ошибки (например, прерванный ввод) пробрасываются.
 */
export async function runMenu(
  session: DatasetSession,
  prompts: MenuPrompts,
  options: MenuOptions,
): Promise<void> {
  for (;;) {
    const action = await prompts.chooseAction();
    if (action === 'exit') {
      console.log('Выход. До свидания!');
      return;
    }

    try {
      await runAction(action, session, prompts, options);
    } catch (error) {
      if (error instanceof DatasetError || error instanceof EmptySessionError) {
        console.error(`Ошибка: ${error.message}`);
        continue;
      }
      throw error;
    }
  }
}
