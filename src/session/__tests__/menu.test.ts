import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runMenu } from '../menu.js';
import { DatasetSession } from '../session.js';
import type { MenuAction, MenuOptions, MenuPrompts } from '../menu.js';
import type { SearchReporter } from '../../report/console-reporter.js';

const TEST_DIR = join(tmpdir(), 'search-study-menu-test');

// Заглушка ответов: действия, пути и цели по порядку.
function scriptedPrompts(script: {
  actions: MenuAction[];
  paths?: string[];
  targets?: number[];
}): MenuPrompts {
  const actions = [...script.actions];
  const paths = [...(script.paths ?? [])];
  const targets = [...(script.targets ?? [])];

  return {
    chooseAction: async () => actions.shift() ?? 'exit',
    askFilePath: async () => {
      const path = paths.shift();
      if (path === undefined) throw new Error('no scripted path');
      return path;
    },
    askTarget: async () => {
      const target = targets.shift();
      if (target === undefined) throw new Error('no scripted target');
      return target;
    },
  };
}

function createReporter() {
  return {
    onDatasetGenerated: vi.fn(),
    onDatasetLoaded: vi.fn(),
    onSearchComplete: vi.fn(),
    onComparison: vi.fn(),
  } satisfies SearchReporter;
}

function createOptions(reporter: SearchReporter): MenuOptions {
  return {
    generation: { count: 5, min: 1, max: 5, seed: 1 },
    benchmark: { repetitions: 2 },
    reporter,
  };
}

beforeEach(async () => {
  await mkdir(TEST_DIR, { recursive: true });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe('runMenu', () => {
  it('сразу выходит при выборе exit', async () => {
    const reporter = createReporter();

    await runMenu(new DatasetSession(), scriptedPrompts({ actions: ['exit'] }), createOptions(reporter));

    expect(console.log).toHaveBeenCalledWith('Выход. До свидания!');
    expect(reporter.onDatasetGenerated).not.toHaveBeenCalled();
  });

  it('генерирует датасет и ищет в нём обеими стратегиями', async () => {
    const reporter = createReporter();
    const session = new DatasetSession();

    await runMenu(
      session,
      scriptedPrompts({ actions: ['generate', 'jump', 'interpolation'], targets: [4, 9] }),
      createOptions(reporter),
    );

    expect(session.current).toEqual([1, 2, 3, 4, 5]);
    expect(reporter.onDatasetGenerated).toHaveBeenCalledWith(5);
    expect(reporter.onSearchComplete).toHaveBeenCalledTimes(2);

    const [jumpTarget, jumpResult] = reporter.onSearchComplete.mock.calls[0]!;
    expect(jumpTarget).toBe(4);
    expect(jumpResult.benchmark.strategy).toBe('jump');
    expect(jumpResult.benchmark.outcome).toEqual({ found: true, index: 3 });

    const [missTarget, missResult] = reporter.onSearchComplete.mock.calls[1]!;
    expect(missTarget).toBe(9);
    expect(missResult.benchmark.strategy).toBe('interpolation');
    expect(missResult.closest).toEqual([5, 4, 3, 2, 1]);
  });

  it('поиск без датасета печатает ошибку и не спрашивает цель', async () => {
    const reporter = createReporter();
    const prompts = scriptedPrompts({ actions: ['jump'] });
    const askTarget = vi.spyOn(prompts, 'askTarget');

    await runMenu(new DatasetSession(), prompts, createOptions(reporter));

    expect(askTarget).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      'Ошибка: No dataset loaded. Load or generate a dataset first.',
    );
  });

  it('загружает файл и продолжает после ошибки загрузки', async () => {
    const reporter = createReporter();
    const session = new DatasetSession();
    const goodPath = join(TEST_DIR, 'data.txt');
    const missingPath = join(TEST_DIR, 'missing.txt');
    await writeFile(goodPath, '30\n10\n20\n');

    await runMenu(
      session,
      scriptedPrompts({ actions: ['load', 'load'], paths: [goodPath, missingPath] }),
      createOptions(reporter),
    );

    expect(session.current).toEqual([10, 20, 30]);
    expect(reporter.onDatasetLoaded).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('пробрасывает ошибки, не связанные с датасетом', async () => {
    const prompts = scriptedPrompts({ actions: ['generate'] });
    prompts.chooseAction = vi
      .fn<() => Promise<MenuAction>>()
      .mockResolvedValueOnce('generate')
      .mockRejectedValueOnce(new Error('prompt closed'));

    await expect(
      runMenu(new DatasetSession(), prompts, createOptions(createReporter())),
    ).rejects.toThrow('prompt closed');
  });
});
