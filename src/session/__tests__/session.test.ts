import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DatasetSession, EmptySessionError, searchDataset } from '../session.js';
import { createRandom } from '../../dataset/random.js';
import { DatasetConfigurationError, DatasetIOError, EmptyDatasetError } from '../../dataset/errors.js';
import { jumpSearchStrategy } from '../../search/strategies.js';
import type { Clock } from '../../timing/types.js';

const TEST_DIR = join(tmpdir(), 'search-study-session-test');

// Каждое обращение сдвигает время на 1 мс.
function tickingClock(): Clock {
  let now = 0;
  return () => now++;
}

beforeEach(async () => {
  await mkdir(TEST_DIR, { recursive: true });
});

afterEach(async () => {
  await rm(TEST_DIR, { recursive: true, force: true });
});

describe('searchDataset', () => {
  it('при попадании не ищет ближайшие значения', () => {
    const result = searchDataset([1, 5, 9], jumpSearchStrategy, 5, {
      repetitions: 2,
      clock: tickingClock(),
    });

    expect(result.benchmark.outcome).toEqual({ found: true, index: 1 });
    expect(result.benchmark.averageMicros).toBe(1000);
    expect(result.closest).toEqual([]);
  });

  it('при промахе возвращает ближайшие значения', () => {
    const result = searchDataset([10, 20, 30], jumpSearchStrategy, 15, { repetitions: 1 });

    expect(result.benchmark.outcome).toEqual({ found: false });
    expect(result.closest).toEqual([10, 20, 30]);
  });
});

describe('DatasetSession', () => {
  it('новая сессия пуста, поиск в ней — EmptySessionError', () => {
    const session = new DatasetSession();

    expect(session.isEmpty).toBe(true);
    expect(session.size).toBe(0);
    expect(() => session.search('jump', 1)).toThrow(EmptySessionError);
  });

  it('generate заменяет текущий датасет', () => {
    const session = new DatasetSession();

    session.generate({ count: 5, min: 1, max: 5 }, createRandom(1));

    expect(session.current).toEqual([1, 2, 3, 4, 5]);
    expect(session.size).toBe(5);
  });

  it('ошибка генерации не меняет текущий датасет', () => {
    const session = new DatasetSession();
    session.generate({ count: 3, min: 1, max: 3 }, createRandom(1));

    expect(() => session.generate({ count: 5, min: 1, max: 4 })).toThrow(DatasetConfigurationError);
    expect(session.current).toEqual([1, 2, 3]);
  });

  it('load заменяет датасет и возвращает предупреждения', async () => {
    const path = join(TEST_DIR, 'data.txt');
    await writeFile(path, '3\n1\nfoo\n2\n1\n');
    const session = new DatasetSession();

    const result = await session.load(path);

    expect(session.current).toEqual([1, 2, 3]);
    expect(result.warnings).toHaveLength(1);
  });

  it('несуществующий файл — ошибка, пустая сессия остаётся пустой', async () => {
    const session = new DatasetSession();

    await expect(session.load(join(TEST_DIR, 'missing.txt'))).rejects.toBeInstanceOf(DatasetIOError);
    expect(session.isEmpty).toBe(true);
  });

  it('файл без чисел — ошибка, предыдущий датасет сохраняется', async () => {
    const path = join(TEST_DIR, 'garbage.txt');
    await writeFile(path, 'x\ny\n');
    const session = new DatasetSession();
    session.generate({ count: 2, min: 7, max: 8 }, createRandom(1));

    await expect(session.load(path)).rejects.toBeInstanceOf(EmptyDatasetError);
    expect(session.current).toEqual([7, 8]);
  });

  it('search использует выбранную стратегию', () => {
    const session = new DatasetSession();
    session.generate({ count: 10, min: 1, max: 10 }, createRandom(1));

    const jump = session.search('jump', 4, { repetitions: 3 });
    const interpolation = session.search('interpolation', 4, { repetitions: 3 });

    expect(jump.benchmark.strategy).toBe('jump');
    expect(jump.benchmark.repetitions).toBe(3);
    expect(interpolation.benchmark.strategy).toBe('interpolation');
    expect(interpolation.benchmark.outcome).toEqual({ found: true, index: 3 });
  });
});
