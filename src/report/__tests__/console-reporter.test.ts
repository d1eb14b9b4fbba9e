import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleReporter } from '../console-reporter.js';
import type { SearchBenchmark } from '../../timing/types.js';

const benchmark: SearchBenchmark = {
  strategy: 'interpolation',
  label: 'Interpolation Search',
  target: 15,
  outcome: { found: false },
  repetitions: 10,
  totalMicros: 10000,
  averageMicros: 1000,
  minMicros: 1000,
  maxMicros: 1000,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ConsoleReporter', () => {
  it('печатает исход, ближайшие значения и время', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleReporter().onSearchComplete(15, { benchmark, closest: [10, 20, 30] });

    expect(log.mock.calls).toEqual([
      ['Значение 15 не найдено.'],
      ['Ближайшие значения в датасете: 10 20 30'],
      ['Interpolation Search: 1.0000 мс в среднем за 10 повторов (мин 1.0000 мс, макс 1.0000 мс)'],
    ]);
  });

  it('не печатает ближайшие значения при попадании', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleReporter().onSearchComplete(15, {
      benchmark: { ...benchmark, outcome: { found: true, index: 0 } },
      closest: [],
    });

    expect(log).toHaveBeenCalledTimes(2);
    expect(log.mock.calls[0]).toEqual(['Значение 15 найдено по индексу 0.']);
  });

  it('выводит предупреждения загрузки в stderr', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    new ConsoleReporter().onDatasetLoaded('data.txt', {
      dataset: [1, 2, 3],
      warnings: [{ line: 3, text: 'foo', reason: 'invalid' }],
      rawCount: 4,
      duplicatesRemoved: 1,
    });

    expect(warn.mock.calls).toEqual([
      ["Предупреждения при чтении 'data.txt':"],
      ["  Строка 3: 'foo' — не целое число, пропущена"],
    ]);
    expect(log.mock.calls).toEqual([
      ["Датасет загружен из 'data.txt': 3 элементов (удалено дубликатов: 1)."],
    ]);
  });

  it('сообщает о сгенерированном датасете', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleReporter().onDatasetGenerated(1000000);

    expect(log).toHaveBeenCalledWith('Датасет сгенерирован и отсортирован: 1000000 уникальных элементов.');
  });
});
