// Загрузка датасета из текстового файла: одно целое число на строку.
import { readFile, writeFile } from 'node:fs/promises';
import { DatasetIOError, EmptyDatasetError } from './errors.js';
import { INT32_MAX, INT32_MIN } from './types.js';
import type { Dataset, LoadResult, ParseWarning, ParseWarningReason } from './types.js';

// Необязательный знак и хотя бы одна цифра, пробелы по краям допускаются.
const INTEGER_PATTERN = /^[+-]?\d+$/;

// Результат разбора одной строки.
export type ParsedLine =
  | { ok: true; value: number }
  | { ok: false; reason: ParseWarningReason };

// Разбирает строку как 32-битное знаковое целое.
// Строка должна быть числом целиком: '12abc' и '1.5' отклоняются, а не обрезаются до префикса.
export function parseIntegerLine(text: string): ParsedLine {
  const trimmed = text.trim();

  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, reason: 'invalid' };
  }

  const value = Number(trimmed);
  if (value < INT32_MIN || value > INT32_MAX) {
    return { ok: false, reason: 'out-of-range' };
  }

  // Number('-0') === -0, приводим к обычному нулю.
  return { ok: true, value: value === 0 ? 0 : value };
}

// Сортирует по возрастанию и схлопывает соседние равные значения.
export function normalizeValues(values: readonly number[]): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  const result: number[] = [];

  for (const value of sorted) {
    if (result.length === 0 || result[result.length - 1] !== value) {
      result.push(value);
    }
  }

  return result;
}

/**
 * Загружает датасет из файла.
 *
 * Каждая строка разбирается отдельно: нераспознанные и выходящие за 32 бита
 * строки пропускаются с предупреждением. Пустые строки тоже попадают в
 * предупреждения как 'invalid'. Завершающий перевод строки файла не считается
 * отдельной строкой.
 *
 * @throws DatasetIOError — файл не удалось прочитать.
 * @throws EmptyDatasetError — ни одна строка не распознана.
 */
export async function loadDatasetFromFile(path: string): Promise<LoadResult> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetIOError(path, error);
  }

  const lines = raw.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const values: number[] = [];
  const warnings: ParseWarning[] = [];

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i]!;
    const parsed = parseIntegerLine(text);

    if (parsed.ok) {
      values.push(parsed.value);
    } else {
      warnings.push({ line: i + 1, text: text.replace(/\r$/, ''), reason: parsed.reason });
    }
  }

  if (values.length === 0) {
    throw new EmptyDatasetError(path);
  }

  const dataset = normalizeValues(values);

  return {
    dataset,
    warnings,
    rawCount: values.length,
    duplicatesRemoved: values.length - dataset.length,
  };
}

// Пишет значения по одному на строку, с завершающим переводом строки.
export async function writeIntegerLines(path: string, values: readonly number[]): Promise<void> {
  const content = values.length > 0 ? values.join('\n') + '\n' : '';
  try {
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new DatasetIOError(path, error, 'write');
  }
}

// Сохраняет датасет в том же формате, который читает loadDatasetFromFile.
export async function saveDataset(path: string, dataset: Dataset): Promise<void> {
  await writeIntegerLines(path, dataset);
}
