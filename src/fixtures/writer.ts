// Запись файлов с тестовыми данными на диск.
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { writeIntegerLines } from '../dataset/loader.js';
import { createRandom } from '../dataset/random.js';
import { buildFixtureValues, fixtureFileName } from './profiles.js';
import type { RandomSource } from '../dataset/random.js';
import type { FixtureProfile } from './profiles.js';

export interface WriteFixturesOptions {
  outputDir: string;
  count: number;
  random?: RandomSource;
  onWritten?: (fixture: WrittenFixture) => void;
}

// Записанный файл профиля.
export interface WrittenFixture {
  profile: FixtureProfile;
  path: string;
  lines: number;
}

// Пишет по файлу на каждый профиль в outputDir (создаёт директорию при необходимости).
export async function writeFixtures(
  profiles: readonly FixtureProfile[],
  options: WriteFixturesOptions,
): Promise<WrittenFixture[]> {
  const { outputDir, count, random = createRandom(), onWritten } = options;

  if (!Number.isInteger(count) || count < 1) {
    throw new Error(`Fixture count must be a positive integer, got ${count}`);
  }

  await mkdir(outputDir, { recursive: true });

  const written: WrittenFixture[] = [];

  for (const profile of profiles) {
    const values = buildFixtureValues(profile, count, random);
    const path = join(outputDir, fixtureFileName(profile));
    await writeIntegerLines(path, values);

    const fixture: WrittenFixture = { profile, path, lines: values.length };
    written.push(fixture);
    onWritten?.(fixture);
  }

  return written;
}
