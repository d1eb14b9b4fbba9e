// Профили файлов с тестовыми данными.
import { generateDataset } from '../dataset/generator.js';
import type { RandomSource } from '../dataset/random.js';

export type FixtureProfile = 'sorted-asc' | 'sorted-desc' | 'sparse' | 'duplicates' | 'negative';

export const FIXTURE_PROFILES: readonly FixtureProfile[] = [
  'sorted-asc',
  'sorted-desc',
  'sparse',
  'duplicates',
  'negative',
];

// Диапазоны случайных профилей.
const SPARSE_RANGE = { min: 1, max: 100000000 };
const DUPLICATES_RANGE = { min: 1, max: 1000 };
const NEGATIVE_RANGE = { min: -500000, max: 500000 };

export function isFixtureProfile(value: string): value is FixtureProfile {
  return FIXTURE_PROFILES.some((profile) => profile === value);
}

// Имя файла профиля: data_sorted_asc.txt и т.д.
export function fixtureFileName(profile: FixtureProfile): string {
  return `data_${profile.replace('-', '_')}.txt`;
}

// Перемешивание Фишера — Йетса на месте.
export function shuffle(values: number[], random: RandomSource): number[] {
  for (let i = values.length - 1; i > 0; i--) {
    const j = random.nextInt(0, i);
    const tmp = values[i]!;
    values[i] = values[j]!;
    values[j] = tmp;
  }
  return values;
}

/**
 * Строит содержимое файла профиля в порядке записи.
 *
 * - sorted-asc: 1..count по возрастанию.
 * - sorted-desc: count..1 по убыванию.
 * - sparse: count уникальных значений из [1, 100 000 000], перемешаны.
 * - duplicates: count значений из [1, 1000] с повторами.
 * - negative: count уникальных значений из [-500 000, 500 000], перемешаны.
 */
export function buildFixtureValues(
  profile: FixtureProfile,
  count: number,
  random: RandomSource,
): number[] {
  switch (profile) {
  case 'sorted-asc':
    return Array.from({ length: count }, (_, i) => i + 1);
  case 'sorted-desc':
    return Array.from({ length: count }, (_, i) => count - i);
  case 'sparse':
    return shuffle([...generateDataset({ count, ...SPARSE_RANGE }, random)], random);
  case 'duplicates':
    return Array.from(
      { length: count },
      () => random.nextInt(DUPLICATES_RANGE.min, DUPLICATES_RANGE.max),
    );
  case 'negative':
    return shuffle([...generateDataset({ count, ...NEGATIVE_RANGE }, random)], random);
  default:
    throw new Error(`Unsupported fixture profile: ${profile as string}`);
  }
}
