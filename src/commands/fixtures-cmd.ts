// Команда search-study fixtures — файлы с тестовыми данными.
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../config/index.js';
import { createRandom } from '../dataset/index.js';
import { FIXTURE_PROFILES, isFixtureProfile, writeFixtures } from '../fixtures/index.js';
import { parseIntegerOption } from './options.js';
import type { FixtureProfile } from '../fixtures/index.js';

interface FixturesOptions {
  profile?: FixtureProfile[];
  count?: number;
  outDir?: string;
  seed?: number;
  config?: string;
}

// Накопитель для --profile.
function collectProfile(value: string, previous: FixtureProfile[] = []): FixtureProfile[] {
  if (!isFixtureProfile(value)) {
    throw new InvalidArgumentError(`Expected one of: ${FIXTURE_PROFILES.join(', ')}. Got '${value}'.`);
  }
  return [...previous, value];
}

export const fixturesCommand = new Command('fixtures')
  .description('Write test data files (sorted, sparse, duplicates, negative)')
  .option('-p, --profile <name...>', `Profiles to write (${FIXTURE_PROFILES.join(', ')})`, collectProfile)
  .option('-n, --count <n>', 'Values per file', parseIntegerOption)
  .option('-o, --out-dir <dir>', 'Output directory')
  .option('--seed <n>', 'Random seed', parseIntegerOption)
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: FixturesOptions) => {
    try {
      const config = await loadConfig(options.config);

      await writeFixtures(options.profile ?? FIXTURE_PROFILES, {
        outputDir: options.outDir ?? config.fixtures.outputDir,
        count: options.count ?? config.fixtures.count,
        random: createRandom(options.seed),
        onWritten: (fixture) => {
          console.log(`  ${fixture.profile}: ${fixture.lines} строк → ${fixture.path}`);
        },
      });

      console.log('Файлы с тестовыми данными записаны.');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
