// Barrel-файл модуля тестовых данных.
export type { FixtureProfile } from './profiles.js';
export {
  FIXTURE_PROFILES,
  isFixtureProfile,
  fixtureFileName,
  buildFixtureValues,
  shuffle,
} from './profiles.js';

export type { WriteFixturesOptions, WrittenFixture } from './writer.js';
export { writeFixtures } from './writer.js';
