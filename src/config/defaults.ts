import type { AppConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  generation: {
    count: 1000000,
    min: 1,
    max: 10000000,
  },
  benchmark: {
    repetitions: 1000,
    warmupRuns: 0,
  },
  fixtures: {
    outputDir: './data',
    count: 100000,
  },
};
