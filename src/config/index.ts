// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  GenerationConfigSchema,
  BenchmarkConfigSchema,
  FixturesConfigSchema,
} from './schema.js';

export type {
  AppConfig,
  GenerationConfig,
  BenchmarkConfig,
  FixturesConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export {
  loadConfig,
  resolveConfigPath,
  resolveEnvVars,
  deepMerge,
  CONFIG_ENV_VAR,
  LOCAL_CONFIG_FILE,
} from './loader.js';
