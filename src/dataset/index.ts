// Barrel-файл модуля датасетов.
export type {
  Dataset,
  GenerationParams,
  ParseWarning,
  ParseWarningReason,
  LoadResult,
} from './types.js';
export { INT32_MIN, INT32_MAX } from './types.js';

export {
  DatasetError,
  DatasetConfigurationError,
  DatasetIOError,
  EmptyDatasetError,
} from './errors.js';
export type { DatasetErrorCode } from './errors.js';

export type { RandomSource } from './random.js';
export { createRandom } from './random.js';

export { generateDataset, validateGenerationParams } from './generator.js';
export { ShardedIntegerSet, MAX_SHARD_SIZE } from './unique-set.js';
export {
  loadDatasetFromFile,
  saveDataset,
  writeIntegerLines,
  normalizeValues,
  parseIntegerLine,
} from './loader.js';
export type { ParsedLine } from './loader.js';
