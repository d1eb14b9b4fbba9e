// Публичный API пакета.
export * from './dataset/index.js';
export * from './search/index.js';
export * from './timing/index.js';
export * from './session/index.js';
export * from './fixtures/index.js';
export * from './report/index.js';
export * from './config/index.js';
