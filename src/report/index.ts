// Barrel-файл модуля вывода.
export {
  MAX_PRINTED_WARNINGS,
  formatDuration,
  formatOutcome,
  formatClosestValues,
  formatTiming,
  formatParseWarning,
  formatParseWarnings,
  formatComparisonTable,
} from './format.js';

export type { SearchReporter } from './console-reporter.js';
export { ConsoleReporter } from './console-reporter.js';
