// Ошибки построения датасета.

export type DatasetErrorCode = 'CONFIGURATION' | 'IO' | 'EMPTY_RESULT';

// Базовая ошибка модуля датасетов.
export class DatasetError extends Error {
  readonly code: DatasetErrorCode;

  constructor(message: string, code: DatasetErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetError';
    this.code = code;
  }
}

// Невыполнимые или некорректные параметры генерации.
export class DatasetConfigurationError extends DatasetError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'DatasetConfigurationError';
  }
}

// Файл не удалось прочитать.
export class DatasetIOError extends DatasetError {
  readonly path: string;

  constructor(path: string, cause: unknown, operation: 'read' | 'write' = 'read') {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not ${operation} file '${path}': ${reason}`, 'IO', { cause });
    this.name = 'DatasetIOError';
    this.path = path;
  }
}

// Файл открыт, но ни одна строка не распознана как целое число.
export class EmptyDatasetError extends DatasetError {
  readonly path: string;

  constructor(path: string) {
    super(`No valid integers loaded from file '${path}'`, 'EMPTY_RESULT');
    this.name = 'EmptyDatasetError';
    this.path = path;
  }
}
