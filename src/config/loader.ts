import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig } from './schema.js';

// ${ENV_VAR} внутри строковых значений.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

// Переменная окружения с путём к конфигу.
export const CONFIG_ENV_VAR = 'SEARCH_STUDY_CONFIG';

// Имя конфиг-файла в текущей директории.
export const LOCAL_CONFIG_FILE = 'search-study.config.yaml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Подставляет значения process.env вместо ${ENV_VAR} во всех строках
 * (рекурсивно по объектам и массивам). Неизвестные переменные остаются как есть.
 */
export function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_VAR_PATTERN, (match, name: string) => process.env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [key, resolveEnvVars(nested)]),
    );
  }
  return value;
}

/**
 * Накладывает source на target без мутации аргументов.
 * Объекты сливаются рекурсивно, всё остальное (включая массивы) заменяется.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...target };

  for (const [key, incoming] of Object.entries(source)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(incoming)
      ? deepMerge(existing, incoming)
      : incoming;
  }

  return merged;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

// Явно указанный файл обязан существовать.
async function requireFile(filePath: string, source: string): Promise<string> {
  const resolved = resolve(filePath);
  if (!(await fileExists(resolved))) {
    throw new Error(`Config file not found at ${source}: ${resolved}`);
  }
  return resolved;
}

/**
 * Путь к конфигу. Приоритет: --config, SEARCH_STUDY_CONFIG,
 * ./search-study.config.yaml, ~/.config/search-study/config.yaml.
 * Первые два источника — явные: отсутствие файла по ним является ошибкой.
 * Если ничего не найдено — null.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    return requireFile(configPath, 'path');
  }

  const envConfigPath = process.env[CONFIG_ENV_VAR];
  if (envConfigPath) {
    return requireFile(envConfigPath, `${CONFIG_ENV_VAR} path`);
  }

  const candidates = [
    resolve(LOCAL_CONFIG_FILE),
    join(homedir(), '.config', 'search-study', 'config.yaml'),
  ];
  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Загружает конфиг: YAML → подстановка env → merge поверх дефолтов → zod.
 * Без файла (или с пустым файлом) возвращает дефолты.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  if (!resolvedPath) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const parsed: unknown = parseYaml(await readFile(resolvedPath, 'utf-8'));
  const withEnvVars = resolveEnvVars(parsed);

  const merged = isPlainObject(withEnvVars)
    ? deepMerge({ ...defaultConfig }, withEnvVars)
    : { ...defaultConfig };

  return AppConfigSchema.parse(merged);
}
