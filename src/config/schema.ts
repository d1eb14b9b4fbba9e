import { z } from 'zod';

// Схема параметров генерации случайного датасета.
export const GenerationConfigSchema = z.object({
  count: z.number().int().nonnegative().default(1000000),
  min: z.number().int().default(1),
  max: z.number().int().default(10000000),
  // Без seed генератор инициализируется от часов.
  seed: z.number().int().optional(),
});

// Схема параметров замеров.
export const BenchmarkConfigSchema = z.object({
  repetitions: z.number().int().positive().default(1000),
  warmupRuns: z.number().int().nonnegative().default(0),
});

// Схема генерации файлов с тестовыми данными.
export const FixturesConfigSchema = z.object({
  outputDir: z.string().default('./data'),
  count: z.number().int().positive().default(100000),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  generation: GenerationConfigSchema.default(() => ({
    count: 1000000,
    min: 1,
    max: 10000000,
  })),
  benchmark: BenchmarkConfigSchema.default(() => ({
    repetitions: 1000,
    warmupRuns: 0,
  })),
  fixtures: FixturesConfigSchema.default(() => ({
    outputDir: './data',
    count: 100000,
  })),
});

// Типы, выведенные из схем.
export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>;
export type FixturesConfig = z.infer<typeof FixturesConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
