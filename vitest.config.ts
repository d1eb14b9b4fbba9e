import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // Тесты конфига меняют process.cwd(), что недоступно в worker threads.
    pool: 'forks',
  },
});
