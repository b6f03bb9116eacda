import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 单测与源码同目录（*.test.ts）或放在 __test__/ 下
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/cli/index.ts'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
    },
  },
});
