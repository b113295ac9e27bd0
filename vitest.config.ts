import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // テストファイルのパターン
    include: ['lib/**/*.test.ts', 'src/**/*.test.ts', 'tools/**/*.test.ts'],
    // 重い設定のシミュレーションを考慮
    testTimeout: 20_000,
    // ESM 対応
    pool: 'forks',
  },
});
