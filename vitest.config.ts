import { defineConfig } from 'vitest/config';

/**
 * ワークスペース全体のユニットテスト設定
 *
 * 実行: npm test
 * 子プロセス・ソケットは使わず、すべてインプロセスのフェイクで完結する
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
