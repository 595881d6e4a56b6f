import { defineConfig } from "vitest/config";

/**
 * Vitest 組態：僅於 node 環境執行 test/ 下的單元與整合測試。
 */
export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    restoreMocks: true,
    testTimeout: 20000,
  },
});
