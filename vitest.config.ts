import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["api/__tests__/**/*.test.ts"],
    setupFiles: ["./api/__tests__/vitest.setup.ts"],
    testTimeout: 15_000,
    restoreMocks: true,
  },
});
