import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/src/**/__tests__/**/*.test.ts"],
    testTimeout: 15_000,
    sequence: { concurrent: false }
  }
});
