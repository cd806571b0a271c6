import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["deploy/**/__tests__/**/*.test.ts", "src/**/*.test.ts"],
    environment: "node",
    testTimeout: 15_000,
  },
});
