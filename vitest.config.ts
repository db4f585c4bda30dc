import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
    // fixtures and helpers live beside the tests
    exclude: ["src/__tests__/fixtures/**"],
  },
});
