import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/api/tests/**/*.test.ts"],
    testTimeout: 15_000
  }
});
