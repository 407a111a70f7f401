import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Package tests
      "packages/*/vitest.config.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    pool: "forks",
    typecheck: {
      enabled: false,
    },
  },
});
