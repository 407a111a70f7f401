import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@corral/core",
    globals: true,
    environment: "node",
  },
});
