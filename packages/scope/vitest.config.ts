import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@corral/scope",
    globals: true,
    environment: "node",
  },
});
