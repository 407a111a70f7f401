import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@corral/std",
    globals: true,
    environment: "node",
  },
});
