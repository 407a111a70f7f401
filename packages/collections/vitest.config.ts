import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@corral/collections",
    globals: true,
    environment: "node",
  },
});
