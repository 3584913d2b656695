import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@finitary/core",
    globals: true,
    environment: "node",
  },
});
