import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@finitary/std",
    globals: true,
    environment: "node",
  },
});
