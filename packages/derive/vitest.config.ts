import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@finitary/derive",
    globals: true,
    environment: "node",
  },
});
