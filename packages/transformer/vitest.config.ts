import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@markweave/transformer",
    globals: true,
    environment: "node",
  },
});
