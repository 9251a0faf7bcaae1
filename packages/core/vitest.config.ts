import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@markweave/core",
    globals: true,
    environment: "node",
  },
});
