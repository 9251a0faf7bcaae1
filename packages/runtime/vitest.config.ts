import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@markweave/runtime",
    globals: true,
    environment: "node",
  },
});
