import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@markweave/handlers",
    globals: true,
    environment: "node",
  },
});
