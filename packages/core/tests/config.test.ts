/**
 * Tests for the configuration system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { config, defineConfig } from "../src/index.js";
import { loadConfigFromEnv, matchGlob } from "../src/config.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  describe("defaults", () => {
    it("points the runtime symbols at @markweave/runtime", () => {
      expect(config.getString("runtime.counter.module")).toBe("@markweave/runtime");
      expect(config.getString("runtime.counter.name")).toBe("DeprecatedMethodInvocationCounter");
      expect(config.getString("runtime.counter.method")).toBe("onDeprecatedMethodCalled");
      expect(config.getString("runtime.logger.factory")).toBe("LoggerFactory");
      expect(config.getString("runtime.logger.accessor")).toBe("getLogger");
      expect(config.getString("runtime.logger.type")).toBe("Logger");
      expect(config.getString("runtime.logger.method")).toBe("warn");
      expect(config.getString("runtime.trace")).toBe("Error");
    });

    it("starts with debug off and nothing excluded", () => {
      expect(config.has("debug")).toBe(false);
      expect(config.getStringArray("exclude")).toEqual([]);
    });

    it("falls back for missing and non-string values", () => {
      expect(config.getString("runtime.unknown", "fallback")).toBe("fallback");
      expect(config.getString("debug")).toBeUndefined();
    });
  });

  describe("set", () => {
    it("deep-merges programmatic values over defaults", () => {
      config.set({ runtime: { counter: { module: "./metrics" } } });

      expect(config.getString("runtime.counter.module")).toBe("./metrics");
      expect(config.getString("runtime.counter.name")).toBe("DeprecatedMethodInvocationCounter");
    });

    it("exposes the merged store", () => {
      config.set(defineConfig({ debug: true }));
      expect(config.getAll().debug).toBe(true);
    });
  });

  describe("environment variables", () => {
    it("parses MARKWEAVE_* into nested paths", () => {
      expect(
        loadConfigFromEnv({
          MARKWEAVE_DEBUG: "1",
          MARKWEAVE_RUNTIME_COUNTER_MODULE: "./metrics",
          MARKWEAVE_EXCLUDE: "*.spec.ts, legacy/**",
          OTHER_VALUE: "ignored",
        })
      ).toEqual({
        debug: true,
        runtime: { counter: { module: "./metrics" } },
        exclude: ["*.spec.ts", "legacy/**"],
      });
    });

    it("applies environment overrides on load", () => {
      vi.stubEnv("MARKWEAVE_RUNTIME_TRACE", "TraceError");
      config.reset();

      expect(config.getString("runtime.trace")).toBe("TraceError");
    });
  });

  describe("isExcluded", () => {
    it("matches base-name patterns anywhere", () => {
      config.set({ exclude: ["*.spec.ts"] });

      expect(config.isExcluded("/src/widget.spec.ts")).toBe(true);
      expect(config.isExcluded("/src/widget.ts")).toBe(false);
    });

    it("matches path patterns with **", () => {
      expect(config.isExcluded("/repo/legacy/deep/widget.ts", ["**/legacy/**"])).toBe(true);
      expect(config.isExcluded("/repo/src/widget.ts", ["**/legacy/**"])).toBe(false);
    });

    it("normalizes Windows separators", () => {
      expect(config.isExcluded("C:\\repo\\legacy\\widget.ts", ["**/legacy/*.ts"])).toBe(true);
    });
  });

  describe("matchGlob", () => {
    it("keeps * within one directory", () => {
      expect(matchGlob("/a/b/c.ts", "/a/*.ts")).toBe(false);
      expect(matchGlob("/a/c.ts", "/a/*.ts")).toBe(true);
      expect(matchGlob("/a/c1.ts", "/a/c?.ts")).toBe(true);
    });
  });
});
