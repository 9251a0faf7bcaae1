/**
 * Tests for the per-element handler base class
 */

import { describe, it, expect } from "vitest";
import {
  PerElementHandler,
  ElementProcessingFailed,
  countOutcomes,
  discoverMarkedElements,
  type ElementResult,
  type MarkedElement,
  type MarkerName,
} from "../src/index.js";
import { createTestEnvironment } from "./fixtures.js";

const FILE = "/virtual/widget.ts";

class ScriptedHandler extends PerElementHandler {
  readonly name = "scripted";
  readonly seen: string[] = [];

  constructor(private readonly script: Record<string, () => ElementResult>) {
    super();
  }

  markersHandled(): ReadonlySet<MarkerName> {
    return new Set(["deprecated"]);
  }

  protected processElement(element: MarkedElement): ElementResult {
    this.seen.push(element.name);
    const step = this.script[element.name];
    return step ? step() : { state: "rewritten" };
  }
}

function setup() {
  const { test, env } = createTestEnvironment(
    FILE,
    `export class Widget {
  /** @deprecated */ render() {}
  /** @deprecated */ paint() {}
  /** @deprecated */ fill() {}
}`
  );
  const found = discoverMarkedElements(test.checker, test.file(FILE), [
    { name: "deprecated", jsDocTag: "deprecated" },
  ]);
  return { env, elements: found.get("deprecated") ?? new Set<MarkedElement>() };
}

describe("PerElementHandler", () => {
  it("processes every element in order", () => {
    const { env, elements } = setup();
    const handler = new ScriptedHandler({});

    const report = handler.process(elements, env);

    expect(handler.seen).toEqual(["render", "paint", "fill"]);
    expect(report.handler).toBe("scripted");
    expect(countOutcomes(report)).toEqual({ rewritten: 3, skipped: 0, failed: 0 });
  });

  it("isolates a failing element from the rest of the batch", () => {
    const { env, elements } = setup();
    const handler = new ScriptedHandler({
      paint: () => {
        throw new Error("no tree");
      },
    });

    const report = handler.process(elements, env);

    expect(handler.seen).toEqual(["render", "paint", "fill"]);
    expect(report.outcomes.map((o) => o.state)).toEqual(["rewritten", "failed", "rewritten"]);

    const failed = report.outcomes[1];
    if (failed.state !== "failed") throw new Error("expected a failure");
    expect(failed.error).toBeInstanceOf(ElementProcessingFailed);
    expect(failed.error.message).toBe("Failed to process Widget.paint: no tree");
    expect(failed.error.element).toBe(failed.element);
    expect(failed.error.cause).toBeInstanceOf(Error);
  });

  it("records skipped elements with their reason", () => {
    const { env, elements } = setup();
    const handler = new ScriptedHandler({
      fill: () => ({ state: "skipped", reason: "no body" }),
    });

    const report = handler.process(elements, env);

    expect(report.outcomes[2]).toMatchObject({ state: "skipped", reason: "no body" });
    expect(countOutcomes(report)).toEqual({ rewritten: 2, skipped: 1, failed: 0 });
  });

  it("handles an empty batch", () => {
    const { env } = setup();
    const report = new ScriptedHandler({}).process(new Set(), env);
    expect(report.outcomes).toEqual([]);
  });
});
