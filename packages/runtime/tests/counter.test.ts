/**
 * Tests for the deprecated-method invocation counter
 */

import { describe, it, expect, beforeEach } from "vitest";
import { DeprecatedMethodInvocationCounter } from "../src/index.js";

describe("DeprecatedMethodInvocationCounter", () => {
  beforeEach(() => {
    DeprecatedMethodInvocationCounter.reset();
  });

  it("counts every invocation per signature", () => {
    DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("com.example.Widget.render()");
    DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("com.example.Widget.render()");
    DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("com.example.Widget.Widget(size: number)");

    expect(DeprecatedMethodInvocationCounter.getInvocationCount("com.example.Widget.render()")).toBe(2);
    expect(
      DeprecatedMethodInvocationCounter.getInvocationCount("com.example.Widget.Widget(size: number)")
    ).toBe(1);
  });

  it("reports whether a signature was invoked", () => {
    DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("Widget.render()");

    expect(DeprecatedMethodInvocationCounter.hasThisMethodInvoked("Widget.render()")).toBe(true);
    expect(DeprecatedMethodInvocationCounter.hasThisMethodInvoked("Widget.paint()")).toBe(false);
    expect(DeprecatedMethodInvocationCounter.getInvocationCount("Widget.paint()")).toBe(0);
  });

  it("returns a detached snapshot of the record", () => {
    DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("Widget.render()");
    const record = DeprecatedMethodInvocationCounter.getInvocationRecord();

    DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("Widget.render()");

    expect([...record]).toEqual([["Widget.render()", 1]]);
    expect(DeprecatedMethodInvocationCounter.getInvocationCount("Widget.render()")).toBe(2);
  });
});
