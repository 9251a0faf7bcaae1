/**
 * Tests for marker discovery
 */

import { describe, it, expect } from "vitest";
import { discoverMarkedElements, type MarkedElement, type MarkerDefinition } from "../src/index.js";
import { createTestProgram } from "./fixtures.js";

const FILE = "/virtual/widget.ts";

const DEPRECATED: MarkerDefinition = { name: "deprecated", jsDocTag: "deprecated", decorator: "Deprecated" };

function discover(code: string, markers: MarkerDefinition[] = [DEPRECATED]): MarkedElement[] {
  const test = createTestProgram({ [FILE]: code });
  const found = discoverMarkedElements(test.checker, test.file(FILE), markers);
  return [...(found.get(markers[0].name) ?? [])];
}

function names(elements: MarkedElement[]): string[] {
  return elements.map((e) => `${e.enclosingType.qualifiedName}.${e.name}`);
}

describe("discoverMarkedElements", () => {
  it("finds methods marked with a JSDoc tag", () => {
    const elements = discover(`
export class Widget {
  /** @deprecated use paint() */
  render(): void {}
  paint(): void {}
}`);
    expect(names(elements)).toEqual(["Widget.render"]);
    expect(elements[0].marker).toBe("deprecated");
    expect(elements[0].symbol.getName()).toBe("render");
  });

  it("finds methods marked with a decorator, called or bare", () => {
    const elements = discover(`
declare function Deprecated(...args: unknown[]): any;
export class Widget {
  @Deprecated render(): void {}
  @Deprecated() paint(): void {}
  @Other() fill(): void {}
}
declare function Other(): any;`);
    expect(names(elements)).toEqual(["Widget.render", "Widget.paint"]);
  });

  it("names constructors after their class", () => {
    const elements = discover(`
export class Widget {
  /** @deprecated */
  constructor(size: number) {}
}`);
    expect(names(elements)).toEqual(["Widget.Widget"]);
    expect(elements[0].name).toBe(elements[0].enclosingType.simpleName);
  });

  it("qualifies types by their enclosing namespaces", () => {
    const elements = discover(`
namespace com.example {
  export class Widget {
    /** @deprecated */
    render() { return 1; }
  }
}`);
    expect(elements[0].enclosingType.qualifiedName).toBe("com.example.Widget");
    expect(elements[0].enclosingType.simpleName).toBe("Widget");
  });

  it("finds interface method signatures", () => {
    const elements = discover(`
export interface Shape {
  /** @deprecated */
  area(): number;
}`);
    expect(names(elements)).toEqual(["Shape.area"]);
  });

  it("yields one element per overloaded routine", () => {
    const elements = discover(`
export class Widget {
  /** @deprecated */
  resize(width: number): void;
  /** @deprecated */
  resize(width: number, height: number): void;
  resize(width: number, height?: number): void {}
}`);
    expect(names(elements)).toEqual(["Widget.resize"]);
  });

  it("skips anonymous classes and unmarked members", () => {
    const elements = discover(`
export default class {
  /** @deprecated */
  render() {}
}
export class Widget {
  /** plain docs */
  render() {}
}`);
    expect(elements).toEqual([]);
  });

  it("groups elements by marker", () => {
    const test = createTestProgram({
      [FILE]: `
export class Widget {
  /** @deprecated */
  render() {}
  /** @experimental */
  paint() {}
}`,
    });
    const found = discoverMarkedElements(test.checker, test.file(FILE), [
      DEPRECATED,
      { name: "experimental", jsDocTag: "experimental" },
      { name: "internal", jsDocTag: "internal" },
    ]);

    expect(names([...(found.get("deprecated") ?? [])])).toEqual(["Widget.render"]);
    expect(names([...(found.get("experimental") ?? [])])).toEqual(["Widget.paint"]);
    expect(found.get("internal")?.size).toBe(0);
  });
});
