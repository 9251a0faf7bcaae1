/**
 * Tests for the name table and the declaration-tree bridge
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { NameTable, DeclarationTrees, discoverMarkedElements, type MarkedElement } from "../src/index.js";
import { createTestProgram } from "./fixtures.js";

const FILE = "/virtual/widget.ts";

describe("NameTable", () => {
  it("interns identical text to the identical name", () => {
    const table = NameTable.instance(createTestProgram({ [FILE]: "" }).program);

    const a = table.fromString("render");
    const b = table.fromString("render");

    expect(a).toBe(b);
    expect(Object.isFrozen(a)).toBe(true);
    expect(table.size).toBe(1);
  });

  it("escapes leading underscores", () => {
    const table = NameTable.instance(createTestProgram({ [FILE]: "" }).program);
    expect(table.fromString("__proto").escapedText).toBe("___proto");
  });

  it("shares one table per program", () => {
    const { program } = createTestProgram({ [FILE]: "" });
    expect(NameTable.instance(program)).toBe(NameTable.instance(program));
  });
});

describe("DeclarationTrees", () => {
  function elementsOf(code: string) {
    const test = createTestProgram({ [FILE]: code });
    const found = discoverMarkedElements(test.checker, test.file(FILE), [
      { name: "deprecated", jsDocTag: "deprecated" },
    ]);
    return { trees: DeclarationTrees.instance(test.program), elements: [...(found.get("deprecated") ?? [])] };
  }

  function only(elements: MarkedElement[]): MarkedElement {
    expect(elements).toHaveLength(1);
    return elements[0];
  }

  it("returns the declaration of a method", () => {
    const { trees, elements } = elementsOf(`
export class Widget {
  /** @deprecated */
  render(): void {}
}`);
    const tree = trees.getTree(only(elements));
    expect(tree && ts.isMethodDeclaration(tree)).toBe(true);
  });

  it("prefers the implementation of an overloaded routine", () => {
    const { trees, elements } = elementsOf(`
export class Widget {
  /** @deprecated */
  resize(width: number): void;
  resize(width: number, height?: number): void {}
}`);
    const tree = trees.getTree(only(elements));
    expect(tree && !ts.isMethodSignature(tree) ? tree.body : undefined).toBeDefined();
  });

  it("renders parameters with their types", () => {
    const { trees, elements } = elementsOf(`
export class Widget {
  /** @deprecated */
  resize(width: number, label?: string): void {}
}`);
    expect(trees.renderParameters(only(elements))).toBe("width: number, label: string | undefined");
  });

  it("renders an empty parameter list", () => {
    const { trees, elements } = elementsOf(`
export class Widget {
  /** @deprecated */
  render(): void {}
}`);
    expect(trees.renderParameters(only(elements))).toBe("");
  });
});
