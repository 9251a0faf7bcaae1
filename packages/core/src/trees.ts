/**
 * DeclarationTrees - bridge from routine symbols to their syntax trees
 */

import * as ts from "typescript";
import type { MarkedElement, RoutineDeclaration } from "./types.js";

export class DeclarationTrees {
  private static readonly bridges = new WeakMap<ts.Program, DeclarationTrees>();

  /** The bridge for `program`, created on first use */
  static instance(program: ts.Program): DeclarationTrees {
    let bridge = DeclarationTrees.bridges.get(program);
    if (!bridge) {
      bridge = new DeclarationTrees(program.getTypeChecker());
      DeclarationTrees.bridges.set(program, bridge);
    }
    return bridge;
  }

  private constructor(readonly checker: ts.TypeChecker) {}

  /**
   * The declaration of a marked routine. For overloaded routines this is the
   * implementation (the declaration with a body) when there is one.
   */
  getTree(element: MarkedElement): RoutineDeclaration | undefined {
    const routines = (element.symbol.declarations ?? []).filter(isRoutineDeclaration);
    return routines.find((decl) => getRoutineBody(decl) !== undefined) ?? routines[0];
  }

  /**
   * Render a routine's parameter list as `name: type` pairs joined by ", ".
   * The result is descriptive text, not a parseable signature.
   */
  renderParameters(element: MarkedElement): string {
    const tree = this.getTree(element);
    if (!tree) return "";

    const signature = this.checker.getSignatureFromDeclaration(tree);
    if (!signature) {
      return tree.parameters.map((p) => p.name.getText()).join(", ");
    }

    return signature
      .getParameters()
      .map((param) => {
        const type = this.checker.getTypeOfSymbolAtLocation(param, tree);
        return `${param.getName()}: ${this.checker.typeToString(type)}`;
      })
      .join(", ");
  }
}

export function isRoutineDeclaration(node: ts.Node): node is RoutineDeclaration {
  return ts.isMethodDeclaration(node) || ts.isConstructorDeclaration(node) || ts.isMethodSignature(node);
}

/** The body of a routine, or undefined for signatures and abstract or overload declarations */
export function getRoutineBody(decl: RoutineDeclaration): ts.Block | undefined {
  return ts.isMethodSignature(decl) ? undefined : decl.body;
}
