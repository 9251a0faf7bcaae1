/**
 * Marker discovery - finds routines carrying a marker in a source file
 *
 * A routine is a class method, a class constructor, or an interface method
 * signature. It carries a marker when it has the marker's JSDoc tag
 * (`/** @deprecated *\/`) or decorator (`@Deprecated` / `@Deprecated()`).
 */

import * as ts from "typescript";
import type { MarkedElement, MarkerDefinition, MarkerName, TypeElement } from "./types.js";

export type DiscoveredElements = Map<MarkerName, Set<MarkedElement>>;

/**
 * Collect the marked routines of `sourceFile`, grouped by marker. Every
 * marker in `markers` gets an entry, possibly empty. Overloads of one
 * routine share a symbol and yield a single element.
 */
export function discoverMarkedElements(
  checker: ts.TypeChecker,
  sourceFile: ts.SourceFile,
  markers: readonly MarkerDefinition[]
): DiscoveredElements {
  const found: DiscoveredElements = new Map();
  const seen = new Map<MarkerName, Set<ts.Symbol>>();
  for (const marker of markers) {
    found.set(marker.name, new Set());
    seen.set(marker.name, new Set());
  }
  if (markers.length === 0) return found;

  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node) || ts.isInterfaceDeclaration(node)) {
      const enclosingType = describeType(checker, node);
      if (enclosingType) {
        for (const member of node.members) {
          collectMember(member, enclosingType);
        }
      }
    }
    ts.forEachChild(node, visit);
  };

  const collectMember = (member: ts.Node, enclosingType: TypeElement): void => {
    const routine = toRoutine(checker, member, enclosingType);
    if (!routine) return;

    for (const marker of markers) {
      if (!carriesMarker(member, marker)) continue;

      const symbols = seen.get(marker.name);
      const elements = found.get(marker.name);
      if (!symbols || !elements || symbols.has(routine.symbol)) continue;

      symbols.add(routine.symbol);
      elements.add({ marker: marker.name, ...routine, enclosingType });
    }
  };

  visit(sourceFile);
  return found;
}

// ============================================================================
// Marker Matching
// ============================================================================

export function carriesMarker(node: ts.Node, marker: MarkerDefinition): boolean {
  if (marker.jsDocTag && ts.getJSDocTags(node).some((tag) => tag.tagName.text === marker.jsDocTag)) {
    return true;
  }

  if (marker.decorator && ts.canHaveDecorators(node)) {
    const decorators = ts.getDecorators(node) ?? [];
    return decorators.some((decorator) => decoratorName(decorator) === marker.decorator);
  }

  return false;
}

function decoratorName(decorator: ts.Decorator): string | undefined {
  const expr = decorator.expression;
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isCallExpression(expr) && ts.isIdentifier(expr.expression)) return expr.expression.text;
  return undefined;
}

// ============================================================================
// Elements
// ============================================================================

function toRoutine(
  checker: ts.TypeChecker,
  member: ts.Node,
  enclosingType: TypeElement
): { name: string; symbol: ts.Symbol } | undefined {
  if (ts.isConstructorDeclaration(member)) {
    const symbol = enclosingType.symbol.members?.get(ts.InternalSymbolName.Constructor);
    return symbol ? { name: enclosingType.simpleName, symbol } : undefined;
  }

  if (ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) {
    const symbol = checker.getSymbolAtLocation(member.name);
    return symbol ? { name: memberName(member.name), symbol } : undefined;
  }

  return undefined;
}

function memberName(name: ts.PropertyName): string {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText();
}

/** Describe a named class or interface; anonymous classes yield undefined */
export function describeType(
  checker: ts.TypeChecker,
  declaration: ts.ClassLikeDeclaration | ts.InterfaceDeclaration
): TypeElement | undefined {
  const nameNode = declaration.name;
  if (!nameNode) return undefined;

  const symbol = checker.getSymbolAtLocation(nameNode);
  if (!symbol) return undefined;

  const simpleName = nameNode.text;
  const qualifiedName = [...enclosingNamespaces(declaration), simpleName].join(".");
  return { simpleName, qualifiedName, symbol, declaration };
}

/** Names of the namespaces around `node`, outermost first */
function enclosingNamespaces(node: ts.Node): string[] {
  const names: string[] = [];
  for (let current = node.parent; current; current = current.parent) {
    if (ts.isModuleDeclaration(current) && ts.isIdentifier(current.name)) {
      names.unshift(current.name.text);
    }
  }
  return names;
}
