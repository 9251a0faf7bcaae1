/**
 * Core types for the markweave instrumentation engine
 */

import type * as ts from "typescript";

// ============================================================================
// Markers
// ============================================================================

/** Identifier of a marker, e.g. "deprecated" */
export type MarkerName = string;

/**
 * A declarative tag that discovery looks for on routine declarations.
 *
 * A declaration carries the marker when it has a JSDoc tag named `jsDocTag`
 * or a decorator whose callee is the identifier `decorator`.
 */
export interface MarkerDefinition {
  /** Unique name of the marker */
  name: MarkerName;

  /** Optional description for documentation */
  description?: string;

  /** JSDoc tag name (without the `@`) */
  jsDocTag?: string;

  /** Decorator identifier (without the `@`) */
  decorator?: string;
}

// ============================================================================
// Marked Elements
// ============================================================================

/** The type declaration enclosing a marked routine */
export interface TypeElement {
  /** Simple name of the type, e.g. "Widget" */
  readonly simpleName: string;

  /** Enclosing namespaces and the simple name joined with ".", e.g. "com.example.Widget" */
  readonly qualifiedName: string;

  readonly symbol: ts.Symbol;

  readonly declaration: ts.ClassLikeDeclaration | ts.InterfaceDeclaration;
}

/**
 * A routine (method or constructor) the host discovered as carrying a marker.
 *
 * Constructors are named after their enclosing type, the way a signature
 * like `Widget(size: number)` reads.
 */
export interface MarkedElement {
  /** The marker the host matched on this element */
  readonly marker: MarkerName;

  /** Routine name as the host renders it */
  readonly name: string;

  /** The routine's symbol */
  readonly symbol: ts.Symbol;

  readonly enclosingType: TypeElement;
}

/** Routine declarations the declaration-tree bridge can hand back */
export type RoutineDeclaration =
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.MethodSignature;

/** Routine declarations that may own a body */
export type RoutineWithBody = ts.MethodDeclaration | ts.ConstructorDeclaration;

// ============================================================================
// Import Requests
// ============================================================================

/** A request to make an external symbol importable from a compilation unit */
export interface ImportRequest {
  readonly unit: ts.SourceFile;
  readonly packageName: string;
  readonly simpleName: string;
  /** Only used as a type; needs no import in emitted JavaScript */
  readonly typeOnly: boolean;
}

// ============================================================================
// Compile-Time Literals
// ============================================================================

/** Values the expression builder can turn into literal nodes */
export type LiteralValue = string | number | boolean | bigint | null;
