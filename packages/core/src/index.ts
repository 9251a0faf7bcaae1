/**
 * Core module exports for @markweave/core
 *
 * This package provides:
 * - Processing environment resolution (native and wrapped hosts)
 * - Marker discovery, the handler contract and the handler registry
 * - Expression builder and recorded tree edits
 * - Diagnostics and configuration
 */

export * from "./types.js";
export * from "./environment.js";
export * from "./handler.js";
export * from "./registry.js";

// Discovery
export { discoverMarkedElements, carriesMarker, describeType, type DiscoveredElements } from "./discovery.js";

// Syntax services
export { NameTable, type Name } from "./names.js";
export { DeclarationTrees, isRoutineDeclaration, getRoutineBody } from "./trees.js";
export { TreeEdits, type AddImportOptions, type ApplyOptions } from "./tree-edits.js";
export {
  buildCall,
  buildMethodCall,
  buildPropertyAccess,
  buildLiteral,
  buildConstruction,
  buildStatement,
  type BuilderEnvironment,
} from "./builder.js";
export { insertStatementToHeadOfMethod, addImportStatement } from "./ast-utils.js";

// Diagnostics System
export * from "./diagnostics.js";
export {
  Messager,
  GENERIC_DIAGNOSTIC_CODE,
  transformContextSink,
  describeError,
  type DiagnosticSink,
  type ReportedDiagnostic,
} from "./messager.js";

// Configuration System
export {
  config,
  defineConfig,
  type MarkweaveConfig,
  type RuntimeConfig,
  type CounterConfig,
  type LoggerConfig,
} from "./config.js";
