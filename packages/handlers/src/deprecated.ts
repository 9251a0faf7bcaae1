/**
 * DeprecatedHandler - instruments routines marked `@deprecated`
 *
 * Every marked method or constructor that has a body gets two statements at
 * its head:
 *
 * ```typescript
 * import * as markweave_runtime_1 from "@markweave/runtime";
 * // ...
 * markweave_runtime_1.LoggerFactory.getLogger("com.example.Widget").warn("Deprecated method called in com.example.Widget", new Error());
 * markweave_runtime_1.DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("com.example.Widget.render()");
 * ```
 *
 * The counter, the logger factory and the logger type are requested as
 * imports of the compilation unit.
 */

import * as ts from "typescript";
import {
  PerElementHandler,
  MW9001,
  config,
  addImportStatement,
  buildConstruction,
  buildLiteral,
  buildMethodCall,
  buildStatement,
  createHandlerRegistry,
  defineMarker,
  getRoutineBody,
  insertStatementToHeadOfMethod,
  type ElementResult,
  type HandlerRegistry,
  type MarkedElement,
  type MarkerDefinition,
  type MarkerName,
  type ResolvedEnvironment,
} from "@markweave/core";

// ============================================================================
// Marker
// ============================================================================

export const DEPRECATED_MARKER: MarkerDefinition = defineMarker({
  name: "deprecated",
  description: "Routines whose every call is logged and counted",
  jsDocTag: "deprecated",
  decorator: "Deprecated",
});

// ============================================================================
// Options
// ============================================================================

export interface CounterSymbol {
  /** Module the counter class is imported from */
  module: string;
  name: string;
  /** Static method called with the routine's signature */
  method: string;
}

export interface LoggerSymbol {
  /** Module the logger factory and type are imported from */
  module: string;
  factory: string;
  /** Static factory method taking the logger name */
  accessor: string;
  type: string;
  /** Warning-level logger method */
  method: string;
}

export interface DeprecatedHandlerOptions {
  counter: CounterSymbol;
  logger: LoggerSymbol;
  /** Constructor of the trace object passed alongside the warning */
  trace: string;
}

/** Options as configured under `runtime.*` */
export function resolveDeprecatedHandlerOptions(
  overrides: Partial<DeprecatedHandlerOptions> = {}
): DeprecatedHandlerOptions {
  const read = (path: string, fallback: string): string => config.getString(path, fallback) ?? fallback;

  return {
    counter: overrides.counter ?? {
      module: read("runtime.counter.module", "@markweave/runtime"),
      name: read("runtime.counter.name", "DeprecatedMethodInvocationCounter"),
      method: read("runtime.counter.method", "onDeprecatedMethodCalled"),
    },
    logger: overrides.logger ?? {
      module: read("runtime.logger.module", "@markweave/runtime"),
      factory: read("runtime.logger.factory", "LoggerFactory"),
      accessor: read("runtime.logger.accessor", "getLogger"),
      type: read("runtime.logger.type", "Logger"),
      method: read("runtime.logger.method", "warn"),
    },
    trace: overrides.trace ?? read("runtime.trace", "Error"),
  };
}

// ============================================================================
// Handler
// ============================================================================

export class DeprecatedHandler extends PerElementHandler {
  readonly name = "deprecated";
  readonly options: DeprecatedHandlerOptions;

  constructor(options: Partial<DeprecatedHandlerOptions> = {}) {
    super();
    this.options = resolveDeprecatedHandlerOptions(options);
  }

  markersHandled(): ReadonlySet<MarkerName> {
    return new Set([DEPRECATED_MARKER.name]);
  }

  protected processElement(element: MarkedElement, env: ResolvedEnvironment): ElementResult {
    const { counter, logger } = this.options;
    const enclosingType = element.enclosingType;

    // A routine named like its type is treated as the constructor
    const isConstructor = element.name === enclosingType.simpleName;

    const counterRef = addImportStatement(env, enclosingType, counter.module, counter.name);
    const loggerFactoryRef = addImportStatement(env, enclosingType, logger.module, logger.factory);
    addImportStatement(env, enclosingType, logger.module, logger.type, { typeOnly: true });

    const signature = getMethodDefinition(env, element);
    env.messager.report(
      MW9001,
      { kind: isConstructor ? "constructor" : "method", signature },
      element.symbol.declarations?.[0]
    );

    const tree = env.trees.getTree(element);
    if (!tree) {
      throw new Error(`No declaration found for ${signature}`);
    }
    const body = getRoutineBody(tree);
    if (!body || ts.isMethodSignature(tree)) {
      return { state: "skipped", reason: "routine has no body" };
    }

    insertStatementToHeadOfMethod(
      env,
      body,
      tree,
      this.generateLoggerStatement(env, loggerFactoryRef, element)
    );
    insertStatementToHeadOfMethod(
      env,
      body,
      tree,
      this.generateCounterStatement(env, counterRef, signature)
    );

    return { state: "rewritten" };
  }

  /** `<runtime>.LoggerFactory.getLogger("<type>").warn("Deprecated method called in <type>", new Error())` */
  private generateLoggerStatement(
    env: ResolvedEnvironment,
    loggerFactory: ts.Expression,
    element: MarkedElement
  ): ts.Statement {
    const { logger, trace } = this.options;
    const typeName = element.enclosingType.qualifiedName;

    const getLogger = buildMethodCall(env, loggerFactory, logger.accessor, [
      buildLiteral(env, typeName),
    ]);
    const warn = buildMethodCall(env, getLogger, logger.method, [
      buildLiteral(env, `Deprecated method called in ${typeName}`),
      buildConstruction(env, trace, []),
    ]);
    return buildStatement(env, warn);
  }

  /** `<runtime>.DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("<signature>")` */
  private generateCounterStatement(
    env: ResolvedEnvironment,
    counterClass: ts.Expression,
    signature: string
  ): ts.Statement {
    const { counter } = this.options;
    return buildStatement(
      env,
      buildMethodCall(env, counterClass, counter.method, [buildLiteral(env, signature)])
    );
  }
}

/** `<qualifiedType>.<name>(<parameters>)` */
export function getMethodDefinition(env: ResolvedEnvironment, element: MarkedElement): string {
  const parameters = env.trees.renderParameters(element);
  return `${element.enclosingType.qualifiedName}.${element.name}(${parameters})`;
}

// ============================================================================
// Registration
// ============================================================================

/** Register the marker and a handler for it; returns the handler */
export function registerDeprecatedHandler(
  registry: HandlerRegistry,
  options: Partial<DeprecatedHandlerOptions> = {}
): DeprecatedHandler {
  registry.registerMarker(DEPRECATED_MARKER);
  const existing = registry.getHandler(DEPRECATED_MARKER.name);
  if (existing instanceof DeprecatedHandler) return existing;

  const handler = new DeprecatedHandler(options);
  registry.register(handler);
  return handler;
}

/** A fresh registry holding only the built-in handlers */
export function createDefaultRegistry(): HandlerRegistry {
  const registry = createHandlerRegistry();
  registerDeprecatedHandler(registry);
  return registry;
}
