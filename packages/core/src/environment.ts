/**
 * Processing environment and its resolution
 *
 * The transformer creates one `ProcessingEnvironment` per compilation unit.
 * Build tools that sit between the compiler and markweave (watch daemons,
 * language-service proxies, a second copy of this package pulled in by a
 * bundler) may hand us a wrapper instead. `resolveEnvironment` turns either
 * into the fully populated `ResolvedEnvironment` handlers work against, or
 * fails before any handler runs.
 */

import * as ts from "typescript";
import { Messager, describeError, transformContextSink, type DiagnosticSink } from "./messager.js";
import { NameTable } from "./names.js";
import { TreeEdits } from "./tree-edits.js";
import { DeclarationTrees } from "./trees.js";

// ============================================================================
// Native Environment
// ============================================================================

/** The host's per-compilation-unit processing state */
export class ProcessingEnvironment {
  readonly messager: Messager;
  readonly edits: TreeEdits;

  constructor(
    readonly program: ts.Program,
    readonly transformContext: ts.TransformationContext,
    readonly sourceFile: ts.SourceFile,
    sinks: readonly DiagnosticSink[] = []
  ) {
    const contextSink = transformContextSink(transformContext);
    this.messager = new Messager(sourceFile, contextSink ? [contextSink, ...sinks] : sinks);
    this.edits = new TreeEdits(sourceFile, transformContext.factory);
  }

  getContext(): ts.TransformationContext {
    return this.transformContext;
  }
}

// ============================================================================
// Handles and Providers
// ============================================================================

/** Whatever the host integration hands to the resolver */
export type CompilationEnvironmentHandle = unknown;

/**
 * Recover the native environment from a wrapper. Receives the native type so
 * a strategy can check or construct against it.
 */
export type UnwrapStrategy = (
  targetType: typeof ProcessingEnvironment,
  wrapper: object
) => unknown;

export type EnvironmentProvider =
  | { readonly kind: "native"; readonly handle: ProcessingEnvironment }
  | { readonly kind: "wrapped"; readonly handle: object; readonly unwrap: UnwrapStrategy };

/**
 * Well-known key under which a wrapper exposes its unwrap facility, as a
 * function with the `UnwrapStrategy` signature.
 */
export const UNWRAP_FACILITY: unique symbol = Symbol.for("markweave.unwrapProcessingEnvironment");

export function nativeProvider(handle: ProcessingEnvironment): EnvironmentProvider {
  return { kind: "native", handle };
}

export function wrappedProvider(handle: object, unwrap: UnwrapStrategy): EnvironmentProvider {
  return { kind: "wrapped", handle, unwrap };
}

function isEnvironmentProvider(value: unknown): value is EnvironmentProvider {
  if (typeof value !== "object" || value === null) return false;
  if (!("kind" in value) || !("handle" in value)) return false;
  if (value.kind === "native") return true;
  return value.kind === "wrapped" && "unwrap" in value && typeof value.unwrap === "function";
}

// ============================================================================
// Resolved Environment
// ============================================================================

/** Everything a marker handler needs, resolved once per round */
export interface ResolvedEnvironment {
  readonly processingEnvironment: ProcessingEnvironment;
  /** Tree factory */
  readonly factory: ts.NodeFactory;
  /** Name interner */
  readonly names: NameTable;
  /** Symbol to syntax-tree bridge */
  readonly trees: DeclarationTrees;
  /** Raw transformation context, passed through to collaborators */
  readonly context: ts.TransformationContext;
  /** Diagnostic sink */
  readonly messager: Messager;
}

/** Thrown when no usable processing environment can be obtained */
export class EnvironmentUnavailable extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvironmentUnavailable";
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve a handle or provider into a `ResolvedEnvironment`.
 *
 * Unwrapping is best-effort: if it fails the failure is logged and the
 * original handle is used as-is, which then has to be native. Every
 * successful resolution logs one info line.
 *
 * @throws EnvironmentUnavailable
 */
export function resolveEnvironment(
  source: EnvironmentProvider | CompilationEnvironmentHandle
): ResolvedEnvironment {
  if (source === null || source === undefined) {
    throw new EnvironmentUnavailable("Processing environment handle cannot be null");
  }

  let candidate: unknown;
  if (isEnvironmentProvider(source)) {
    candidate =
      source.kind === "native" ? source.handle : tryUnwrap(source.handle, source.unwrap);
  } else if (source instanceof ProcessingEnvironment) {
    candidate = source;
  } else {
    candidate = tryUnwrap(source, discoverUnwrapFacility);
  }

  if (!(candidate instanceof ProcessingEnvironment)) {
    throw new EnvironmentUnavailable("Failed to obtain a markweave ProcessingEnvironment");
  }

  const env = deriveServices(candidate);

  console.info(`[markweave] Resolved processing environment: ${describeEnvironment(env)}`);
  return env;
}

/**
 * Apply an unwrap strategy; on any failure, log and hand back the wrapper.
 */
function tryUnwrap(wrapper: unknown, unwrap: UnwrapStrategy): unknown {
  if (typeof wrapper !== "object" || wrapper === null) return wrapper;

  let unwrapped: unknown;
  try {
    unwrapped = unwrap(ProcessingEnvironment, wrapper);
  } catch (error) {
    console.warn(`[markweave] Failed to unwrap processing environment: ${describeError(error)}`);
  }

  return unwrapped instanceof ProcessingEnvironment ? unwrapped : wrapper;
}

/** The default strategy: call the facility the wrapper exposes under UNWRAP_FACILITY */
function discoverUnwrapFacility(targetType: typeof ProcessingEnvironment, wrapper: object): unknown {
  const facility: unknown = Reflect.get(wrapper, UNWRAP_FACILITY);
  if (typeof facility !== "function") {
    throw new Error(`${describeHandle(wrapper)} exposes no unwrap facility`);
  }
  return Reflect.apply(facility, wrapper, [targetType, wrapper]);
}

function describeHandle(handle: object): string {
  const name = handle.constructor?.name;
  return name ? `${name} handle` : "Handle";
}

function deriveServices(native: ProcessingEnvironment): ResolvedEnvironment {
  const program: ts.Program | undefined = native.program;
  const context: ts.TransformationContext | undefined = native.getContext();

  const env: ResolvedEnvironment = {
    processingEnvironment: native,
    factory: requireService(context?.factory, "node factory"),
    names: requireService(program && NameTable.instance(program), "name table"),
    trees: requireService(program && DeclarationTrees.instance(program), "declaration trees"),
    context: requireService(context, "transformation context"),
    messager: requireService(native.messager, "messager"),
  };
  return Object.freeze(env);
}

function requireService<T>(service: T | null | undefined, name: string): T {
  if (service === null || service === undefined) {
    throw new EnvironmentUnavailable(
      `Failed to initialize processing environment: missing ${name}`
    );
  }
  return service;
}

// ============================================================================
// Equality and Display
// ============================================================================

/** Two environments are equal when every service is the identical object */
export function environmentsEqual(a: ResolvedEnvironment, b: ResolvedEnvironment): boolean {
  return (
    a.processingEnvironment === b.processingEnvironment &&
    a.factory === b.factory &&
    a.names === b.names &&
    a.trees === b.trees &&
    a.context === b.context &&
    a.messager === b.messager
  );
}

export function describeEnvironment(env: ResolvedEnvironment): string {
  const file = env.processingEnvironment.sourceFile.fileName;
  return `ResolvedEnvironment{file=${file}, names=${env.names.size}}`;
}
