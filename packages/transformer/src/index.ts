/**
 * @markweave/transformer - TypeScript transformer that applies marker handlers
 *
 * The default export plugs into ts-patch (or any `customTransformers.before`
 * slot). For every source file it discovers the routines carrying a
 * registered marker, resolves a processing environment once, hands each
 * handler its elements and finally applies the recorded tree edits.
 */

import * as ts from "typescript";
import {
  EnvironmentUnavailable,
  MW9002,
  MW9050,
  ProcessingEnvironment,
  config,
  countOutcomes,
  describeError,
  discoverMarkedElements,
  globalHandlerRegistry,
  resolveEnvironment,
  type CompilationEnvironmentHandle,
  type DiagnosticSink,
  type DiscoveredElements,
  type EnvironmentProvider,
  type HandlerRegistry,
  type MarkedElement,
  type MarkerHandler,
  type ProcessingReport,
  type ResolvedEnvironment,
} from "@markweave/core";
import { registerDeprecatedHandler } from "@markweave/handlers";

/**
 * Configuration for the transformer
 */
export interface MarkweaveTransformerConfig {
  /** Enable verbose logging */
  verbose?: boolean;

  /** Markers and handlers to apply (defaults to the global registry with the built-ins) */
  registry?: HandlerRegistry;

  /**
   * Hand handlers a wrapped environment instead of the native one, the way
   * an intermediary build tool would.
   */
  wrapEnvironment?: (
    native: ProcessingEnvironment
  ) => EnvironmentProvider | CompilationEnvironmentHandle;

  /**
   * Write `import type` declarations for type-only requests whose module is
   * not imported for values anyway. Only for output printed as TypeScript:
   * inside `program.emit` such a declaration would reach the JavaScript.
   */
  preserveTypeOnlyImports?: boolean;

  /** Glob patterns of files to leave untouched, in addition to `exclude` from config */
  exclude?: string[];

  /** Receives every diagnostic handlers report */
  onDiagnostic?: DiagnosticSink;

  /** Receives each handler's report for each file */
  onReport?: (report: ProcessingReport, sourceFile: ts.SourceFile) => void;
}

/**
 * Create the TypeScript transformer factory
 * This is the entry point called by ts-patch
 */
export default function markweaveTransformerFactory(
  program: ts.Program,
  transformerConfig: MarkweaveTransformerConfig = {}
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = transformerConfig.verbose ?? config.has("debug");
  const registry = transformerConfig.registry ?? defaultRegistry();
  const exclude = transformerConfig.exclude ?? [];

  if (verbose) {
    console.log("[markweave] Initializing transformer");
    console.log(
      `[markweave] Registered handlers: ${registry
        .getHandlers()
        .map((h) => h.name)
        .join(", ")}`
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (sourceFile.isDeclarationFile) return sourceFile;

      if (config.isExcluded(sourceFile.fileName, exclude)) {
        if (verbose) {
          console.log(`[markweave] Skipping: ${sourceFile.fileName} (excluded)`);
        }
        return sourceFile;
      }

      if (verbose) {
        console.log(`[markweave] Processing: ${sourceFile.fileName}`);
      }

      const sinks = transformerConfig.onDiagnostic ? [transformerConfig.onDiagnostic] : [];
      const native = new ProcessingEnvironment(program, context, sourceFile, sinks);
      const discovered = discoverMarkedElements(
        program.getTypeChecker(),
        sourceFile,
        registry.getMarkers()
      );

      let env: ResolvedEnvironment | undefined;
      for (const handler of registry.getHandlers()) {
        const elements = elementsFor(handler, discovered);
        if (elements.size === 0) continue;

        env ??= resolveFor(native, transformerConfig);
        const report = handler.process(elements, env);
        reportFailures(env, report);

        if (verbose) {
          const counts = countOutcomes(report);
          console.log(
            `[markweave] ${handler.name}: ${counts.rewritten} rewritten, ${counts.skipped} skipped, ${counts.failed} failed`
          );
        }
        transformerConfig.onReport?.(report, sourceFile);
      }

      return native.edits.apply(context, {
        typeOnlyImports: transformerConfig.preserveTypeOnlyImports ?? false,
      });
    };
  };
}

function defaultRegistry(): HandlerRegistry {
  registerDeprecatedHandler(globalHandlerRegistry);
  return globalHandlerRegistry;
}

/** The elements carrying any marker `handler` claims */
function elementsFor(handler: MarkerHandler, discovered: DiscoveredElements): Set<MarkedElement> {
  const elements = new Set<MarkedElement>();
  for (const marker of handler.markersHandled()) {
    for (const element of discovered.get(marker) ?? []) {
      elements.add(element);
    }
  }
  return elements;
}

/**
 * Resolve the environment handlers see. An unavailable environment is
 * reported against the unit and then rethrown: no handler runs without one.
 */
function resolveFor(
  native: ProcessingEnvironment,
  transformerConfig: MarkweaveTransformerConfig
): ResolvedEnvironment {
  const handle = transformerConfig.wrapEnvironment ? transformerConfig.wrapEnvironment(native) : native;
  try {
    return resolveEnvironment(handle);
  } catch (error) {
    if (error instanceof EnvironmentUnavailable) {
      native.messager.report(MW9050, { reason: error.message });
    }
    throw error;
  }
}

function reportFailures(env: ResolvedEnvironment, report: ProcessingReport): void {
  for (const outcome of report.outcomes) {
    if (outcome.state !== "failed") continue;

    const { element, error } = outcome;
    env.messager.report(
      MW9002,
      {
        signature: `${element.enclosingType.qualifiedName}.${element.name}`,
        cause: describeError(error.cause),
      },
      element.symbol.declarations?.[0]
    );
  }
}

export { markweaveTransformerFactory };
export { VirtualCompilerHost, type VirtualCompilerHostOptions } from "./virtual-host.js";
export {
  TransformationPipeline,
  createPipeline,
  transformCode,
  type TransformDiagnostic,
  type TransformResult,
  type PipelineOptions,
} from "./pipeline.js";
