/**
 * Messager - the diagnostic channel handlers report through
 *
 * Reports are recorded locally and forwarded to every registered sink as
 * `ts.Diagnostic`s. Reporting never throws: a failing sink is logged and
 * skipped.
 */

import * as ts from "typescript";
import {
  formatDiagnosticMessage,
  type DiagnosticDescriptor,
  type DiagnosticSeverity,
} from "./diagnostics.js";

/** Code used for free-form messages that have no catalog entry */
export const GENERIC_DIAGNOSTIC_CODE = 9000;

export interface ReportedDiagnostic {
  severity: DiagnosticSeverity;
  code: number;
  message: string;
  node?: ts.Node;
}

export type DiagnosticSink = (diagnostic: ts.DiagnosticWithLocation) => void;

export class Messager {
  private readonly reported: ReportedDiagnostic[] = [];
  private readonly sinks: DiagnosticSink[];

  constructor(
    private readonly sourceFile: ts.SourceFile,
    sinks: readonly DiagnosticSink[] = []
  ) {
    this.sinks = [...sinks];
  }

  /** Add a sink that receives every subsequent report */
  addSink(sink: DiagnosticSink): void {
    this.sinks.push(sink);
  }

  /** Report a catalog diagnostic */
  report(
    descriptor: DiagnosticDescriptor,
    args: Record<string, string | number | undefined>,
    node?: ts.Node
  ): void {
    this.printMessage(
      descriptor.severity,
      formatDiagnosticMessage(descriptor, args),
      node,
      descriptor.code
    );
  }

  /** Report a free-form message */
  printMessage(
    severity: DiagnosticSeverity,
    message: string,
    node?: ts.Node,
    code: number = GENERIC_DIAGNOSTIC_CODE
  ): void {
    const entry: ReportedDiagnostic = { severity, code, message, node };
    this.reported.push(entry);

    const diagnostic = this.toTsDiagnostic(entry);
    for (const sink of this.sinks) {
      try {
        sink(diagnostic);
      } catch (error) {
        console.warn(`[markweave] Diagnostic sink failed: ${describeError(error)}`);
      }
    }
  }

  getDiagnostics(): readonly ReportedDiagnostic[] {
    return [...this.reported];
  }

  /** Convert a report into a diagnostic positioned in its node's file */
  toTsDiagnostic(entry: ReportedDiagnostic): ts.DiagnosticWithLocation {
    const node = entry.node;
    const file = node && node.pos >= 0 ? node.getSourceFile() : this.sourceFile;
    const start = node && node.pos >= 0 ? node.getStart(file) : 0;
    const length = node && node.pos >= 0 ? node.getEnd() - start : 0;

    return {
      file,
      start,
      length,
      messageText: `[markweave] ${entry.message}`,
      category: toCategory(entry.severity),
      code: entry.code,
      source: "markweave",
    };
  }
}

function toCategory(severity: DiagnosticSeverity): ts.DiagnosticCategory {
  switch (severity) {
    case "error":
      return ts.DiagnosticCategory.Error;
    case "warning":
      return ts.DiagnosticCategory.Warning;
    case "info":
      return ts.DiagnosticCategory.Message;
  }
}

/**
 * Build a sink that forwards to the transformation context's diagnostics.
 * `addDiagnostic` is internal to TypeScript, so it may be absent.
 */
export function transformContextSink(
  context: ts.TransformationContext
): DiagnosticSink | undefined {
  const addDiagnostic: unknown = Reflect.get(context, "addDiagnostic");
  if (typeof addDiagnostic !== "function") {
    return undefined;
  }
  return (diagnostic) => {
    Reflect.apply(addDiagnostic, context, [diagnostic]);
  };
}

/** Message text of a thrown value */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
