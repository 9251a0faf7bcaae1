/**
 * Shared setup for handler tests
 */

import * as ts from "typescript";
import {
  ProcessingEnvironment,
  discoverMarkedElements,
  resolveEnvironment,
  type MarkedElement,
  type ResolvedEnvironment,
} from "@markweave/core";
import { DEPRECATED_MARKER } from "../src/index.js";

const compilerOptions: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  experimentalDecorators: true,
  strict: true,
  types: [],
};

export interface HandlerFixture {
  program: ts.Program;
  native: ProcessingEnvironment;
  env: ResolvedEnvironment;
  /** Deprecated elements of one file (defaults to the edited file) */
  elements(fileName?: string): Set<MarkedElement>;
  /** Apply recorded edits and print the edited file */
  print(): string;
  /** Apply recorded edits and print one routine's body statements */
  bodyOf(routineName: string): string[];
}

/** Program over virtual `files`, with an environment editing `fileName` */
export function createHandlerFixture(files: Record<string, string>, fileName: string): HandlerFixture {
  const baseHost = ts.createCompilerHost(compilerOptions);
  const host: ts.CompilerHost = {
    ...baseHost,
    getSourceFile(name, languageVersion, onError, shouldCreate) {
      const content = files[name];
      return content !== undefined
        ? ts.createSourceFile(name, content, languageVersion, true)
        : baseHost.getSourceFile(name, languageVersion, onError, shouldCreate);
    },
    fileExists: (name) => name in files || baseHost.fileExists(name),
    readFile: (name) => files[name] ?? baseHost.readFile(name),
  };

  const program = ts.createProgram(Object.keys(files), compilerOptions, host);
  const sourceFile = requireFile(program, fileName);
  const native = new ProcessingEnvironment(program, ts.nullTransformationContext, sourceFile);
  const env = resolveEnvironment(native);
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

  return {
    program,
    native,
    env,
    elements(name = fileName) {
      const found = discoverMarkedElements(program.getTypeChecker(), requireFile(program, name), [
        DEPRECATED_MARKER,
      ]);
      return found.get(DEPRECATED_MARKER.name) ?? new Set();
    },
    print() {
      return printer.printFile(native.edits.apply(ts.nullTransformationContext));
    },
    bodyOf(routineName) {
      const edited = native.edits.apply(ts.nullTransformationContext);
      const routine = findRoutine(edited, routineName);
      return (routine?.body?.statements ?? []).map((statement) =>
        printer.printNode(ts.EmitHint.Unspecified, statement, sourceFile)
      );
    },
  };
}

function requireFile(program: ts.Program, fileName: string): ts.SourceFile {
  const sourceFile = program.getSourceFile(fileName);
  if (!sourceFile) throw new Error(`No source file ${fileName}`);
  return sourceFile;
}

function findRoutine(
  file: ts.SourceFile,
  name: string
): ts.MethodDeclaration | ts.ConstructorDeclaration | undefined {
  let found: ts.MethodDeclaration | ts.ConstructorDeclaration | undefined;
  const visit = (node: ts.Node): void => {
    if (found) return;
    if (ts.isConstructorDeclaration(node) && name === "constructor" && node.body) found = node;
    else if (ts.isMethodDeclaration(node) && ts.isIdentifier(node.name) && node.name.text === name && node.body) {
      found = node;
    } else ts.forEachChild(node, visit);
  };
  visit(file);
  return found;
}
