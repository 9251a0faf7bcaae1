/**
 * In-memory programs for core tests
 */

import * as ts from "typescript";
import { ProcessingEnvironment, resolveEnvironment, type ResolvedEnvironment } from "../src/index.js";

export const compilerOptions: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  experimentalDecorators: true,
  strict: true,
  types: [],
};

export interface TestProgram {
  program: ts.Program;
  checker: ts.TypeChecker;
  file(name: string): ts.SourceFile;
}

/** Build a program over virtual files, e.g. `{ "/virtual/widget.ts": "…" }` */
export function createTestProgram(files: Record<string, string>): TestProgram {
  const baseHost = ts.createCompilerHost(compilerOptions);
  const host: ts.CompilerHost = {
    ...baseHost,
    getSourceFile(fileName, languageVersion, onError, shouldCreate) {
      const content = files[fileName];
      if (content !== undefined) {
        return ts.createSourceFile(fileName, content, languageVersion, true);
      }
      return baseHost.getSourceFile(fileName, languageVersion, onError, shouldCreate);
    },
    fileExists: (fileName) => fileName in files || baseHost.fileExists(fileName),
    readFile: (fileName) => files[fileName] ?? baseHost.readFile(fileName),
  };

  const program = ts.createProgram(Object.keys(files), compilerOptions, host);
  const checker = program.getTypeChecker();

  return {
    program,
    checker,
    file(name) {
      const sourceFile = program.getSourceFile(name);
      if (!sourceFile) throw new Error(`No source file ${name}`);
      return sourceFile;
    },
  };
}

/** A program over one file plus a native environment for it */
export function createTestEnvironment(
  fileName: string,
  code: string
): { test: TestProgram; native: ProcessingEnvironment; env: ResolvedEnvironment } {
  const test = createTestProgram({ [fileName]: code });
  const native = new ProcessingEnvironment(test.program, ts.nullTransformationContext, test.file(fileName));
  const env = resolveEnvironment(native);
  return { test, native, env };
}

/** Print a node or file with the default printer */
export function print(node: ts.Node, sourceFile?: ts.SourceFile): string {
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  if (ts.isSourceFile(node)) return printer.printFile(node);
  const file = sourceFile ?? ts.createSourceFile("print.ts", "", ts.ScriptTarget.ES2022);
  return printer.printNode(ts.EmitHint.Unspecified, node, file);
}
