/**
 * TransformationPipeline - type-aware transformation outside of tsc
 *
 * Builds a ts.Program over a VirtualCompilerHost, runs the markweave
 * transformer on one file at a time and prints the result as TypeScript.
 */

import * as ts from "typescript";
import * as path from "path";
import type { ProcessingReport } from "@markweave/core";
import { VirtualCompilerHost } from "./virtual-host.js";
import markweaveTransformerFactory, { type MarkweaveTransformerConfig } from "./index.js";

/**
 * Diagnostic reported while transforming
 */
export interface TransformDiagnostic {
  file: string;
  start: number;
  length: number;
  message: string;
  severity: "error" | "warning" | "info";
  code: number;
}

/**
 * Result of transforming a single file
 */
export interface TransformResult {
  /** Original source content */
  original: string;
  /** Transformed code (valid TypeScript) */
  code: string;
  /** Whether the file was modified */
  changed: boolean;
  /** Handler diagnostics */
  diagnostics: TransformDiagnostic[];
  /** One report per handler that had elements in the file */
  reports: ProcessingReport[];
}

/**
 * Options for the transformation pipeline
 */
export interface PipelineOptions {
  /** Enable verbose logging */
  verbose?: boolean;
  /** Transformer config; diagnostics and reports are still collected into the result */
  transformerConfig?: MarkweaveTransformerConfig;
  /** In-memory files that shadow the filesystem */
  files?: Record<string, string>;
}

const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleResolution: ts.ModuleResolutionKind.Bundler,
  experimentalDecorators: true,
  strict: true,
  types: [],
};

/**
 * Usage:
 * ```typescript
 * const pipeline = createPipeline("./tsconfig.json");
 * const result = pipeline.transform("src/widget.ts");
 * console.log(result.code);
 * ```
 */
export class TransformationPipeline {
  private host: VirtualCompilerHost;
  private program: ts.Program | null = null;
  private verbose: boolean;
  private printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

  constructor(
    private compilerOptions: ts.CompilerOptions,
    private fileNames: string[],
    private options: PipelineOptions = {}
  ) {
    this.verbose = options.verbose ?? options.transformerConfig?.verbose ?? false;
    this.host = new VirtualCompilerHost({ compilerOptions, files: options.files });
  }

  /**
   * Transform a single file
   */
  transform(fileName: string): TransformResult {
    const program = this.getProgram();
    const sourceFile = program.getSourceFile(fileName);
    if (!sourceFile) {
      return { original: "", code: "", changed: false, diagnostics: [], reports: [] };
    }

    const diagnostics: TransformDiagnostic[] = [];
    const reports: ProcessingReport[] = [];
    const userConfig = this.options.transformerConfig ?? {};

    const factory = markweaveTransformerFactory(program, {
      preserveTypeOnlyImports: true,
      ...userConfig,
      verbose: this.verbose,
      onDiagnostic: (diagnostic) => {
        diagnostics.push(toTransformDiagnostic(diagnostic));
        userConfig.onDiagnostic?.(diagnostic);
      },
      onReport: (report, file) => {
        reports.push(report);
        userConfig.onReport?.(report, file);
      },
    });

    const result = ts.transform(sourceFile, [factory], this.compilerOptions);
    try {
      const transformed = result.transformed[0];
      const changed = transformed !== sourceFile;
      const original = sourceFile.text;
      const code = changed ? this.printer.printFile(transformed) : original;

      if (this.verbose) {
        console.log(`[markweave] Transformed ${fileName} (changed: ${changed})`);
        console.log(`[markweave]   Diagnostics: ${diagnostics.length}`);
      }

      return { original, code, changed, diagnostics, reports };
    } finally {
      result.dispose();
    }
  }

  /**
   * Transform all files in the project
   */
  transformAll(): Map<string, TransformResult> {
    const results = new Map<string, TransformResult>();
    for (const fileName of this.fileNames) {
      results.set(fileName, this.transform(fileName));
    }
    return results;
  }

  /** Replace a file's content; the next transform rebuilds the program */
  update(fileName: string, content: string): void {
    this.host.setFile(fileName, content);
    if (!this.fileNames.includes(fileName)) {
      this.fileNames.push(fileName);
    }
    this.program = null;
  }

  /**
   * Get the current ts.Program (creates if needed)
   */
  getProgram(): ts.Program {
    if (!this.program) {
      if (this.verbose) {
        console.log(`[markweave] Creating TypeScript program with ${this.fileNames.length} files`);
      }
      this.program = ts.createProgram(this.fileNames, this.compilerOptions, this.host);
    }
    return this.program;
  }

  getFileNames(): string[] {
    return this.fileNames;
  }
}

function toTransformDiagnostic(diagnostic: ts.DiagnosticWithLocation): TransformDiagnostic {
  return {
    file: diagnostic.file.fileName,
    start: diagnostic.start,
    length: diagnostic.length,
    message: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n"),
    severity:
      diagnostic.category === ts.DiagnosticCategory.Error
        ? "error"
        : diagnostic.category === ts.DiagnosticCategory.Warning
          ? "warning"
          : "info",
    code: diagnostic.code,
  };
}

/**
 * Create a pipeline from a tsconfig.json path
 */
export function createPipeline(
  tsconfigPath: string,
  options?: PipelineOptions
): TransformationPipeline {
  const configFile = ts.readConfigFile(tsconfigPath, ts.sys.readFile);
  if (configFile.error) {
    throw new Error(
      `Error reading ${tsconfigPath}: ${ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")}`
    );
  }

  const parsed = ts.parseJsonConfigFileContent(
    configFile.config,
    ts.sys,
    path.dirname(tsconfigPath)
  );

  return new TransformationPipeline(parsed.options, parsed.fileNames, options);
}

/**
 * Transform one in-memory file. Lib files still come from the real
 * filesystem so the type checker works.
 */
export function transformCode(
  code: string,
  options: { fileName?: string; compilerOptions?: ts.CompilerOptions } & PipelineOptions = {}
): TransformResult {
  const fileName = path.resolve(options.fileName ?? "input.ts");
  const pipeline = new TransformationPipeline(
    options.compilerOptions ?? DEFAULT_COMPILER_OPTIONS,
    [fileName],
    { ...options, files: { ...options.files, [fileName]: code } }
  );
  return pipeline.transform(fileName);
}
