/**
 * VirtualCompilerHost - A ts.CompilerHost that serves in-memory sources
 *
 * Files registered on the host shadow the filesystem; everything else (lib
 * files, node_modules) is read through the base host.
 */

import * as ts from "typescript";

/**
 * Options for creating a VirtualCompilerHost
 */
export interface VirtualCompilerHostOptions {
  /** Compiler options for TypeScript */
  compilerOptions: ts.CompilerOptions;
  /** Base compiler host to delegate to (created if not provided) */
  baseHost?: ts.CompilerHost;
  /** Initial in-memory files, keyed by file name */
  files?: Record<string, string>;
}

export class VirtualCompilerHost implements ts.CompilerHost {
  private files = new Map<string, string>();
  private sourceFiles = new Map<string, ts.SourceFile>();
  private baseHost: ts.CompilerHost;

  constructor(options: VirtualCompilerHostOptions) {
    this.baseHost = options.baseHost ?? ts.createCompilerHost(options.compilerOptions);
    for (const [fileName, content] of Object.entries(options.files ?? {})) {
      this.files.set(fileName, content);
    }
  }

  /** Add or replace an in-memory file */
  setFile(fileName: string, content: string): void {
    if (this.files.get(fileName) !== content) {
      this.sourceFiles.delete(fileName);
    }
    this.files.set(fileName, content);
  }

  hasFile(fileName: string): boolean {
    return this.files.has(fileName);
  }

  getFileNames(): string[] {
    return [...this.files.keys()];
  }

  // ---------------------------------------------------------------------------
  // ts.CompilerHost implementation
  // ---------------------------------------------------------------------------

  getSourceFile(
    fileName: string,
    languageVersionOrOptions: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ): ts.SourceFile | undefined {
    const content = this.files.get(fileName);
    if (content === undefined) {
      return this.baseHost.getSourceFile(
        fileName,
        languageVersionOrOptions,
        onError,
        shouldCreateNewSourceFile
      );
    }

    const cached = this.sourceFiles.get(fileName);
    if (cached && !shouldCreateNewSourceFile) return cached;

    const sourceFile = ts.createSourceFile(
      fileName,
      content,
      languageVersionOrOptions,
      true // setParentNodes
    );
    this.sourceFiles.set(fileName, sourceFile);
    return sourceFile;
  }

  getDefaultLibFileName(options: ts.CompilerOptions): string {
    return this.baseHost.getDefaultLibFileName(options);
  }

  writeFile(
    fileName: string,
    data: string,
    writeByteOrderMark: boolean,
    onError?: (message: string) => void,
    sourceFiles?: readonly ts.SourceFile[]
  ): void {
    this.baseHost.writeFile(fileName, data, writeByteOrderMark, onError, sourceFiles);
  }

  getCurrentDirectory(): string {
    return this.baseHost.getCurrentDirectory();
  }

  getCanonicalFileName(fileName: string): string {
    return this.baseHost.getCanonicalFileName(fileName);
  }

  useCaseSensitiveFileNames(): boolean {
    return this.baseHost.useCaseSensitiveFileNames();
  }

  getNewLine(): string {
    return this.baseHost.getNewLine();
  }

  fileExists(fileName: string): boolean {
    return this.files.has(fileName) || this.baseHost.fileExists(fileName);
  }

  readFile(fileName: string): string | undefined {
    return this.files.get(fileName) ?? this.baseHost.readFile(fileName);
  }

  // Optional methods delegated to base host
  getDirectories?(path: string): string[] {
    return this.baseHost.getDirectories?.(path) ?? [];
  }

  realpath?(path: string): string {
    return this.baseHost.realpath?.(path) ?? path;
  }

  directoryExists?(directoryName: string): boolean {
    return this.baseHost.directoryExists?.(directoryName) ?? true;
  }

  getEnvironmentVariable?(name: string): string | undefined {
    return this.baseHost.getEnvironmentVariable?.(name);
  }

  // ---------------------------------------------------------------------------
  // Cache management
  // ---------------------------------------------------------------------------

  /** Drop the parsed tree of a file; its content stays */
  invalidate(fileName: string): void {
    this.sourceFiles.delete(fileName);
  }

  invalidateAll(): void {
    this.sourceFiles.clear();
  }
}
