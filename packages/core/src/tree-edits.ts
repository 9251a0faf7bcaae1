/**
 * TreeEdits - recorded splices and import requests for one compilation unit
 *
 * Handlers never touch the tree directly. They record statements to insert
 * at the head of routine bodies and imports the unit needs; `apply()` then
 * rewrites the source file in a single visitor pass.
 *
 * Imported symbols are reached through one namespace import per module,
 * bound to a generated name that synthesized references share. Named
 * imports added here would lose their references in the module transforms,
 * which only rewrite identifiers traced back to parsed source.
 */

import * as ts from "typescript";
import type { ImportRequest, RoutineWithBody } from "./types.js";

interface HeadInsertion {
  readonly method: RoutineWithBody;
  readonly statements: ts.Statement[];
}

export interface AddImportOptions {
  /** The symbol is only used as a type */
  typeOnly?: boolean;
}

export interface ApplyOptions {
  /**
   * Write `import type { … }` for type-only requests whose module has no
   * value request. Only valid when the result is printed as TypeScript.
   */
  typeOnlyImports?: boolean;
}

export class TreeEdits {
  private readonly heads = new Map<ts.Block, HeadInsertion>();
  private readonly imports = new Map<string, ImportRequest>();
  private readonly bindings = new Map<string, ts.Identifier>();

  constructor(
    readonly unit: ts.SourceFile,
    private readonly factory: ts.NodeFactory = ts.factory
  ) {}

  // -------------------------------------------------------------------------
  // Recording
  // -------------------------------------------------------------------------

  /**
   * Insert `statement` at the head of `body`, ahead of the original
   * statements. Repeated insertions into one body keep their call order.
   */
  insertStatementAtHead(body: ts.Block, method: RoutineWithBody, statement: ts.Statement): void {
    if (method.body !== body) {
      throw new Error(`Block is not the body of ${describeRoutine(method)}`);
    }
    const bodyFile = body.getSourceFile();
    if (bodyFile !== this.unit) {
      throw new Error(
        `Cannot splice into ${bodyFile.fileName} while editing ${this.unit.fileName}`
      );
    }

    const pending = this.heads.get(body);
    if (pending) {
      pending.statements.push(statement);
    } else {
      this.heads.set(body, { method, statements: [statement] });
    }
  }

  /**
   * Ensure `unit` imports `simpleName` from `packageName` and return the
   * namespace binding of that module. Idempotent: a repeated request is
   * ignored, and a value request upgrades an earlier type-only one.
   */
  addImport(
    unit: ts.SourceFile,
    packageName: string,
    simpleName: string,
    options: AddImportOptions = {}
  ): ts.Identifier {
    if (unit !== this.unit) {
      throw new Error(`Cannot import into ${unit.fileName} while editing ${this.unit.fileName}`);
    }

    const typeOnly = options.typeOnly ?? false;
    const key = `${packageName}\0${simpleName}`;
    const existing = this.imports.get(key);
    if (!existing || (existing.typeOnly && !typeOnly)) {
      this.imports.set(key, { unit, packageName, simpleName, typeOnly });
    }
    return this.moduleBinding(packageName);
  }

  /** The generated namespace name `packageName` is imported under */
  moduleBinding(packageName: string): ts.Identifier {
    let binding = this.bindings.get(packageName);
    if (!binding) {
      binding = this.factory.createUniqueName(bindingBaseName(packageName));
      this.bindings.set(packageName, binding);
    }
    return binding;
  }

  // -------------------------------------------------------------------------
  // Inspection
  // -------------------------------------------------------------------------

  getPendingStatements(body: ts.Block): readonly ts.Statement[] {
    return this.heads.get(body)?.statements ?? [];
  }

  getImportRequests(): readonly ImportRequest[] {
    return [...this.imports.values()];
  }

  get isEmpty(): boolean {
    return this.heads.size === 0 && this.imports.size === 0;
  }

  // -------------------------------------------------------------------------
  // Application
  // -------------------------------------------------------------------------

  /** Produce the edited source file */
  apply(context: ts.TransformationContext, options: ApplyOptions = {}): ts.SourceFile {
    if (this.isEmpty) return this.unit;

    const factory = context.factory;
    let file = this.unit;

    if (this.heads.size > 0) {
      const visit = (node: ts.Node): ts.Node => {
        if (ts.isBlock(node)) {
          const visited = ts.visitEachChild(node, visit, context);
          const pending = this.heads.get(node);
          return pending ? spliceHead(factory, visited, pending) : visited;
        }
        return ts.visitEachChild(node, visit, context);
      };
      file = ts.visitEachChild(file, visit, context);
    }

    return this.addImportDeclarations(factory, file, options.typeOnlyImports ?? false);
  }

  private addImportDeclarations(
    factory: ts.NodeFactory,
    file: ts.SourceFile,
    typeOnlyImports: boolean
  ): ts.SourceFile {
    const requests = this.getImportRequests();
    const valueModules = new Set(requests.filter((r) => !r.typeOnly).map((r) => r.packageName));

    // One namespace import per module with a value request, in request order
    const declarations: ts.ImportDeclaration[] = [...valueModules].map((packageName) =>
      factory.createImportDeclaration(
        undefined,
        factory.createImportClause(
          false,
          undefined,
          factory.createNamespaceImport(this.moduleBinding(packageName))
        ),
        factory.createStringLiteral(packageName)
      )
    );

    if (typeOnlyImports) {
      const typeGroups = new Map<string, ImportRequest[]>();
      for (const request of requests) {
        if (valueModules.has(request.packageName) || isAlreadyImported(file, request)) continue;
        const group = typeGroups.get(request.packageName) ?? [];
        group.push(request);
        typeGroups.set(request.packageName, group);
      }
      for (const [packageName, group] of typeGroups) {
        const specifiers = group.map((r) =>
          factory.createImportSpecifier(false, undefined, factory.createIdentifier(r.simpleName))
        );
        declarations.push(
          factory.createImportDeclaration(
            undefined,
            factory.createImportClause(true, undefined, factory.createNamedImports(specifiers)),
            factory.createStringLiteral(packageName)
          )
        );
      }
    }

    if (declarations.length === 0) return file;

    const statements = file.statements;
    let index = 0;
    while (
      index < statements.length &&
      (isDirective(statements[index]) || ts.isImportDeclaration(statements[index]))
    ) {
      index++;
    }

    return factory.updateSourceFile(file, [
      ...statements.slice(0, index),
      ...declarations,
      ...statements.slice(index),
    ]);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function spliceHead(factory: ts.NodeFactory, body: ts.Block, insertion: HeadInsertion): ts.Block {
  const statements = body.statements;
  let index = 0;
  while (index < statements.length && isDirective(statements[index])) {
    index++;
  }
  // A derived constructor must run super(...) before anything touches `this`
  if (
    ts.isConstructorDeclaration(insertion.method) &&
    index < statements.length &&
    isSuperCall(statements[index])
  ) {
    index++;
  }

  return factory.updateBlock(body, [
    ...statements.slice(0, index),
    ...insertion.statements,
    ...statements.slice(index),
  ]);
}

function isDirective(statement: ts.Statement): boolean {
  return ts.isExpressionStatement(statement) && ts.isStringLiteral(statement.expression);
}

function isSuperCall(statement: ts.Statement): boolean {
  return (
    ts.isExpressionStatement(statement) &&
    ts.isCallExpression(statement.expression) &&
    statement.expression.expression.kind === ts.SyntaxKind.SuperKeyword
  );
}

/** `@markweave/runtime` → `markweave_runtime` */
function bindingBaseName(packageName: string): string {
  const name = packageName.replace(/[^A-Za-z0-9_$]+/g, "_").replace(/^_+|_+$/g, "");
  if (!name) return "module";
  return /^[0-9]/.test(name) ? `_${name}` : name;
}

function isAlreadyImported(file: ts.SourceFile, request: ImportRequest): boolean {
  for (const statement of file.statements) {
    if (!ts.isImportDeclaration(statement)) continue;
    if (!ts.isStringLiteral(statement.moduleSpecifier)) continue;
    if (statement.moduleSpecifier.text !== request.packageName) continue;

    const clause = statement.importClause;
    const bindings = clause?.namedBindings;
    if (!clause || !bindings || !ts.isNamedImports(bindings)) continue;

    for (const element of bindings.elements) {
      const imported = (element.propertyName ?? element.name).text;
      if (imported !== request.simpleName || element.name.text !== request.simpleName) continue;
      const isTypeOnly = clause.isTypeOnly || element.isTypeOnly;
      if (request.typeOnly || !isTypeOnly) return true;
    }
  }
  return false;
}

function describeRoutine(method: RoutineWithBody): string {
  if (ts.isConstructorDeclaration(method)) return "constructor";
  return `method '${method.name.getText()}'`;
}
