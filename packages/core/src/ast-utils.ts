/**
 * Tree-manipulation collaborators handlers call into
 */

import type * as ts from "typescript";
import { buildPropertyAccess } from "./builder.js";
import type { ResolvedEnvironment } from "./environment.js";
import type { AddImportOptions } from "./tree-edits.js";
import type { RoutineWithBody, TypeElement } from "./types.js";

/**
 * Prepend `statement` to `body`, the body of `method`. Calls on one body
 * stack in call order: the first statement inserted runs first.
 */
export function insertStatementToHeadOfMethod(
  env: ResolvedEnvironment,
  body: ts.Block,
  method: RoutineWithBody,
  statement: ts.Statement
): void {
  env.processingEnvironment.edits.insertStatementAtHead(body, method, statement);
}

/**
 * Make `simpleName` from `packageName` importable in the compilation unit
 * declaring `enclosingType`. Returns the expression synthesized code uses to
 * refer to it, `<module binding>.simpleName`.
 */
export function addImportStatement(
  env: ResolvedEnvironment,
  enclosingType: TypeElement,
  packageName: string,
  simpleName: string,
  options: AddImportOptions = {}
): ts.PropertyAccessExpression {
  const unit = enclosingType.declaration.getSourceFile();
  const binding = env.processingEnvironment.edits.addImport(unit, packageName, simpleName, options);
  return buildPropertyAccess(env, binding, simpleName);
}
