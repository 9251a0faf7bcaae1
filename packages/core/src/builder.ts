/**
 * Synthesized expression builder
 *
 * Pure helpers that assemble call, construction and literal subtrees. They
 * keep no state and validate nothing beyond the shape of their input:
 * choosing names that resolve in the instrumented program is the caller's
 * job.
 *
 * @example
 * ```typescript
 * // DeprecatedMethodInvocationCounter.onDeprecatedMethodCalled("com.example.Widget.render()")
 * buildCall(env, ["DeprecatedMethodInvocationCounter"], "onDeprecatedMethodCalled", [
 *   buildLiteral(env, "com.example.Widget.render()"),
 * ]);
 * ```
 */

import * as ts from "typescript";
import type { ResolvedEnvironment } from "./environment.js";
import type { LiteralValue } from "./types.js";

/** The services the builder draws on */
export type BuilderEnvironment = Pick<ResolvedEnvironment, "factory" | "names">;

function identifier(env: BuilderEnvironment, text: string): ts.Identifier {
  return env.factory.createIdentifier(env.names.fromString(text).text);
}

/** `a.b.c` from ["a", "b", "c"] */
function qualifiedAccess(
  env: BuilderEnvironment,
  segments: readonly string[]
): ts.Identifier | ts.PropertyAccessExpression {
  if (segments.length === 0) {
    throw new Error("A qualified name needs at least one segment");
  }
  let expr: ts.Identifier | ts.PropertyAccessExpression = identifier(env, segments[0]);
  for (const segment of segments.slice(1)) {
    expr = env.factory.createPropertyAccessExpression(expr, identifier(env, segment));
  }
  return expr;
}

/**
 * `receiver.path.methodName(...args)`, or `methodName(...args)` when the
 * receiver path is empty. Arguments keep the order given.
 */
export function buildCall(
  env: BuilderEnvironment,
  receiverPath: readonly string[],
  methodName: string,
  args: readonly ts.Expression[]
): ts.CallExpression {
  const callee = qualifiedAccess(env, [...receiverPath, methodName]);
  return env.factory.createCallExpression(callee, undefined, [...args]);
}

/** `receiver.name` on an already-built receiver */
export function buildPropertyAccess(
  env: BuilderEnvironment,
  receiver: ts.Expression,
  name: string
): ts.PropertyAccessExpression {
  return env.factory.createPropertyAccessExpression(receiver, identifier(env, name));
}

/** `receiver.methodName(...args)` on an already-built receiver */
export function buildMethodCall(
  env: BuilderEnvironment,
  receiver: ts.Expression,
  methodName: string,
  args: readonly ts.Expression[]
): ts.CallExpression {
  const callee = buildPropertyAccess(env, receiver, methodName);
  return env.factory.createCallExpression(callee, undefined, [...args]);
}

export function buildLiteral(env: BuilderEnvironment, value: LiteralValue): ts.Expression {
  const factory = env.factory;

  if (value === null) return factory.createNull();

  if (typeof value === "string") return factory.createStringLiteral(value);
  if (typeof value === "boolean") return value ? factory.createTrue() : factory.createFalse();

  if (typeof value === "bigint") {
    return value < 0n
      ? factory.createPrefixUnaryExpression(
          ts.SyntaxKind.MinusToken,
          factory.createBigIntLiteral(`${-value}n`)
        )
      : factory.createBigIntLiteral(`${value}n`);
  }

  return value < 0 || Object.is(value, -0)
    ? factory.createPrefixUnaryExpression(
        ts.SyntaxKind.MinusToken,
        factory.createNumericLiteral(-value)
      )
    : factory.createNumericLiteral(value);
}

/** `new TypeName(...args)`; a dotted type name becomes a property-access chain */
export function buildConstruction(
  env: BuilderEnvironment,
  typeName: string,
  args: readonly ts.Expression[]
): ts.NewExpression {
  const type = qualifiedAccess(env, typeName.split("."));
  return env.factory.createNewExpression(type, undefined, [...args]);
}

/** Wrap an expression into an executable statement */
export function buildStatement(
  env: BuilderEnvironment,
  expression: ts.Expression
): ts.ExpressionStatement {
  return env.factory.createExpressionStatement(expression);
}
