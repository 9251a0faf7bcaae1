/**
 * @markweave/runtime
 *
 * Symbols that code instrumented by markweave calls into.
 */

export { DeprecatedMethodInvocationCounter } from "./counter.js";
export { LoggerFactory, type Logger, type LogLevel } from "./logger.js";
