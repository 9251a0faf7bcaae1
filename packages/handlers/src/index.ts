/**
 * @markweave/handlers
 *
 * Built-in marker handlers.
 */

export {
  DeprecatedHandler,
  DEPRECATED_MARKER,
  getMethodDefinition,
  resolveDeprecatedHandlerOptions,
  registerDeprecatedHandler,
  createDefaultRegistry,
  type DeprecatedHandlerOptions,
  type CounterSymbol,
  type LoggerSymbol,
} from "./deprecated.js";
