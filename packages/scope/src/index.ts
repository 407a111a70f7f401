/**
 * @corral/scope
 *
 * Tagged faults with cause and suppressed chains, and scopes that release
 * what they acquired in reverse order.
 */

export {
  Fault,
  isFault,
  registerFaultKind,
  categoryOf,
  BUILTIN_FAULT_KINDS,
} from "./fault.js";
export type { FaultCategory, FaultKind, BuiltinFaultKind, FaultOptions } from "./fault.js";

export { causeChain, rootCause, formatFault } from "./format.js";

export { on, onCategory, findHandler } from "./handlers.js";
export type { FaultHandler } from "./handlers.js";

export { Scope, scoped, withResource, currentScope, scopeDepth } from "./scope.js";
export type { Releasable, ScopeOptions, ScopeState } from "./scope.js";
