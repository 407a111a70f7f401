/**
 * Kind- and category-based fault handlers for `scoped`.
 */

import type { Fault, FaultCategory, FaultKind } from "./fault.js";

export interface FaultHandler<T> {
  readonly description: string;
  matches(fault: Fault): boolean;
  /**
   * Return to resolve the scope normally, throw a new fault to replace the
   * propagating one, or rethrow the fault to keep it propagating.
   */
  handle(fault: Fault): T;
}

/**
 * Handle faults of one or more kinds.
 */
export function on<T>(
  kinds: FaultKind | readonly FaultKind[],
  handle: (fault: Fault) => T
): FaultHandler<T> {
  const accepted: readonly FaultKind[] = typeof kinds === "string" ? [kinds] : kinds;
  return {
    description: `on(${accepted.join(" | ")})`,
    matches: (fault) => accepted.includes(fault.kind),
    handle,
  };
}

/**
 * Handle every fault of a category. There is no handler for "fatal".
 */
export function onCategory<T>(
  category: Exclude<FaultCategory, "fatal">,
  handle: (fault: Fault) => T
): FaultHandler<T> {
  return {
    description: `onCategory(${category})`,
    matches: (fault) => fault.category === category,
    handle,
  };
}

/**
 * First handler that matches; fatal faults match none.
 */
export function findHandler<T>(
  handlers: readonly FaultHandler<T>[],
  fault: Fault
): FaultHandler<T> | undefined {
  if (fault.isFatal()) return undefined;
  return handlers.find((handler) => handler.matches(fault));
}
