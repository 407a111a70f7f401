/**
 * Diagnostics for fault chains.
 */

import type { Fault } from "./fault.js";

/**
 * The fault followed by its causes, outermost first. Stops at a repeat.
 */
export function causeChain(fault: Fault): Fault[] {
  const chain: Fault[] = [];
  for (let f: Fault | undefined = fault; f !== undefined && !chain.includes(f); f = f.cause) {
    chain.push(f);
  }
  return chain;
}

export function rootCause(fault: Fault): Fault {
  const chain = causeChain(fault);
  return chain[chain.length - 1];
}

/**
 * Render a fault with its suppressed faults and causes:
 *
 * ```text
 * NotFound: no value for key "a"
 *   Suppressed: ResourceCloseFault: failed to release socket
 * Caused by: IllegalState: cursor exhausted
 * ```
 */
export function formatFault(fault: Fault): string {
  const lines: string[] = [];
  render(fault, "", "", lines, new Set());
  return lines.join("\n");
}

function render(
  fault: Fault,
  indent: string,
  label: string,
  lines: string[],
  seen: Set<Fault>
): void {
  if (seen.has(fault)) {
    lines.push(`${indent}${label}[CIRCULAR REFERENCE: ${fault.kind}: ${fault.message}]`);
    return;
  }
  seen.add(fault);

  lines.push(`${indent}${label}${fault.kind}: ${fault.message}`);
  if (fault.origin instanceof Error) {
    lines.push(`${indent}  Origin: ${fault.origin.name}: ${fault.origin.message}`);
  }
  for (const suppressed of fault.suppressed) {
    render(suppressed, `${indent}  `, "Suppressed: ", lines, seen);
  }
  if (fault.cause !== undefined) {
    render(fault.cause, indent, "Caused by: ", lines, seen);
  }
}
