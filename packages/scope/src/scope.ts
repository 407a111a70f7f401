/**
 * Scoped resource management.
 *
 * A scope owns the resources acquired through it and releases them in
 * strict reverse acquisition order on every exit path. Faults raised while
 * releasing never replace the fault already propagating: they are attached
 * to it as suppressed faults.
 *
 * @example
 * ```typescript
 * const total = scoped((scope) => {
 *   const a = scope.acquire(() => openLedger("a"), (l) => l.close(), "ledger a");
 *   const b = scope.acquire(() => openLedger("b"), (l) => l.close(), "ledger b");
 *   return a.sum() + b.sum();
 * }, {
 *   handlers: [on("NotFound", () => 0)],
 * });
 * ```
 */

import { createLogger } from "@corral/core";
import { Fault } from "./fault.js";
import { causeChain } from "./format.js";
import { findHandler, type FaultHandler } from "./handlers.js";

const log = createLogger("scope");

/**
 * Anything with its own release operation.
 */
export interface Releasable {
  release(): void;
}

export type ScopeState = "open" | "closing" | "closed";

interface Holding {
  readonly resource: unknown;
  readonly label: string;
  readonly release: () => void;
}

// ============================================================================
// Scope stack
// ============================================================================

const stack: Scope[] = [];
let nextScopeId = 1;

/**
 * Innermost scope opened by `scoped` that has not finished closing.
 */
export function currentScope(): Scope | undefined {
  return stack[stack.length - 1];
}

export function scopeDepth(): number {
  return stack.length;
}

function popScope(scope: Scope): void {
  const index = stack.lastIndexOf(scope);
  if (index >= 0) stack.splice(index, 1);
}

function toReleaseFault(error: unknown, label: string): Fault {
  const fault = Fault.from(error);
  if (fault.kind !== "Unexpected" || fault.origin !== error) return fault;
  return Fault.resourceClose(`failed to release ${label}: ${fault.message}`, { origin: error });
}

// ============================================================================
// Scope
// ============================================================================

export class Scope {
  readonly name: string;
  readonly parent: Scope | undefined;
  private readonly _held: Holding[] = [];
  private _state: ScopeState = "open";

  constructor(name?: string, parent: Scope | undefined = currentScope()) {
    this.name = name ?? `scope#${nextScopeId++}`;
    this.parent = parent;
  }

  get state(): ScopeState {
    return this._state;
  }

  /** Number of resources currently owned. */
  get size(): number {
    return this._held.length;
  }

  /**
   * Run `open` and take ownership of its result. If `open` throws, nothing
   * is registered and the fault propagates.
   */
  acquire<R>(open: () => R, release: (resource: R) => void, label = "resource"): R {
    this.assertOpen("acquire");
    const resource = open();
    this.hold({ resource, label, release: () => release(resource) });
    return resource;
  }

  /**
   * Take ownership of a value that already knows how to release itself.
   */
  adopt<R extends Releasable>(resource: R, label = "resource"): R {
    this.assertOpen("adopt");
    this.hold({ resource, label, release: () => resource.release() });
    return resource;
  }

  /**
   * Register a cleanup action; it runs in reverse order with the resources.
   */
  defer(action: () => void, label = "deferred action"): void {
    this.assertOpen("defer");
    this.hold({ resource: action, label, release: action });
  }

  owns(resource: unknown): boolean {
    return this._held.some((holding) => holding.resource === resource);
  }

  /**
   * Release one owned resource now. Its release fault is raised directly.
   */
  release(resource: unknown): void {
    const holding = this.take(resource, "release");
    try {
      holding.release();
    } catch (error) {
      throw toReleaseFault(error, holding.label);
    }
    log.debug(`${this.name}: released ${holding.label} early`);
  }

  /**
   * Give up ownership without releasing. The caller now owns `resource`.
   */
  transfer<R>(resource: R): R {
    const holding = this.take(resource, "transfer");
    log.debug(`${this.name}: transferred ${holding.label} out`);
    return resource;
  }

  /**
   * Move ownership (and the release action) to another open scope.
   */
  transferTo<R>(resource: R, target: Scope): R {
    if (target === this) return resource;
    target.assertOpen("receive");
    const holding = this.take(resource, "transfer");
    target.hold(holding);
    log.debug(`${this.name}: transferred ${holding.label} to ${target.name}`);
    return resource;
  }

  /**
   * Release everything in reverse acquisition order.
   *
   * With a `primary` fault, release faults are suppressed into it and it is
   * returned. Without one, the first release fault becomes primary and later
   * ones are suppressed into it. Returns `undefined` when nothing failed.
   */
  close(primary?: Fault): Fault | undefined {
    if (this._state !== "open") {
      throw Fault.illegalState(`${this.name} is already ${this._state}`);
    }
    this._state = "closing";

    let propagating = primary;
    for (let holding = this._held.pop(); holding !== undefined; holding = this._held.pop()) {
      try {
        holding.release();
        log.debug(`${this.name}: released ${holding.label}`);
      } catch (error) {
        const fault = toReleaseFault(error, holding.label);
        if (propagating === undefined) {
          propagating = fault;
        } else if (fault === propagating) {
          log.warn(`${this.name}: releasing ${holding.label} rethrew the propagating ${fault.kind}`);
        } else {
          propagating.addSuppressed(fault);
          log.warn(
            `${this.name}: releasing ${holding.label} raised ${fault.kind} while ${propagating.kind} was propagating; suppressed`
          );
        }
      }
    }

    this._state = "closed";
    return propagating;
  }

  private hold(holding: Holding): void {
    this._held.push(holding);
    log.debug(`${this.name}: acquired ${holding.label}`);
  }

  private take(resource: unknown, operation: string): Holding {
    for (let i = this._held.length - 1; i >= 0; i--) {
      const holding = this._held[i];
      if (holding.resource === resource) {
        this._held.splice(i, 1);
        return holding;
      }
    }
    throw Fault.illegalState(`${this.name}: cannot ${operation} a resource it does not own`);
  }

  private assertOpen(operation: string): void {
    if (this._state !== "open") {
      throw Fault.illegalState(`${this.name}: cannot ${operation} while ${this._state}`);
    }
  }
}

// ============================================================================
// scoped
// ============================================================================

export interface ScopeOptions<T> {
  name?: string;
  /** Tried in order after the scope's resources have been released */
  handlers?: readonly FaultHandler<T>[];
}

type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly fault: Fault };

/**
 * Run `body` in a fresh scope, release its resources, then return the result
 * or resolve the propagating fault through `options.handlers`.
 *
 * Anything non-Fault thrown by the body is normalized with `Fault.from`.
 */
export function scoped<T>(body: (scope: Scope) => T, options: ScopeOptions<T> = {}): T {
  const scope = new Scope(options.name);
  stack.push(scope);
  log.debug(`${scope.name}: opened at depth ${stack.length}`);

  let outcome: Outcome<T>;
  try {
    outcome = { ok: true, value: body(scope) };
  } catch (error) {
    outcome = { ok: false, fault: Fault.from(error) };
  }

  let fault: Fault | undefined;
  try {
    const primary = outcome.ok ? undefined : outcome.fault;
    fault = scope.state === "open" ? scope.close(primary) : primary;
  } finally {
    popScope(scope);
    log.debug(`${scope.name}: closed`);
  }

  if (fault === undefined) {
    if (outcome.ok) return outcome.value;
    fault = outcome.fault;
  }
  return resolve(scope, fault, options.handlers ?? []);
}

function resolve<T>(scope: Scope, fault: Fault, handlers: readonly FaultHandler<T>[]): T {
  const handler = findHandler(handlers, fault);
  if (handler === undefined) throw fault;

  log.info(`${scope.name}: ${handler.description} intercepted ${fault.kind}`);
  try {
    return handler.handle(fault);
  } catch (error) {
    const raised = Fault.from(error);
    const linked =
      causeChain(fault).includes(raised) ||
      causeChain(raised).includes(fault) ||
      raised.suppressed.includes(fault);
    if (!linked) {
      // The intercepted fault stays reachable: as the cause, or suppressed when the cause is taken
      if (raised.cause === undefined) {
        raised.initCause(fault);
      } else {
        raised.addSuppressed(fault);
      }
    }
    throw raised;
  }
}

/**
 * Acquire one resource, run `use` with it, release it.
 */
export function withResource<R, T>(
  open: () => R,
  release: (resource: R) => void,
  use: (resource: R) => T,
  options: ScopeOptions<T> = {}
): T {
  return scoped((scope) => use(scope.acquire(open, release)), options);
}
