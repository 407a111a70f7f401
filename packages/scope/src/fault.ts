/**
 * Fault: the single error type raised by corral.
 *
 * A fault is tagged by `kind` instead of by subclass. Each kind belongs to a
 * category that decides how it may be intercepted:
 *
 * - recoverable: callers are expected to handle or declare it
 * - defect: evidence of a logic error; propagates to an explicit handler
 * - fatal: never intercepted by kind-based handlers
 *
 * Besides the message, a fault carries at most one cause (the fault that
 * produced it) and any number of suppressed faults (raised while unwinding
 * from it).
 */

// ============================================================================
// Kinds and categories
// ============================================================================

export type FaultCategory = "recoverable" | "defect" | "fatal";

export const BUILTIN_FAULT_KINDS = {
  NotFound: "recoverable",
  DuplicateKeyViolation: "recoverable",
  CapacityOverflowFault: "recoverable",
  ResourceCloseFault: "recoverable",
  ConcurrentModificationFault: "defect",
  ComparatorContractViolation: "defect",
  IndexOutOfBounds: "defect",
  InvalidArgument: "defect",
  IllegalState: "defect",
  Unexpected: "defect",
  ResourceExhausted: "fatal",
} as const satisfies Record<string, FaultCategory>;

export type BuiltinFaultKind = keyof typeof BUILTIN_FAULT_KINDS;

/** A built-in kind, or one added with `registerFaultKind`. */
export type FaultKind = BuiltinFaultKind | (string & {});

const categories = new Map<string, FaultCategory>(Object.entries(BUILTIN_FAULT_KINDS));

function isBuiltinKind(kind: string): kind is BuiltinFaultKind {
  return Object.prototype.hasOwnProperty.call(BUILTIN_FAULT_KINDS, kind);
}

/**
 * Declare a caller-defined fault kind. Built-in kinds keep their category.
 */
export function registerFaultKind(kind: string, category: FaultCategory): void {
  if (isBuiltinKind(kind) && BUILTIN_FAULT_KINDS[kind] !== category) {
    throw Fault.invalidArgument(
      `cannot re-register built-in fault kind ${kind} as ${category}`
    );
  }
  categories.set(kind, category);
}

/**
 * Category of a kind; kinds nobody registered are treated as defects.
 */
export function categoryOf(kind: FaultKind): FaultCategory {
  return categories.get(kind) ?? "defect";
}

// ============================================================================
// Fault
// ============================================================================

export interface FaultOptions {
  /** The fault that produced this one */
  cause?: Fault;
  /** A foreign throwable this fault stands in for */
  origin?: unknown;
}

export class Fault extends Error {
  readonly kind: FaultKind;
  readonly category: FaultCategory;
  readonly origin: unknown;
  override cause: Fault | undefined = undefined;
  private readonly _suppressed: Fault[] = [];

  constructor(kind: FaultKind, message: string, options: FaultOptions = {}) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.category = categoryOf(kind);
    this.cause = options.cause;
    this.origin = options.origin;
  }

  /** Faults raised while unwinding from this one, in the order they occurred. */
  get suppressed(): readonly Fault[] {
    return this._suppressed;
  }

  addSuppressed(fault: Fault): void {
    if (fault === this) {
      throw Fault.invalidArgument("a fault cannot suppress itself", { cause: this });
    }
    this._suppressed.push(fault);
  }

  /**
   * Attach the cause after construction. Allowed once.
   */
  initCause(cause: Fault): this {
    if (cause === this) {
      throw Fault.invalidArgument("a fault cannot be its own cause");
    }
    if (this.cause !== undefined) {
      throw Fault.illegalState(`cause of ${this.kind} is already set`);
    }
    this.cause = cause;
    return this;
  }

  is(kind: FaultKind): boolean {
    return this.kind === kind;
  }

  isRecoverable(): boolean {
    return this.category === "recoverable";
  }

  isDefect(): boolean {
    return this.category === "defect";
  }

  isFatal(): boolean {
    return this.category === "fatal";
  }

  /**
   * Normalize anything that was thrown. Faults pass through untouched; a
   * call-stack overflow is fatal; every other value becomes `Unexpected`.
   */
  static from(error: unknown): Fault {
    if (error instanceof Fault) return error;
    if (error instanceof RangeError && /call stack/i.test(error.message)) {
      return new Fault("ResourceExhausted", error.message, { origin: error });
    }
    if (error instanceof Error) {
      return new Fault("Unexpected", error.message, { origin: error });
    }
    return new Fault("Unexpected", String(error), { origin: error });
  }

  static notFound(message: string, options?: FaultOptions): Fault {
    return new Fault("NotFound", message, options);
  }

  static duplicateKey(message: string, options?: FaultOptions): Fault {
    return new Fault("DuplicateKeyViolation", message, options);
  }

  static capacityOverflow(message: string, options?: FaultOptions): Fault {
    return new Fault("CapacityOverflowFault", message, options);
  }

  static resourceClose(message: string, options?: FaultOptions): Fault {
    return new Fault("ResourceCloseFault", message, options);
  }

  static concurrentModification(message: string, options?: FaultOptions): Fault {
    return new Fault("ConcurrentModificationFault", message, options);
  }

  static comparatorContract(message: string, options?: FaultOptions): Fault {
    return new Fault("ComparatorContractViolation", message, options);
  }

  static indexOutOfBounds(message: string, options?: FaultOptions): Fault {
    return new Fault("IndexOutOfBounds", message, options);
  }

  static invalidArgument(message: string, options?: FaultOptions): Fault {
    return new Fault("InvalidArgument", message, options);
  }

  static illegalState(message: string, options?: FaultOptions): Fault {
    return new Fault("IllegalState", message, options);
  }

  static resourceExhausted(message: string, options?: FaultOptions): Fault {
    return new Fault("ResourceExhausted", message, options);
  }
}

export function isFault(value: unknown): value is Fault {
  return value instanceof Fault;
}
