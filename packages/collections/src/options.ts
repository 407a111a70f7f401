/**
 * Construction options shared by the containers, with defaults read from
 * the `collections.*` configuration keys.
 */

import { config } from "@corral/core";
import { Fault } from "@corral/scope";

/** Largest power-of-two table a container will allocate. */
export const MAXIMUM_CAPACITY = 1 << 30;

export type NullKeyPolicy = "permit" | "reject";

export interface HashTableOptions {
  /** Rounded up to a power of two */
  initialCapacity?: number;
  loadFactor?: number;
  nullKeys?: NullKeyPolicy;
}

export interface ResolvedHashTableOptions {
  readonly capacity: number;
  readonly loadFactor: number;
  readonly nullKeys: NullKeyPolicy;
}

export interface BoundedOptions {
  /** Maximum number of elements; unbounded when omitted */
  bound?: number;
}

/**
 * Smallest power of two that is at least `n`, clamped to [1, MAXIMUM_CAPACITY].
 */
export function tableSizeFor(n: number): number {
  if (n >= MAXIMUM_CAPACITY) return MAXIMUM_CAPACITY;
  let capacity = 1;
  while (capacity < n) capacity *= 2;
  return capacity;
}

export function checkCapacity(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw Fault.invalidArgument(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

export function checkBound(bound: number | undefined): number {
  if (bound === undefined) return Number.POSITIVE_INFINITY;
  if (!Number.isInteger(bound) || bound < 1) {
    throw Fault.invalidArgument(`bound must be a positive integer, got ${bound}`);
  }
  return bound;
}

function isNullKeyPolicy(value: string | undefined): value is NullKeyPolicy {
  return value === "permit" || value === "reject";
}

export function resolveHashTableOptions(options: HashTableOptions): ResolvedHashTableOptions {
  const initialCapacity = checkCapacity(
    "initialCapacity",
    options.initialCapacity ?? config.getNumber("collections.initialCapacity") ?? 16
  );

  const loadFactor =
    options.loadFactor ?? config.getNumber("collections.loadFactor") ?? 0.75;
  if (!(loadFactor > 0) || !Number.isFinite(loadFactor)) {
    throw Fault.invalidArgument(`loadFactor must be a positive number, got ${loadFactor}`);
  }

  const nullKeys = options.nullKeys ?? config.getString("collections.nullKeys") ?? "permit";
  if (!isNullKeyPolicy(nullKeys)) {
    throw Fault.invalidArgument(`nullKeys must be "permit" or "reject", got ${nullKeys}`);
  }

  return { capacity: tableSizeFor(initialCapacity), loadFactor, nullKeys };
}

export function defaultVerifyComparator(): boolean {
  return config.getBoolean("collections.verifyComparator") ?? true;
}

/**
 * Short rendering of a key or element for fault messages.
 */
export function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "object" && value !== null) {
    return Object.prototype.toString.call(value);
  }
  return String(value);
}
