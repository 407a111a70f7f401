/**
 * @corral/std: capability typeclasses
 *
 * Eq, Ord and Hash instances for primitives, plus the combinators used to
 * build instances for caller types.
 *
 * @example
 * ```ts
 * import { eqBy, hashBy, ordBy, eqString, hashString, ordNumber } from "@corral/std";
 *
 * interface User { id: string; age: number }
 * const eqUser = eqBy((u: User) => u.id, eqString);
 * const hashUser = hashBy((u: User) => u.id, hashString);
 * const byAge = ordBy((u: User) => u.age, ordNumber);
 * ```
 */

export * from "./typeclasses/index.js";
