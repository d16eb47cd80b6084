/**
 * @rattrig/std: numeric capability contract
 *
 * Typeclasses describing what a number type must support to take part in a
 * geometric formula, plus the `Either` result type used by fault-checked
 * formulas.
 *
 * ## Typeclasses
 *
 * - Eq, Ord (with `makeOrd`, `min`, `max`)
 * - Semiring, Ring, Field, Numeric
 * - Capability slices: Subtraction, RingOps
 *
 * ## Data Types
 *
 * - Either (Left / Right)
 *
 * @example
 * ```ts
 * import { numericNumber, four } from "@rattrig/std";
 *
 * four(numericNumber); // 4, built as 1 + 1 + 1 + 1
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";

// Data types
export * from "./data/either.js";
