/**
 * Numeric domains
 *
 * `RationalOps` is exported as a namespace; its helpers (`equals`,
 * `compare`, `isZero`) share names with other modules.
 */

export * from "./float.js";
export * from "./integer.js";
export * as RationalOps from "./rational.js";
export { type Rational, rational, rat, numericRational } from "./rational.js";
