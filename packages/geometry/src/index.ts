/**
 * @rattrig/geometry
 *
 * Rational trigonometry over any numeric domain: quadrance in place of
 * distance, spread in place of angle, using only `+ − × ÷`.
 *
 * @example
 * ```typescript
 * import { float64, int64, numericRational, rat } from "@rattrig/math";
 * import { archimedes, quadrance, safeSpread, spread } from "@rattrig/geometry";
 *
 * quadrance([1, 1], [4, 5], float64);                        // 25
 * spread([1, 1], [1, 0], float64);                           // 0.5
 * archimedes(1n, 2n, 3n, int64);                             // 8n
 * archimedes(rat(1, 2), rat(1, 4), rat(1, 6), numericRational); // 23/144
 * safeSpread([0, 0], [1, 0], float64);                       // Left("DivisionByZero")
 * ```
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./formulas.js";
export * from "./formulas3d.js";
export * from "./safe.js";
export * from "./fixed.js";
export * from "./predicates.js";
export * from "./records.js";
export * from "./diagnostics.js";
export * from "./config.js";
