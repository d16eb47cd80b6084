/**
 * @rattrig/math: concrete numeric domains
 *
 * This package provides `Numeric` instances for every number representation
 * the geometry formulas run on:
 * - **float64**: IEEE doubles, unchecked division
 * - **int32, uint32**: checked 32-bit integers carried in `number`
 * - **int64, uint64, int128, uint128**: checked integers carried in `bigint`
 * - **numericRational**: exact fractions of bigints
 *
 * plus `absoluteDifference`, which turns an unsigned domain's subtraction
 * into `|a − b|`.
 *
 * @example
 * ```typescript
 * import { int64, rational, numericRational } from "@rattrig/math";
 *
 * int64.mul(3n, 4n); // 12n
 * numericRational.add(rational(1, 2), rational(1, 3)); // { num: 5n, den: 6n }
 * ```
 *
 * @packageDocumentation
 */

export * from "./types/index.js";
