/**
 * IEEE-754 double precision.
 *
 * Division by zero is not checked: `x / 0` is `±Infinity` and `0 / 0` is
 * `NaN`, as the hardware computes them.
 */

import { numericNumber, type Numeric } from "@rattrig/std";

export const float64: Numeric<number> = {
  ...numericNumber,
  name: "float64",
};

