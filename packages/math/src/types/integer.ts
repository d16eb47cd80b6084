/**
 * Fixed-width integers
 *
 * Checked integer domains of a given width. Every arithmetic result is
 * range-checked; leaving the range throws `RangeError`, as does division by
 * zero. Division truncates toward zero.
 *
 * Widths up to 32 bits are carried in `number`; wider ones in `bigint`.
 *
 * @example
 * ```typescript
 * int32.mul(46341, 46341);   // RangeError: int32 overflow
 * uint64.sub(1n, 2n);        // RangeError: uint64 overflow
 * int64.div(7n, -2n);        // -3n
 * absoluteDifference(uint32).sub(1, 2); // 1
 * ```
 */

import { max, min, numericBigInt, numericNumber, type Numeric } from "@rattrig/std";

// ============================================================================
// number-backed domains
// ============================================================================

/**
 * Bounds of a `number`-backed integer domain.
 */
export interface FixedNumberSpec {
  readonly name: string;
  readonly min: number;
  readonly max: number;
}

/**
 * Build a checked integer domain over `number`.
 *
 * Only safe for widths whose products stay below 2^53 before the range
 * check, i.e. up to 32 bits.
 */
export function fixedNumber(spec: FixedNumberSpec): Numeric<number> {
  const { name, min, max } = spec;

  const check = (n: number): number => {
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new RangeError(`${name} overflow`);
    }
    // -0 and +0 are the same integer
    return n === 0 ? 0 : n;
  };

  return {
    ...numericNumber,
    name,
    add: (a, b) => check(a + b),
    sub: (a, b) => check(a - b),
    mul: (a, b) => check(a * b),
    div: (a, b) => {
      if (b === 0) {
        throw new RangeError(`${name} division by zero`);
      }
      return check(Math.trunc(a / b));
    },
    zero: () => 0,
    one: () => 1,
    fromNumber: (n) => {
      if (!Number.isInteger(n)) {
        throw new RangeError(`${name}: ${n} is not an integer`);
      }
      return check(n);
    },
  };
}

export const int32: Numeric<number> = fixedNumber({
  name: "int32",
  min: -0x80000000,
  max: 0x7fffffff,
});

export const uint32: Numeric<number> = fixedNumber({
  name: "uint32",
  min: 0,
  max: 0xffffffff,
});

// ============================================================================
// bigint-backed domains
// ============================================================================

/**
 * Width and signedness of a `bigint`-backed integer domain.
 */
export interface FixedBigIntSpec {
  readonly name: string;
  readonly bits: number;
  readonly signed: boolean;
}

/**
 * Inclusive bounds of a two's-complement (or unsigned) integer of `bits` bits.
 */
export function bounds(bits: number, signed: boolean): readonly [bigint, bigint] {
  const width = BigInt(bits);
  return signed
    ? [-(1n << (width - 1n)), (1n << (width - 1n)) - 1n]
    : [0n, (1n << width) - 1n];
}

/**
 * Build a checked integer domain over `bigint`.
 */
export function fixedBigInt(spec: FixedBigIntSpec): Numeric<bigint> {
  const { name, bits, signed } = spec;
  const [min, max] = bounds(bits, signed);

  const check = (n: bigint): bigint => {
    if (n < min || n > max) {
      throw new RangeError(`${name} overflow`);
    }
    return n;
  };

  return {
    ...numericBigInt,
    name,
    add: (a, b) => check(a + b),
    sub: (a, b) => check(a - b),
    mul: (a, b) => check(a * b),
    div: (a, b) => {
      if (b === 0n) {
        throw new RangeError(`${name} division by zero`);
      }
      return check(a / b);
    },
    zero: () => 0n,
    one: () => 1n,
    fromNumber: (n) => {
      if (!Number.isInteger(n)) {
        throw new RangeError(`${name}: ${n} is not an integer`);
      }
      return check(BigInt(n));
    },
  };
}

export const int64: Numeric<bigint> = fixedBigInt({ name: "int64", bits: 64, signed: true });
export const uint64: Numeric<bigint> = fixedBigInt({ name: "uint64", bits: 64, signed: false });
export const int128: Numeric<bigint> = fixedBigInt({ name: "int128", bits: 128, signed: true });
export const uint128: Numeric<bigint> = fixedBigInt({ name: "uint128", bits: 128, signed: false });

// ============================================================================
// Unsigned adapter
// ============================================================================

/**
 * Replace subtraction with the absolute difference `|a − b|`.
 *
 * Unsigned domains cannot represent a negative difference, so formulas
 * specialized for them subtract the smaller operand from the larger one.
 * Squares of differences are unaffected; anything signed (a cross product,
 * an orientation) loses its sign.
 */
export function absoluteDifference<A>(D: Numeric<A>): Numeric<A> {
  const larger = max(D);
  const smaller = min(D);
  return {
    ...D,
    name: `${D.name}/absdiff`,
    sub: (a, b) => D.sub(larger(a, b), smaller(a, b)),
  };
}
