/**
 * Rational Numbers
 *
 * Exact rational arithmetic using bigint numerator and denominator.
 * All operations return normalized (reduced) form with positive denominator,
 * so structural equality is numeric equality.
 *
 * @example
 * ```typescript
 * const half = rational(1n, 2n);
 * const third = rational(1n, 3n);
 * const sum = numericRational.add(half, third); // 5/6
 * ```
 */

import { EQ_ORD, GT, LT, makeOrd, type Numeric, type Ordering } from "@rattrig/std";

/**
 * Exact rational number represented as num/den.
 * Invariants:
 * - den > 0 (denominator always positive)
 * - gcd(|num|, den) = 1 (always in reduced form)
 */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

const ZERO: Rational = { num: 0n, den: 1n };
const ONE: Rational = { num: 1n, den: 1n };

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

/**
 * Greatest common divisor (Euclid).
 */
function gcd(a: bigint, b: bigint): bigint {
  a = abs(a);
  b = abs(b);
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

/**
 * Reduce to lowest terms with a positive denominator.
 */
function normalize(num: bigint, den: bigint): Rational {
  if (den === 0n) {
    throw new RangeError("Rational: denominator cannot be zero");
  }
  if (num === 0n) {
    return ZERO;
  }
  if (den < 0n) {
    num = -num;
    den = -den;
  }
  const g = gcd(num, den);
  return { num: num / g, den: den / g };
}

function toBigInt(n: bigint | number): bigint {
  if (typeof n === "bigint") return n;
  if (!Number.isInteger(n)) {
    throw new RangeError(`Rational: ${n} is not an integer`);
  }
  return BigInt(n);
}

/**
 * Create a rational number from numerator and denominator.
 * Auto-reduces and normalizes sign. Use `fromNumber` for fractional floats.
 *
 * @throws RangeError if denominator is zero or either term is not an integer
 */
export function rational(num: bigint | number, den: bigint | number = 1n): Rational {
  return normalize(toBigInt(num), toBigInt(den));
}

/**
 * Shorthand for `rational` with number arguments.
 */
export function rat(num: number, den: number = 1): Rational {
  return rational(num, den);
}

/**
 * Best rational approximation of a float whose denominator does not exceed
 * `maxDenominator`, by continued-fraction expansion.
 */
export function fromNumber(n: number, maxDenominator: bigint = 1000000n): Rational {
  if (!Number.isFinite(n)) {
    throw new RangeError("fromNumber: cannot convert non-finite number");
  }
  if (Number.isInteger(n)) {
    return rational(BigInt(n), 1n);
  }

  const negative = n < 0;
  const target = Math.abs(n);
  const sign = (p: bigint): bigint => (negative ? -p : p);

  // convergents p[k]/q[k]; (p0, q0) is k-2 and (p1, q1) is k-1
  let p0 = 0n;
  let q0 = 1n;
  let p1 = 1n;
  let q1 = 0n;
  let x = target;

  for (let i = 0; i < 64; i++) {
    const a = BigInt(Math.floor(x));
    const p2 = a * p1 + p0;
    const q2 = a * q1 + q0;

    if (q2 > maxDenominator) {
      // best semi-convergent under the bound, if it beats the last convergent
      const aMax = (maxDenominator - q0) / q1;
      if (aMax > 0n) {
        const pSemi = aMax * p1 + p0;
        const qSemi = aMax * q1 + q0;
        const errSemi = Math.abs(Number(pSemi) / Number(qSemi) - target);
        const errLast = Math.abs(Number(p1) / Number(q1) - target);
        if (errSemi < errLast) {
          return normalize(sign(pSemi), qSemi);
        }
      }
      return normalize(sign(p1), q1);
    }

    if (Math.abs(Number(p2) / Number(q2) - target) < 1e-15) {
      return normalize(sign(p2), q2);
    }

    [p0, q0, p1, q1] = [p1, q1, p2, q2];

    const frac = x - Math.floor(x);
    if (frac < 1e-15) break;
    x = 1 / frac;
  }

  return normalize(sign(p1), q1);
}

/**
 * Convert to a float. May lose precision for large terms.
 */
export function toNumber(r: Rational): number {
  return Number(r.num) / Number(r.den);
}

export function equals(a: Rational, b: Rational): boolean {
  return a.num === b.num && a.den === b.den;
}

export function isZero(r: Rational): boolean {
  return r.num === 0n;
}

/**
 * Compare by cross-multiplication; denominators are positive.
 */
export function compare(a: Rational, b: Rational): Ordering {
  const lhs = a.num * b.den;
  const rhs = b.num * a.den;
  return lhs < rhs ? LT : lhs > rhs ? GT : EQ_ORD;
}

/**
 * The exact rational domain.
 */
export const numericRational: Numeric<Rational> = {
  ...makeOrd(compare),
  equals,
  notEquals: (a, b) => !equals(a, b),
  name: "rational",
  add: (a, b) => normalize(a.num * b.den + b.num * a.den, a.den * b.den),
  sub: (a, b) => normalize(a.num * b.den - b.num * a.den, a.den * b.den),
  mul: (a, b) => normalize(a.num * b.num, a.den * b.den),
  div: (a, b) => {
    if (isZero(b)) {
      throw new RangeError("Rational division by zero");
    }
    return normalize(a.num * b.den, a.den * b.num);
  },
  zero: () => ZERO,
  one: () => ONE,
  fromNumber: (n) => fromNumber(n),
  toNumber,
};
