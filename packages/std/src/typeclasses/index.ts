/**
 * Numeric capability typeclasses
 *
 * Every geometric formula is written once against these dictionaries and
 * asks only for the operations it uses. Instances are plain objects; pass
 * them as the last argument of a formula.
 *
 * - `Eq` / `Ord`: comparisons, needed by predicates and checked formulas
 * - `Semiring`: `+`, `×` and their identities
 * - `Ring`: adds `−`
 * - `Field`: adds `÷` (integer domains truncate, so this is "field-like")
 * - `Numeric`: a full domain (field, total order and number conversions)
 */

// ============================================================================
// Eq: Haskell Eq, Scala cats.Eq
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

// ============================================================================
// Ord: Haskell Ord, Scala cats.Order
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

export const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

export const ordBigInt: Ord<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

/**
 * Smaller of two values under an Ord.
 */
export function min<A>(O: Ord<A>): (a: A, b: A) => A {
  return (a, b) => (O.lessThanOrEqual(a, b) ? a : b);
}

/**
 * Larger of two values under an Ord.
 */
export function max<A>(O: Ord<A>): (a: A, b: A) => A {
  return (a, b) => (O.greaterThanOrEqual(a, b) ? a : b);
}

// ============================================================================
// Semiring / Ring / Field: the arithmetic hierarchy
// ============================================================================

/**
 * Semiring - addition and multiplication with identities.
 *
 * Laws:
 * - `add` is associative and commutative with identity `zero()`
 * - `mul` is associative with identity `one()`
 * - `mul` distributes over `add`
 */
export interface Semiring<A> {
  add(a: A, b: A): A;
  mul(a: A, b: A): A;
  zero(): A;
  one(): A;
}

/**
 * Ring - a semiring with subtraction.
 *
 * Unsigned domains implement `sub` as checked subtraction (throws below zero);
 * see `absoluteDifference` in `@rattrig/math` for the `|a − b|` variant.
 */
export interface Ring<A> extends Semiring<A> {
  sub(a: A, b: A): A;
}

/**
 * Field - a ring with division.
 *
 * Integer domains implement `div` by truncation toward zero. Division by
 * zero follows the domain: `NaN`/`Infinity` for floats, a thrown
 * `RangeError` for integers and rationals.
 */
export interface Field<A> extends Ring<A> {
  div(a: A, b: A): A;
}

/**
 * The slice of a Ring that cross products need.
 */
export type Subtraction<A> = Pick<Ring<A>, "sub" | "mul">;

/**
 * The slice of a Ring that quadrance and dot products need.
 */
export type RingOps<A> = Pick<Ring<A>, "add" | "sub" | "mul">;

// ============================================================================
// Numeric: a complete numeric domain
// ============================================================================

/**
 * Numeric typeclass - a field with a total order and conversions.
 *
 * Every concrete domain (`float64`, `int32`, `rational`, ...) implements this.
 */
export interface Numeric<A> extends Field<A>, Ord<A> {
  /** Domain name used in error messages, e.g. `"int32"` */
  readonly name: string;
  fromNumber(n: number): A;
  toNumber(a: A): number;
}

export const numericNumber: Numeric<number> = {
  ...ordNumber,
  name: "number",
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  zero: () => 0,
  one: () => 1,
  fromNumber: (n) => n,
  toNumber: (a) => a,
};

/**
 * Unbounded integers. Division truncates toward zero and throws
 * `RangeError` on a zero divisor.
 */
export const numericBigInt: Numeric<bigint> = {
  ...ordBigInt,
  name: "bigint",
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  zero: () => 0n,
  one: () => 1n,
  fromNumber: (n) => BigInt(Math.trunc(n)),
  toNumber: (a) => Number(a),
};

// ============================================================================
// Derived operations
// ============================================================================

/**
 * Square a value: `a × a`.
 */
export function square<A>(a: A, R: Pick<Semiring<A>, "mul">): A {
  return R.mul(a, a);
}

/**
 * The constant 4 built as `1 + 1 + 1 + 1`, so any semiring can supply it
 * without a literal conversion.
 */
export function four<A>(R: Semiring<A>): A {
  const two = R.add(R.one(), R.one());
  return R.add(two, two);
}

/**
 * The constant ½ as `1 ÷ (1 + 1)`. Truncates to zero in integer domains.
 */
export function half<A>(F: Field<A>): A {
  return F.div(F.one(), F.add(F.one(), F.one()));
}

/**
 * Test whether a value equals the additive identity.
 */
export function isZero<A>(a: A, F: Semiring<A> & Eq<A>): boolean {
  return F.equals(a, F.zero());
}
