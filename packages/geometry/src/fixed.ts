/**
 * Fixed-type specializations
 *
 * Monomorphic formula sets, one per concrete domain, built once at module
 * load by closing the generic formulas over that domain's dictionary. Their
 * members take coordinates only.
 *
 * Two deliberate departures from the generic path:
 *
 * - Unsigned sets (`u32`, `u64`, `u128`) subtract by absolute difference.
 *   Quadrances are unaffected, but `cross` is never negative and `turn`
 *   always reports counter-clockwise: orientation is lost.
 * - Integer sets compute `spread` as `q1·q2 · (1 − dot² ÷ (q1·q2))` with
 *   truncating division, i.e. the spread's numerator over the denominator
 *   `q1·q2`. For `(1,1),(1,0)` that is `2`, where `f64.spread` gives `0.5`.
 *
 * @example
 * ```typescript
 * i32.archimedes(1, 2, 3);           // 8
 * u64.cross([1n, 1n], [1n, 0n]);     // 1n (generic int64 gives -1n)
 * f64.spread([1, 1], [1, 0]);        // 0.5
 * ```
 */

import { square, type Numeric } from "@rattrig/std";
import {
  absoluteDifference,
  float64,
  int128,
  int32,
  int64,
  uint128,
  uint32,
  uint64,
} from "@rattrig/math";
import {
  archimedes,
  cosineLaw,
  cross,
  crossFromLine,
  crossFromThreePoints,
  dilatation,
  dot,
  quadrance,
  quadranceFromLine,
  quadranceFromThreePoints,
  quadranceOf,
  spread,
  spreadFromLine,
  spreadFromThreePoints,
  turn,
} from "./formulas.js";
import { quadrance3d } from "./formulas3d.js";
import type { Line2, Point2, Point3, Triple, Turn, Vector2 } from "./types.js";

/**
 * The formula surface of one concrete domain.
 */
export interface FixedFormulas<A> {
  /** The dictionary every member is closed over */
  readonly domain: Numeric<A>;
  readonly quadrance: (p1: Point2<A>, p2: Point2<A>) => A;
  readonly cross: (v1: Vector2<A>, v2: Vector2<A>) => A;
  readonly dot: (v1: Vector2<A>, v2: Vector2<A>) => A;
  readonly spread: (v1: Vector2<A>, v2: Vector2<A>) => A;
  readonly archimedes: (q1: A, q2: A, q3: A) => A;
  readonly quadranceFromLine: (p: Point2<A>, l: Line2<A>) => A;
  readonly spreadFromLine: (l1: Line2<A>, l2: Line2<A>) => A;
  readonly crossFromLine: (l1: Line2<A>, l2: Line2<A>) => A;
  readonly quadranceFromThreePoints: (p1: Point2<A>, p2: Point2<A>, p3: Point2<A>) => Triple<A>;
  readonly spreadFromThreePoints: (p1: Point2<A>, p2: Point2<A>, p3: Point2<A>) => Triple<A>;
  readonly crossFromThreePoints: (p1: Point2<A>, p2: Point2<A>, p3: Point2<A>) => A;
  readonly turn: (p1: Point2<A>, p2: Point2<A>, p3: Point2<A>) => Turn<A>;
  readonly dilatation: (v1: Vector2<A>, v2: Vector2<A>) => A;
  readonly cosineLaw: (q1: A, q2: A, q3: A) => A;
  readonly quadrance3d: (p1: Point3<A>, p2: Point3<A>) => A;
}

type SpreadRule<A> = (v1: Vector2<A>, v2: Vector2<A>, D: Numeric<A>) => A;

/**
 * Spread scaled by its denominator, under truncating division.
 *
 * Throws the domain's division-by-zero `RangeError` for a zero vector.
 */
export function integerSpread<A>(v1: Vector2<A>, v2: Vector2<A>, D: Numeric<A>): A {
  const denominator = D.mul(quadranceOf(v1, D), quadranceOf(v2, D));
  return D.mul(denominator, D.sub(D.one(), D.div(square(dot(v1, v2, D), D), denominator)));
}

function specialize<A>(D: Numeric<A>, spreadRule: SpreadRule<A>): FixedFormulas<A> {
  return {
    domain: D,
    quadrance: (p1, p2) => quadrance(p1, p2, D),
    cross: (v1, v2) => cross(v1, v2, D),
    dot: (v1, v2) => dot(v1, v2, D),
    spread: (v1, v2) => spreadRule(v1, v2, D),
    archimedes: (q1, q2, q3) => archimedes(q1, q2, q3, D),
    quadranceFromLine: (p, l) => quadranceFromLine(p, l, D),
    spreadFromLine: (l1, l2) => spreadFromLine(l1, l2, D),
    crossFromLine: (l1, l2) => crossFromLine(l1, l2, D),
    quadranceFromThreePoints: (p1, p2, p3) => quadranceFromThreePoints(p1, p2, p3, D),
    spreadFromThreePoints: (p1, p2, p3) => spreadFromThreePoints(p1, p2, p3, D),
    crossFromThreePoints: (p1, p2, p3) => crossFromThreePoints(p1, p2, p3, D),
    turn: (p1, p2, p3) => turn(p1, p2, p3, D),
    dilatation: (v1, v2) => dilatation(v1, v2, D),
    cosineLaw: (q1, q2, q3) => cosineLaw(q1, q2, q3, D),
    quadrance3d: (p1, p2) => quadrance3d(p1, p2, D),
  };
}

/** Formulas for a floating-point domain; identical to the generic path */
export function specializeFloat<A>(D: Numeric<A>): FixedFormulas<A> {
  return specialize(D, spread);
}

/** Formulas for a signed integer domain */
export function specializeSigned<A>(D: Numeric<A>): FixedFormulas<A> {
  return specialize(D, integerSpread);
}

/** Formulas for an unsigned integer domain, subtracting by absolute difference */
export function specializeUnsigned<A>(D: Numeric<A>): FixedFormulas<A> {
  return specialize(absoluteDifference(D), integerSpread);
}

export const f64: FixedFormulas<number> = specializeFloat(float64);

export const i32: FixedFormulas<number> = specializeSigned(int32);
export const i64: FixedFormulas<bigint> = specializeSigned(int64);
export const i128: FixedFormulas<bigint> = specializeSigned(int128);

export const u32: FixedFormulas<number> = specializeUnsigned(uint32);
export const u64: FixedFormulas<bigint> = specializeUnsigned(uint64);
export const u128: FixedFormulas<bigint> = specializeUnsigned(uint128);
