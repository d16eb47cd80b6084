/**
 * Planar rational trigonometry
 *
 * Every formula is written once and takes the numeric domain as its last
 * argument. Each asks only for the capabilities it uses, so `quadrance` runs
 * over any ring while `spread` needs division.
 *
 * These are the unchecked entry points: a zero denominator divides by zero
 * in the domain's own way (`NaN`/`Infinity` for `float64`, a thrown
 * `RangeError` for integers and rationals). The callers guarantee
 * non-degenerate input; see `safe.ts` for the checked twins.
 *
 * @example
 * ```typescript
 * quadrance([1, 1], [4, 5], float64);          // 25
 * spread([1, 1], [1, 0], float64);             // 0.5
 * archimedes(rat(1, 2), rat(1, 4), rat(1, 6), numericRational); // 23/144
 * ```
 */

import {
  four,
  square,
  type Eq,
  type Field,
  type Ord,
  type Ring,
  type RingOps,
  type Semiring,
  type Subtraction,
} from "@rattrig/std";
import type { Line2, Point2, Triple, Turn, Vector2 } from "./types.js";

// ============================================================================
// Vectors
// ============================================================================

/** Displacement vector from one point to another: `to − from` */
export function displacement<A>(
  from: Point2<A>,
  to: Point2<A>,
  R: Pick<Ring<A>, "sub">
): Vector2<A> {
  return [R.sub(to[0], from[0]), R.sub(to[1], from[1])];
}

/** Component-wise vector addition */
export function addVectors<A>(
  a: Vector2<A>,
  b: Vector2<A>,
  R: Pick<Semiring<A>, "add">
): Vector2<A> {
  return [R.add(a[0], b[0]), R.add(a[1], b[1])];
}

/** Dot product: `x1·x2 + y1·y2` */
export function dot<A>(v1: Vector2<A>, v2: Vector2<A>, R: Pick<Semiring<A>, "add" | "mul">): A {
  return R.add(R.mul(v1[0], v2[0]), R.mul(v1[1], v2[1]));
}

/**
 * Cross product: `x1·y2 − y1·x2`.
 *
 * Twice the signed area of the triangle the vectors span from a shared
 * origin; positive when `v2` lies counter-clockwise of `v1`.
 */
export function cross<A>(v1: Vector2<A>, v2: Vector2<A>, R: Subtraction<A>): A {
  return R.sub(R.mul(v1[0], v2[1]), R.mul(v1[1], v2[0]));
}

// ============================================================================
// Quadrance, spread, quadrea
// ============================================================================

/** Quadrance between two points: `(x1−x2)² + (y1−y2)²` */
export function quadrance<A>(p1: Point2<A>, p2: Point2<A>, R: RingOps<A>): A {
  return R.add(square(R.sub(p1[0], p2[0]), R), square(R.sub(p1[1], p2[1]), R));
}

/** Quadrance of a vector, measured from the origin */
export function quadranceOf<A>(v: Vector2<A>, R: RingOps<A> & Pick<Semiring<A>, "zero">): A {
  return quadrance(v, [R.zero(), R.zero()], R);
}

/**
 * Spread between two vectors: `1 − (v1·v2)² / (Q(v1)·Q(v2))`.
 *
 * The squared sine of the angle between them. Undefined for a zero vector.
 */
export function spread<A>(v1: Vector2<A>, v2: Vector2<A>, F: Field<A>): A {
  const denominator = F.mul(quadranceOf(v1, F), quadranceOf(v2, F));
  return F.sub(F.one(), F.div(square(dot(v1, v2, F), F), denominator));
}

/**
 * Archimedes' formula: `4·q1·q2 − (q1 + q2 − q3)²`.
 *
 * The quadrea of a triangle with side quadrances `q1`, `q2`, `q3`, i.e.
 * sixteen times its squared area. Symmetric in its arguments.
 */
export function archimedes<A>(q1: A, q2: A, q3: A, R: Ring<A>): A {
  const t = R.sub(R.add(q1, q2), q3);
  return R.sub(R.mul(R.mul(four(R), q1), q2), square(t, R));
}

/** Sine-law product `q·s`, the same for every vertex of a triangle */
export function sineLawProduct<A>(q: A, s: A, R: Pick<Semiring<A>, "mul">): A {
  return R.mul(q, s);
}

// ============================================================================
// Lines
// ============================================================================

function normal<A>(l: Line2<A>): Vector2<A> {
  return [l[0], l[1]];
}

/** Quadrance from a point to a line: `(a·x + b·y + c)² / (a² + b²)` */
export function quadranceFromLine<A>(p: Point2<A>, l: Line2<A>, F: Field<A>): A {
  const value = F.add(F.add(F.mul(l[0], p[0]), F.mul(l[1], p[1])), l[2]);
  return F.div(square(value, F), quadranceOf(normal(l), F));
}

/** Spread between two lines: `(a1·b2 − b1·a2)² / ((a1² + b1²)·(a2² + b2²))` */
export function spreadFromLine<A>(l1: Line2<A>, l2: Line2<A>, F: Field<A>): A {
  const denominator = F.mul(quadranceOf(normal(l1), F), quadranceOf(normal(l2), F));
  return F.div(square(crossFromLine(l1, l2, F), F), denominator);
}

/** Cross of the two lines' normal vectors; zero iff they are parallel */
export function crossFromLine<A>(l1: Line2<A>, l2: Line2<A>, R: Subtraction<A>): A {
  return cross(normal(l1), normal(l2), R);
}

// ============================================================================
// Triangles
// ============================================================================

/**
 * The three side quadrances, each opposite its vertex:
 * `[Q(p2,p3), Q(p1,p3), Q(p1,p2)]`.
 */
export function quadranceFromThreePoints<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  R: RingOps<A>
): Triple<A> {
  return [quadrance(p2, p3, R), quadrance(p1, p3, R), quadrance(p1, p2, R)];
}

/**
 * Spread opposite `q1` in a triangle with side quadrances `q1`, `q2`, `q3`,
 * by the cross law: `1 − (q2 + q3 − q1)² / (4·q2·q3)`.
 */
function oppositeSpread<A>(q1: A, q2: A, q3: A, F: Field<A>): A {
  const t = F.sub(F.add(q2, q3), q1);
  return F.sub(F.one(), F.div(square(t, F), F.mul(F.mul(four(F), q2), q3)));
}

/** The three spreads of a triangle, each opposite its side quadrance */
export function spreadFromQuadrances<A>(q1: A, q2: A, q3: A, F: Field<A>): Triple<A> {
  return [
    oppositeSpread(q1, q2, q3, F),
    oppositeSpread(q2, q1, q3, F),
    oppositeSpread(q3, q1, q2, F),
  ];
}

/** The spread at each vertex of a triangle */
export function spreadFromThreePoints<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  F: Field<A>
): Triple<A> {
  const [q1, q2, q3] = quadranceFromThreePoints(p1, p2, p3, F);
  return spreadFromQuadrances(q1, q2, q3, F);
}

/** Twist of a triangle: `cross(p2 − p1, p3 − p1)`, twice its signed area */
export function crossFromThreePoints<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  R: Subtraction<A>
): A {
  return cross(displacement(p1, p2, R), displacement(p1, p3, R), R);
}

/** Quadrea of the triangle with the given vertices */
export function quadrea<A>(p1: Point2<A>, p2: Point2<A>, p3: Point2<A>, R: Ring<A>): A {
  const [q1, q2, q3] = quadranceFromThreePoints(p1, p2, p3, R);
  return archimedes(q1, q2, q3, R);
}

/**
 * Turn at `p2` walking `p1 → p2 → p3`: the spread between the two edges and
 * whether the walk bends counter-clockwise (a straight walk counts as
 * counter-clockwise).
 */
export function turn<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  F: Field<A> & Ord<A>
): Turn<A> {
  const v1 = displacement(p1, p2, F);
  const v2 = displacement(p2, p3, F);
  return [spread(v1, v2, F), F.greaterThanOrEqual(cross(v1, v2, F), F.zero())];
}

/**
 * Dilatation `Q(v2) / Q(v1)`, the squared scale factor from `v1` to `v2`.
 *
 * Returns zero when `v1` is the zero vector.
 */
export function dilatation<A>(v1: Vector2<A>, v2: Vector2<A>, F: Field<A> & Eq<A>): A {
  const q1 = quadranceOf(v1, F);
  if (F.equals(q1, F.zero())) {
    return F.zero();
  }
  return F.div(quadranceOf(v2, F), q1);
}

/**
 * Cosine law: the spread opposite `q1`. Returns zero when `q2` or `q3` is
 * zero.
 */
export function cosineLaw<A>(q1: A, q2: A, q3: A, F: Field<A> & Eq<A>): A {
  if (F.equals(q2, F.zero()) || F.equals(q3, F.zero())) {
    return F.zero();
  }
  return oppositeSpread(q1, q2, q3, F);
}
