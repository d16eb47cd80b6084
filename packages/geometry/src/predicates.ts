/**
 * Predicates
 *
 * Boolean queries built from the core formulas. Exactness follows the
 * domain: rational and integer inputs give exact answers, `float64` compares
 * rounded values as they are.
 */

import { half, type Eq, type Field, type Ord, type Ring, type Semiring } from "@rattrig/std";
import { silentSink, type DiagnosticSink } from "./diagnostics.js";
import { archimedes, crossFromLine, crossFromThreePoints, dot } from "./formulas.js";
import type { Line2, Point2 } from "./types.js";

/** Whether three points lie on one line (their twist is zero) */
export function areCollinear<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  R: Ring<A> & Eq<A>
): boolean {
  return R.equals(crossFromThreePoints(p1, p2, p3, R), R.zero());
}

/** Whether three points form a proper (non-degenerate) triangle */
export function isValidTriangle<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  R: Ring<A> & Eq<A>
): boolean {
  return !areCollinear(p1, p2, p3, R);
}

/**
 * Triangle inequality in quadrance form.
 *
 * Three quadrances belong to a proper triangle iff none is negative and
 * their quadrea is positive, i.e. `(q1 + q2 − q3)² < 4·q1·q2`.
 */
export function satisfiesTriangleInequality<A>(q1: A, q2: A, q3: A, R: Ring<A> & Ord<A>): boolean {
  const zero = R.zero();
  return (
    isValidQuadrance(q1, R) &&
    isValidQuadrance(q2, R) &&
    isValidQuadrance(q3, R) &&
    R.greaterThan(archimedes(q1, q2, q3, R), zero)
  );
}

/** A quadrance is never negative */
export function isValidQuadrance<A>(q: A, O: Pick<Semiring<A>, "zero"> & Ord<A>): boolean {
  return O.greaterThanOrEqual(q, O.zero());
}

/** A spread lies in `[0, 1]` */
export function isValidSpread<A>(s: A, O: Pick<Semiring<A>, "zero" | "one"> & Ord<A>): boolean {
  return O.greaterThanOrEqual(s, O.zero()) && O.lessThanOrEqual(s, O.one());
}

/** Every spread is below one */
export function isAcuteTriangle<A>(
  s1: A,
  s2: A,
  s3: A,
  O: Pick<Semiring<A>, "one"> & Ord<A>
): boolean {
  const one = O.one();
  return O.lessThan(s1, one) && O.lessThan(s2, one) && O.lessThan(s3, one);
}

/** Some spread is exactly one */
export function isRightTriangle<A>(
  s1: A,
  s2: A,
  s3: A,
  E: Pick<Semiring<A>, "one"> & Eq<A>
): boolean {
  const one = E.one();
  return E.equals(s1, one) || E.equals(s2, one) || E.equals(s3, one);
}

/**
 * Some spread exceeds one half.
 *
 * A spread alone cannot tell an angle from its supplement; prefer
 * `classifyTriangle` when the quadrances are at hand.
 */
export function isObtuseTriangle<A>(s1: A, s2: A, s3: A, F: Field<A> & Ord<A>): boolean {
  const threshold = half(F);
  return (
    F.greaterThan(s1, threshold) || F.greaterThan(s2, threshold) || F.greaterThan(s3, threshold)
  );
}

export type TriangleKind = "degenerate" | "right" | "obtuse" | "acute";

/**
 * Classify a triangle by its side quadrances.
 *
 * By Pythagoras, the angle opposite `q3` is right iff `q3 = q1 + q2` and
 * obtuse iff `q3 > q1 + q2`. Quadrances with a non-positive quadrea are
 * `"degenerate"`.
 */
export function classifyTriangle<A>(q1: A, q2: A, q3: A, R: Ring<A> & Ord<A>): TriangleKind {
  if (!R.greaterThan(archimedes(q1, q2, q3, R), R.zero())) {
    return "degenerate";
  }

  let kind: TriangleKind = "acute";
  for (const [q, a, b] of [
    [q1, q2, q3],
    [q2, q1, q3],
    [q3, q1, q2],
  ] as const) {
    const rest = R.add(a, b);
    if (R.greaterThan(q, rest)) return "obtuse";
    if (R.equals(q, rest)) kind = "right";
  }
  return kind;
}

/** Lines with proportional normals (zero cross) are parallel */
export function areLinesParallel<A>(l1: Line2<A>, l2: Line2<A>, R: Ring<A> & Eq<A>): boolean {
  return R.equals(crossFromLine(l1, l2, R), R.zero());
}

/** Lines with orthogonal normals (zero dot) are perpendicular */
export function areLinesPerpendicular<A>(
  l1: Line2<A>,
  l2: Line2<A>,
  R: Semiring<A> & Eq<A>
): boolean {
  return R.equals(dot([l1[0], l1[1]], [l2[0], l2[1]], R), R.zero());
}

/** Whether `a·x + b·y + c = 0` */
export function pointOnLine<A>(p: Point2<A>, l: Line2<A>, R: Semiring<A> & Eq<A>): boolean {
  const value = R.add(R.add(R.mul(l[0], p[0]), R.mul(l[1], p[1])), l[2]);
  return R.equals(value, R.zero());
}

/**
 * Whether `p` lies inside the triangle or on its boundary, by barycentric
 * coordinates.
 *
 * A degenerate triangle contains nothing. Integer domains truncate the
 * coordinates, so use a float or rational domain for points off the lattice
 * of the vertices.
 */
export function pointInTriangle<A>(
  p: Point2<A>,
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  F: Field<A> & Ord<A>,
  sink: DiagnosticSink = silentSink
): boolean {
  const [x, y] = p;
  const [x1, y1] = p1;
  const [x2, y2] = p2;
  const [x3, y3] = p3;

  const denominator = F.add(
    F.mul(F.sub(y2, y3), F.sub(x1, x3)),
    F.mul(F.sub(x3, x2), F.sub(y1, y3))
  );
  if (F.equals(denominator, F.zero())) {
    sink.debug("pointInTriangle: degenerate triangle");
    return false;
  }

  const dx = F.sub(x, x3);
  const dy = F.sub(y, y3);
  const a = F.div(F.add(F.mul(F.sub(y2, y3), dx), F.mul(F.sub(x3, x2), dy)), denominator);
  const b = F.div(F.add(F.mul(F.sub(y3, y1), dx), F.mul(F.sub(x1, x3), dy)), denominator);
  const c = F.sub(F.sub(F.one(), a), b);

  const zero = F.zero();
  return (
    F.greaterThanOrEqual(a, zero) && F.greaterThanOrEqual(b, zero) && F.greaterThanOrEqual(c, zero)
  );
}
