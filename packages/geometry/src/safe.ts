/**
 * Fault-checked formulas
 *
 * Twins of the division-dependent formulas in `formulas.ts`. Each compares
 * its denominator with the domain's zero before dividing and returns
 * `Left(MathError.DivisionByZero)` instead of dividing by it.
 *
 * A diagnostics sink may be passed last; a fault is reported to it at debug
 * level. The returned value never depends on the sink.
 *
 * @example
 * ```typescript
 * safeSpread([0, 0], [1, 0], float64);  // Left("DivisionByZero")
 * safeSpread([1, 1], [1, 0], float64);  // Right(0.5)
 * unwrap(safeSpread([0, 0], [1, 0], float64)); // throws MathFault
 * ```
 */

import {
  Left,
  Right,
  flatMap,
  four,
  getOrThrowWith,
  isZero,
  map,
  square,
  type Either,
  type Eq,
  type Field,
  type Ord,
} from "@rattrig/std";
import { silentSink, type DiagnosticSink } from "./diagnostics.js";
import { MathError, MathFault } from "./errors.js";
import {
  cross,
  crossFromLine,
  displacement,
  dot,
  quadranceFromThreePoints,
  quadranceOf,
} from "./formulas.js";
import { dot3d, quadrance3d } from "./formulas3d.js";
import type { Line2, Point2, Triple, Turn, Vector2, Vector3 } from "./types.js";

type CheckedField<A> = Field<A> & Eq<A>;

function divisionByZero<A>(operation: string, sink: DiagnosticSink): Either<MathError, A> {
  sink.debug(`${operation}: zero denominator`);
  return Left(MathError.DivisionByZero);
}

function anyZero<A>(values: readonly A[], F: CheckedField<A>): boolean {
  return values.some((value) => isZero(value, F));
}

function isZeroVector<A>(v: readonly A[], F: CheckedField<A>): boolean {
  return v.every((component) => isZero(component, F));
}

/**
 * The denominator itself, or a fault when it is zero.
 *
 * Callers test the inputs a denominator is built from before building it, so
 * a zero factor never reaches a multiplication that could overflow.
 */
function nonZero<A>(
  operation: string,
  denominator: A,
  F: CheckedField<A>,
  sink: DiagnosticSink
): Either<MathError, A> {
  return isZero(denominator, F) ? divisionByZero(operation, sink) : Right(denominator);
}

/** `1 − numerator() ÷ denominator`; the numerator is built only after the check */
function complement<A>(
  operation: string,
  numerator: () => A,
  denominator: A,
  F: CheckedField<A>,
  sink: DiagnosticSink
): Either<MathError, A> {
  return map(nonZero(operation, denominator, F, sink), (d) =>
    F.sub(F.one(), F.div(numerator(), d))
  );
}

/** `numerator() ÷ denominator`; the numerator is built only after the check */
function quotient<A>(
  operation: string,
  numerator: () => A,
  denominator: A,
  F: CheckedField<A>,
  sink: DiagnosticSink
): Either<MathError, A> {
  return map(nonZero(operation, denominator, F, sink), (d) => F.div(numerator(), d));
}

/** Checked `spread` */
export function safeSpread<A>(
  v1: Vector2<A>,
  v2: Vector2<A>,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, A> {
  if (isZeroVector(v1, F) || isZeroVector(v2, F)) {
    return divisionByZero("spread", sink);
  }
  const denominator = F.mul(quadranceOf(v1, F), quadranceOf(v2, F));
  return complement("spread", () => square(dot(v1, v2, F), F), denominator, F, sink);
}

/** Checked `spread3d` */
export function safeSpread3d<A>(
  v1: Vector3<A>,
  v2: Vector3<A>,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, A> {
  if (isZeroVector(v1, F) || isZeroVector(v2, F)) {
    return divisionByZero("spread3d", sink);
  }
  const origin: Vector3<A> = [F.zero(), F.zero(), F.zero()];
  const denominator = F.mul(quadrance3d(v1, origin, F), quadrance3d(v2, origin, F));
  return complement("spread3d", () => square(dot3d(v1, v2, F), F), denominator, F, sink);
}

/**
 * Checked `dilatation`. Unlike the unchecked version, a zero `v1` is a
 * fault rather than zero.
 */
export function safeDilatation<A>(
  v1: Vector2<A>,
  v2: Vector2<A>,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, A> {
  if (isZeroVector(v1, F)) {
    return divisionByZero("dilatation", sink);
  }
  return quotient("dilatation", () => quadranceOf(v2, F), quadranceOf(v1, F), F, sink);
}

/** Checked `quadranceFromLine`; faults on a line with `a = b = 0` */
export function safeQuadranceFromLine<A>(
  p: Point2<A>,
  l: Line2<A>,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, A> {
  const normal: Vector2<A> = [l[0], l[1]];
  if (isZeroVector(normal, F)) {
    return divisionByZero("quadranceFromLine", sink);
  }
  const numerator = (): A => square(F.add(F.add(F.mul(l[0], p[0]), F.mul(l[1], p[1])), l[2]), F);
  return quotient("quadranceFromLine", numerator, quadranceOf(normal, F), F, sink);
}

/** Checked `spreadFromLine` */
export function safeSpreadFromLine<A>(
  l1: Line2<A>,
  l2: Line2<A>,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, A> {
  const n1: Vector2<A> = [l1[0], l1[1]];
  const n2: Vector2<A> = [l2[0], l2[1]];
  if (isZeroVector(n1, F) || isZeroVector(n2, F)) {
    return divisionByZero("spreadFromLine", sink);
  }
  const denominator = F.mul(quadranceOf(n1, F), quadranceOf(n2, F));
  const numerator = (): A => square(crossFromLine(l1, l2, F), F);
  return quotient("spreadFromLine", numerator, denominator, F, sink);
}

/** Cross-law denominator `4·q2·q3` of the spread opposite `q1` */
function crossLawDenominator<A>(q2: A, q3: A, F: CheckedField<A>): A {
  return F.mul(F.mul(four(F), q2), q3);
}

/** Cross-law numerator `(q2 + q3 − q1)²` of the spread opposite `q1` */
function crossLawNumerator<A>(q1: A, q2: A, q3: A, F: CheckedField<A>): () => A {
  return () => square(F.sub(F.add(q2, q3), q1), F);
}

/**
 * Checked `cosineLaw`. Unlike the unchecked version, a zero `q2` or `q3` is
 * a fault rather than zero.
 */
export function safeCosineLaw<A>(
  q1: A,
  q2: A,
  q3: A,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, A> {
  if (anyZero([q2, q3], F)) {
    return divisionByZero("cosineLaw", sink);
  }
  const numerator = crossLawNumerator(q1, q2, q3, F);
  return complement("cosineLaw", numerator, crossLawDenominator(q2, q3, F), F, sink);
}

/**
 * Checked `spreadFromQuadrances`; faults when any side quadrance is zero.
 *
 * All three denominators are checked before any spread is computed.
 */
export function safeSpreadFromQuadrances<A>(
  q1: A,
  q2: A,
  q3: A,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, Triple<A>> {
  const operation = "spreadFromQuadrances";
  if (anyZero([q1, q2, q3], F)) {
    return divisionByZero(operation, sink);
  }
  const check = (a: A, b: A): Either<MathError, A> =>
    nonZero(operation, crossLawDenominator(a, b, F), F, sink);
  const spreadWith = (numerator: () => A, d: A): A => F.sub(F.one(), F.div(numerator(), d));

  return flatMap(check(q2, q3), (d1) =>
    flatMap(check(q1, q3), (d2) =>
      map(check(q1, q2), (d3): Triple<A> => [
        spreadWith(crossLawNumerator(q1, q2, q3, F), d1),
        spreadWith(crossLawNumerator(q2, q1, q3, F), d2),
        spreadWith(crossLawNumerator(q3, q1, q2, F), d3),
      ])
    )
  );
}

/** Checked `spreadFromThreePoints`; faults when two vertices coincide */
export function safeSpreadFromThreePoints<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  F: CheckedField<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, Triple<A>> {
  const [q1, q2, q3] = quadranceFromThreePoints(p1, p2, p3, F);
  return safeSpreadFromQuadrances(q1, q2, q3, F, sink);
}

/** Checked `turn`; faults when two consecutive points coincide */
export function safeTurn<A>(
  p1: Point2<A>,
  p2: Point2<A>,
  p3: Point2<A>,
  F: Field<A> & Ord<A>,
  sink: DiagnosticSink = silentSink
): Either<MathError, Turn<A>> {
  const v1 = displacement(p1, p2, F);
  const v2 = displacement(p2, p3, F);
  return map(safeSpread(v1, v2, F, sink), (s): Turn<A> => [
    s,
    F.greaterThanOrEqual(cross(v1, v2, F), F.zero()),
  ]);
}

/**
 * Extract the value of a checked result.
 *
 * @throws MathFault carrying the fault kind
 */
export function unwrap<A>(result: Either<MathError, A>): A {
  return getOrThrowWith(result, (kind) => new MathFault(kind));
}
