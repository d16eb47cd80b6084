/**
 * Geometric records
 *
 * Immutable containers over the coordinate tuples, exposing the formulas as
 * methods. Like the formulas, every method that computes takes the numeric
 * domain as its last argument; the records themselves never hold one.
 *
 * @example
 * ```typescript
 * const t = Triangle2D.from([0, 0], [3, 0], [0, 4]);
 * t.quadrances(int32);   // [25, 16, 9]
 * t.area(int32);         // 576
 * t.classify(int32);     // "right"
 * ```
 */

import type { Eq, Field, Ord, Ring, RingOps, Semiring, Subtraction } from "@rattrig/std";
import type { DiagnosticSink } from "./diagnostics.js";
import {
  addVectors,
  archimedes,
  cross,
  crossFromLine,
  crossFromThreePoints,
  displacement,
  dot,
  quadrance,
  quadranceFromLine,
  quadranceFromThreePoints,
  quadranceOf,
  spread,
  spreadFromLine,
  spreadFromThreePoints,
} from "./formulas.js";
import {
  displacement3d,
  quadrance3d,
  quadranceFromThreePoints3d,
  quadrea3d,
  spreadFromThreePoints3d,
} from "./formulas3d.js";
import {
  areCollinear,
  areLinesParallel,
  areLinesPerpendicular,
  classifyTriangle,
  pointInTriangle,
  pointOnLine,
  type TriangleKind,
} from "./predicates.js";
import type { Line2, Point2, Point3, Triple, Vector2, Vector3 } from "./types.js";

// ============================================================================
// Points and vectors
// ============================================================================

export class Point2D<A> {
  constructor(
    readonly x: A,
    readonly y: A
  ) {}

  static from<A>([x, y]: Point2<A>): Point2D<A> {
    return new Point2D(x, y);
  }

  toTuple(): Point2<A> {
    return [this.x, this.y];
  }

  equals(other: Point2D<A>, E: Eq<A>): boolean {
    return E.equals(this.x, other.x) && E.equals(this.y, other.y);
  }

  /** Quadrance to another point */
  quadrance(other: Point2D<A>, R: RingOps<A>): A {
    return quadrance(this.toTuple(), other.toTuple(), R);
  }
}

export class Point3D<A> {
  constructor(
    readonly x: A,
    readonly y: A,
    readonly z: A
  ) {}

  static from<A>([x, y, z]: Point3<A>): Point3D<A> {
    return new Point3D(x, y, z);
  }

  toTuple(): Point3<A> {
    return [this.x, this.y, this.z];
  }

  equals(other: Point3D<A>, E: Eq<A>): boolean {
    return E.equals(this.x, other.x) && E.equals(this.y, other.y) && E.equals(this.z, other.z);
  }

  quadrance(other: Point3D<A>, R: RingOps<A>): A {
    return quadrance3d(this.toTuple(), other.toTuple(), R);
  }
}

export class Vector2D<A> {
  constructor(
    readonly x: A,
    readonly y: A
  ) {}

  static from<A>([x, y]: Vector2<A>): Vector2D<A> {
    return new Vector2D(x, y);
  }

  /** The position vector of a point */
  static fromPoint<A>(p: Point2D<A>): Vector2D<A> {
    return new Vector2D(p.x, p.y);
  }

  /** The vector from one point to another */
  static between<A>(from: Point2D<A>, to: Point2D<A>, R: Pick<Ring<A>, "sub">): Vector2D<A> {
    return Vector2D.from(displacement(from.toTuple(), to.toTuple(), R));
  }

  toTuple(): Vector2<A> {
    return [this.x, this.y];
  }

  equals(other: Vector2D<A>, E: Eq<A>): boolean {
    return E.equals(this.x, other.x) && E.equals(this.y, other.y);
  }

  add(other: Vector2D<A>, R: Pick<Semiring<A>, "add">): Vector2D<A> {
    return Vector2D.from(addVectors(this.toTuple(), other.toTuple(), R));
  }

  sub(other: Vector2D<A>, R: Pick<Ring<A>, "sub">): Vector2D<A> {
    return Vector2D.from(displacement(other.toTuple(), this.toTuple(), R));
  }

  dot(other: Vector2D<A>, R: Pick<Semiring<A>, "add" | "mul">): A {
    return dot(this.toTuple(), other.toTuple(), R);
  }

  cross(other: Vector2D<A>, R: Subtraction<A>): A {
    return cross(this.toTuple(), other.toTuple(), R);
  }

  spread(other: Vector2D<A>, F: Field<A>): A {
    return spread(this.toTuple(), other.toTuple(), F);
  }

  /** Quadrance from the origin */
  quadrance(R: RingOps<A> & Pick<Semiring<A>, "zero">): A {
    return quadranceOf(this.toTuple(), R);
  }
}

export class Vector3D<A> {
  constructor(
    readonly x: A,
    readonly y: A,
    readonly z: A
  ) {}

  static from<A>([x, y, z]: Vector3<A>): Vector3D<A> {
    return new Vector3D(x, y, z);
  }

  static fromPoint<A>(p: Point3D<A>): Vector3D<A> {
    return new Vector3D(p.x, p.y, p.z);
  }

  static between<A>(from: Point3D<A>, to: Point3D<A>, R: Pick<Ring<A>, "sub">): Vector3D<A> {
    return Vector3D.from(displacement3d(from.toTuple(), to.toTuple(), R));
  }

  toTuple(): Vector3<A> {
    return [this.x, this.y, this.z];
  }

  equals(other: Vector3D<A>, E: Eq<A>): boolean {
    return E.equals(this.x, other.x) && E.equals(this.y, other.y) && E.equals(this.z, other.z);
  }

  add(other: Vector3D<A>, R: Pick<Semiring<A>, "add">): Vector3D<A> {
    return new Vector3D(R.add(this.x, other.x), R.add(this.y, other.y), R.add(this.z, other.z));
  }

  sub(other: Vector3D<A>, R: Pick<Ring<A>, "sub">): Vector3D<A> {
    return Vector3D.from(displacement3d(other.toTuple(), this.toTuple(), R));
  }
}

// ============================================================================
// Lines
// ============================================================================

/** The line `a·x + b·y + c = 0` */
export class Line2D<A> {
  constructor(
    readonly a: A,
    readonly b: A,
    readonly c: A
  ) {}

  static from<A>([a, b, c]: Line2<A>): Line2D<A> {
    return new Line2D(a, b, c);
  }

  toTuple(): Line2<A> {
    return [this.a, this.b, this.c];
  }

  equals(other: Line2D<A>, E: Eq<A>): boolean {
    return E.equals(this.a, other.a) && E.equals(this.b, other.b) && E.equals(this.c, other.c);
  }

  quadranceTo(p: Point2D<A>, F: Field<A>): A {
    return quadranceFromLine(p.toTuple(), this.toTuple(), F);
  }

  spreadWith(other: Line2D<A>, F: Field<A>): A {
    return spreadFromLine(this.toTuple(), other.toTuple(), F);
  }

  crossWith(other: Line2D<A>, R: Subtraction<A>): A {
    return crossFromLine(this.toTuple(), other.toTuple(), R);
  }

  contains(p: Point2D<A>, R: Semiring<A> & Eq<A>): boolean {
    return pointOnLine(p.toTuple(), this.toTuple(), R);
  }

  isParallelTo(other: Line2D<A>, R: Ring<A> & Eq<A>): boolean {
    return areLinesParallel(this.toTuple(), other.toTuple(), R);
  }

  isPerpendicularTo(other: Line2D<A>, R: Semiring<A> & Eq<A>): boolean {
    return areLinesPerpendicular(this.toTuple(), other.toTuple(), R);
  }
}

// ============================================================================
// Triangles
// ============================================================================

export class Triangle2D<A> {
  constructor(
    readonly p1: Point2D<A>,
    readonly p2: Point2D<A>,
    readonly p3: Point2D<A>
  ) {}

  static from<A>(p1: Point2<A>, p2: Point2<A>, p3: Point2<A>): Triangle2D<A> {
    return new Triangle2D(Point2D.from(p1), Point2D.from(p2), Point2D.from(p3));
  }

  toTuple(): readonly [Point2<A>, Point2<A>, Point2<A>] {
    return [this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple()];
  }

  equals(other: Triangle2D<A>, E: Eq<A>): boolean {
    return (
      this.p1.equals(other.p1, E) && this.p2.equals(other.p2, E) && this.p3.equals(other.p3, E)
    );
  }

  /** Side quadrances, each opposite its vertex */
  quadrances(R: RingOps<A>): Triple<A> {
    return quadranceFromThreePoints(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), R);
  }

  /** Spreads at each vertex */
  spreads(F: Field<A>): Triple<A> {
    return spreadFromThreePoints(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), F);
  }

  /** Quadrea: sixteen times the squared area */
  area(R: Ring<A>): A {
    const [q1, q2, q3] = this.quadrances(R);
    return archimedes(q1, q2, q3, R);
  }

  /** Twice the signed area; positive for counter-clockwise vertices */
  twist(R: Subtraction<A>): A {
    return crossFromThreePoints(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), R);
  }

  isDegenerate(R: Ring<A> & Eq<A>): boolean {
    return areCollinear(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), R);
  }

  contains(p: Point2D<A>, F: Field<A> & Ord<A>, sink?: DiagnosticSink): boolean {
    const [p1, p2, p3] = this.toTuple();
    return pointInTriangle(p.toTuple(), p1, p2, p3, F, sink);
  }

  classify(R: Ring<A> & Ord<A>): TriangleKind {
    const [q1, q2, q3] = this.quadrances(R);
    return classifyTriangle(q1, q2, q3, R);
  }
}

export class Triangle3D<A> {
  constructor(
    readonly p1: Point3D<A>,
    readonly p2: Point3D<A>,
    readonly p3: Point3D<A>
  ) {}

  static from<A>(p1: Point3<A>, p2: Point3<A>, p3: Point3<A>): Triangle3D<A> {
    return new Triangle3D(Point3D.from(p1), Point3D.from(p2), Point3D.from(p3));
  }

  toTuple(): readonly [Point3<A>, Point3<A>, Point3<A>] {
    return [this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple()];
  }

  equals(other: Triangle3D<A>, E: Eq<A>): boolean {
    return (
      this.p1.equals(other.p1, E) && this.p2.equals(other.p2, E) && this.p3.equals(other.p3, E)
    );
  }

  quadrances(R: RingOps<A>): Triple<A> {
    return quadranceFromThreePoints3d(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), R);
  }

  spreads(F: Field<A>): Triple<A> {
    return spreadFromThreePoints3d(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), F);
  }

  area(R: Ring<A>): A {
    return quadrea3d(this.p1.toTuple(), this.p2.toTuple(), this.p3.toTuple(), R);
  }
}
