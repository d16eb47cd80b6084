import {
  square,
  type Field,
  type Ring,
  type RingOps,
  type Semiring,
  type Subtraction,
} from "@rattrig/std";
import { archimedes, spreadFromQuadrances } from "./formulas.js";
import type { Point3, Triple, Vector3 } from "./types.js";

/** Displacement vector from one point to another: `to − from` */
export function displacement3d<A>(
  from: Point3<A>,
  to: Point3<A>,
  R: Pick<Ring<A>, "sub">
): Vector3<A> {
  return [R.sub(to[0], from[0]), R.sub(to[1], from[1]), R.sub(to[2], from[2])];
}

/** Quadrance between two points in space */
export function quadrance3d<A>(p1: Point3<A>, p2: Point3<A>, R: RingOps<A>): A {
  const dx = square(R.sub(p1[0], p2[0]), R);
  const dy = square(R.sub(p1[1], p2[1]), R);
  const dz = square(R.sub(p1[2], p2[2]), R);
  return R.add(R.add(dx, dy), dz);
}

/** Dot product of two 3D vectors */
export function dot3d<A>(v1: Vector3<A>, v2: Vector3<A>, R: Pick<Semiring<A>, "add" | "mul">): A {
  return R.add(R.add(R.mul(v1[0], v2[0]), R.mul(v1[1], v2[1])), R.mul(v1[2], v2[2]));
}

/** Cross product of two 3D vectors; perpendicular to both */
export function cross3d<A>(v1: Vector3<A>, v2: Vector3<A>, R: Subtraction<A>): Vector3<A> {
  return [
    R.sub(R.mul(v1[1], v2[2]), R.mul(v1[2], v2[1])),
    R.sub(R.mul(v1[2], v2[0]), R.mul(v1[0], v2[2])),
    R.sub(R.mul(v1[0], v2[1]), R.mul(v1[1], v2[0])),
  ];
}

/** Spread between two 3D vectors: `1 − (v1·v2)² / (Q(v1)·Q(v2))` */
export function spread3d<A>(v1: Vector3<A>, v2: Vector3<A>, F: Field<A>): A {
  const origin: Point3<A> = [F.zero(), F.zero(), F.zero()];
  const denominator = F.mul(quadrance3d(v1, origin, F), quadrance3d(v2, origin, F));
  return F.sub(F.one(), F.div(square(dot3d(v1, v2, F), F), denominator));
}

/** Side quadrances of a spatial triangle, each opposite its vertex */
export function quadranceFromThreePoints3d<A>(
  p1: Point3<A>,
  p2: Point3<A>,
  p3: Point3<A>,
  R: RingOps<A>
): Triple<A> {
  return [quadrance3d(p2, p3, R), quadrance3d(p1, p3, R), quadrance3d(p1, p2, R)];
}

/** The spread at each vertex of a spatial triangle */
export function spreadFromThreePoints3d<A>(
  p1: Point3<A>,
  p2: Point3<A>,
  p3: Point3<A>,
  F: Field<A>
): Triple<A> {
  const [q1, q2, q3] = quadranceFromThreePoints3d(p1, p2, p3, F);
  return spreadFromQuadrances(q1, q2, q3, F);
}

/** Quadrea of a spatial triangle */
export function quadrea3d<A>(p1: Point3<A>, p2: Point3<A>, p3: Point3<A>, R: Ring<A>): A {
  const [q1, q2, q3] = quadranceFromThreePoints3d(p1, p2, p3, R);
  return archimedes(q1, q2, q3, R);
}
