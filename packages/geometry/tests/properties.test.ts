import { describe, it, expect } from "vitest";
import { float64, int32, int64, numericRational, rat, uint32, type Rational } from "@rattrig/math";
import {
  areCollinear,
  cross,
  i32,
  i64,
  isValidTriangle,
  pointInTriangle,
  quadrance,
  quadranceFromThreePoints,
  safeSpread,
  sineLawProduct,
  spreadFromThreePoints,
  Triangle2D,
  u32,
  u64,
  type Point2,
} from "../src/index.js";

const grid: Point2<number>[] = [
  [0, 0],
  [2, -1],
  [-3, 5],
  [4, 4],
  [-2, -7],
  [6, 1],
];

describe("algebraic properties", () => {
  it("gives zero quadrance from a point to itself", () => {
    for (const p of grid) {
      expect(quadrance(p, p, int32)).toBe(0);
      expect(quadrance(p, p, float64)).toBe(0);
    }
  });

  it("is symmetric in quadrance", () => {
    for (const a of grid) {
      for (const b of grid) {
        expect(quadrance(a, b, int32)).toBe(quadrance(b, a, int32));
      }
    }
  });

  it("gives zero cross of a vector with itself, signed or unsigned", () => {
    for (const v of grid) {
      expect(cross(v, v, int32)).toBe(0);
      expect(i32.cross(v, v)).toBe(0);
    }
    const unsigned: Point2<number>[] = [
      [0, 0],
      [3, 9],
      [12, 5],
    ];
    for (const v of unsigned) {
      expect(u32.cross(v, v)).toBe(0);
      expect(u64.cross([BigInt(v[0]), BigInt(v[1])], [BigInt(v[0]), BigInt(v[1])])).toBe(0n);
    }
  });

  it("keeps s/q equal at every vertex exactly over rationals", () => {
    const toRational = ([x, y]: Point2<number>): Point2<Rational> => [rat(x), rat(y)];
    for (const a of grid) {
      for (const b of grid) {
        for (const c of grid) {
          if (!isValidTriangle(a, b, c, int32)) continue;
          const [p1, p2, p3] = [toRational(a), toRational(b), toRational(c)];
          const [q1, q2, q3] = quadranceFromThreePoints(p1, p2, p3, numericRational);
          const [s1, s2, s3] = spreadFromThreePoints(p1, p2, p3, numericRational);
          // s1/q1 = s2/q2 = s3/q3, cross-multiplied
          const R = numericRational;
          expect(sineLawProduct(q2, s1, R)).toEqual(sineLawProduct(q1, s2, R));
          expect(sineLawProduct(q3, s1, R)).toEqual(sineLawProduct(q1, s3, R));
        }
      }
    }
  });

  it("keeps s/q equal at every vertex within tolerance in floating point", () => {
    const p1: Point2<number> = [0.5, 0.25];
    const p2: Point2<number> = [3.1, -1.2];
    const p3: Point2<number> = [-0.7, 2.9];
    const [q1, q2, q3] = quadranceFromThreePoints(p1, p2, p3, float64);
    const [s1, s2, s3] = spreadFromThreePoints(p1, p2, p3, float64);
    expect(s2 / q2).toBeCloseTo(s1 / q1, 9);
    expect(s3 / q3).toBeCloseTo(s1 / q1, 9);
  });

  it("gives equal q·s products for an equilateral triangle", () => {
    const p1: Point2<number> = [0, 0];
    const p2: Point2<number> = [2, 0];
    const p3: Point2<number> = [1, Math.sqrt(3)];
    const [q1, q2, q3] = quadranceFromThreePoints(p1, p2, p3, float64);
    const [s1, s2, s3] = spreadFromThreePoints(p1, p2, p3, float64);
    const k = sineLawProduct(q1, s1, float64);
    expect(sineLawProduct(q2, s2, float64)).toBeCloseTo(k, 9);
    expect(sineLawProduct(q3, s3, float64)).toBeCloseTo(k, 9);
  });
});

describe("regression anchors", () => {
  it("returns the integer spread numerator where floats return 0.5", () => {
    expect(i32.spread([1, 1], [1, 0])).toBe(2);
    expect(i64.spread([1n, 1n], [1n, 0n])).toBe(2n);
    expect(u32.spread([1, 1], [1, 0])).toBe(2);
  });

  it("treats three collinear points as degenerate everywhere", () => {
    const t = Triangle2D.from([0, 0], [1, 1], [2, 2]);
    expect(areCollinear([0, 0], [1, 1], [2, 2], int32)).toBe(true);
    expect(isValidTriangle([0, 0], [1, 1], [2, 2], int32)).toBe(false);
    expect(t.isDegenerate(int32)).toBe(true);
    expect(t.twist(int32)).toBe(0);
  });

  it("measures the 3-4-5 triangle", () => {
    const t = Triangle2D.from([0, 0], [3, 0], [0, 4]);
    expect(t.quadrances(int32)).toEqual([25, 16, 9]);
    expect(t.area(int32)).toBe(576);
    expect(t.spreads(float64)).toContain(1);
  });

  it("never returns a silent zero for a zero vector", () => {
    for (const v of grid) {
      expect(safeSpread([0, 0], v, float64)).toEqual({ _tag: "Left", left: "DivisionByZero" });
      expect(safeSpread([0n, 0n], [BigInt(v[0]), BigInt(v[1])], int64)._tag).toBe("Left");
    }
  });

  it("includes the boundary in point-in-triangle", () => {
    const a: Point2<number> = [0, 0];
    const b: Point2<number> = [4, 0];
    const c: Point2<number> = [0, 4];
    expect(pointInTriangle(a, a, b, c, float64)).toBe(true);
    expect(pointInTriangle([2, 2], a, b, c, float64)).toBe(true);
    expect(pointInTriangle([0, 3], a, b, c, float64)).toBe(true);
    expect(pointInTriangle([3, 3], a, b, c, float64)).toBe(false);
  });

  it("agrees with checked unsigned arithmetic wherever that does not throw", () => {
    expect(u32.quadrance([4, 5], [1, 1])).toBe(quadrance([4, 5], [1, 1], uint32));
  });
});
