import { describe, it, expect } from "vitest";
import { float64, int32, int64, numericRational, rat, type Rational } from "@rattrig/math";
import {
  areCollinear,
  areLinesParallel,
  areLinesPerpendicular,
  classifyTriangle,
  isAcuteTriangle,
  isObtuseTriangle,
  isRightTriangle,
  isValidQuadrance,
  isValidSpread,
  isValidTriangle,
  memorySink,
  pointInTriangle,
  pointOnLine,
  satisfiesTriangleInequality,
  type Line2,
  type Point2,
} from "../src/index.js";

describe("collinearity", () => {
  it("detects points on one line", () => {
    expect(areCollinear([0, 0], [1, 1], [2, 2], int32)).toBe(true);
    expect(isValidTriangle([0, 0], [1, 1], [2, 2], int32)).toBe(false);
  });

  it("accepts a proper triangle", () => {
    expect(areCollinear([0, 0], [1, 0], [0, 1], int32)).toBe(false);
    expect(isValidTriangle([0n, 0n], [3n, 0n], [0n, 4n], int64)).toBe(true);
  });
});

describe("quadrance and spread validity", () => {
  it("requires a non-negative quadrance", () => {
    expect(isValidQuadrance(0, float64)).toBe(true);
    expect(isValidQuadrance(-1, float64)).toBe(false);
  });

  it("requires a spread in [0, 1]", () => {
    expect(isValidSpread(0, float64)).toBe(true);
    expect(isValidSpread(1, float64)).toBe(true);
    expect(isValidSpread(rat(1, 2), numericRational)).toBe(true);
    expect(isValidSpread(1.5, float64)).toBe(false);
    expect(isValidSpread(-0.1, float64)).toBe(false);
  });

  it("checks the triangle inequality through the quadrea", () => {
    expect(satisfiesTriangleInequality(25, 16, 9, int32)).toBe(true);
    expect(satisfiesTriangleInequality(2, 8, 2, int32)).toBe(false);
    expect(satisfiesTriangleInequality(1, 1, 9, int32)).toBe(false);
    expect(satisfiesTriangleInequality(-1, 1, 1, int32)).toBe(false);
  });
});

describe("classification by spreads", () => {
  it("finds a right angle", () => {
    expect(isRightTriangle(1, 0.5, 0.5, float64)).toBe(true);
    expect(isRightTriangle(rat(1), rat(16, 25), rat(9, 25), numericRational)).toBe(true);
    expect(isRightTriangle(0.75, 0.75, 0.75, float64)).toBe(false);
  });

  it("calls a triangle acute when every spread is below one", () => {
    expect(isAcuteTriangle(0.75, 0.75, 0.75, float64)).toBe(true);
    expect(isAcuteTriangle(1, 0.5, 0.5, float64)).toBe(false);
  });

  it("uses one half as the obtuse threshold", () => {
    expect(isObtuseTriangle(0.6, 0.1, 0.2, float64)).toBe(true);
    expect(isObtuseTriangle(0.5, 0.5, 0.4, float64)).toBe(false);
    expect(isObtuseTriangle(rat(16, 25), rat(9, 25), rat(0), numericRational)).toBe(true);
  });
});

describe("classifyTriangle", () => {
  it("classifies by the Pythagorean relation", () => {
    expect(classifyTriangle(25, 16, 9, int32)).toBe("right");
    expect(classifyTriangle(1, 1, 1, int32)).toBe("acute");
    expect(classifyTriangle(10, 2, 4, int32)).toBe("obtuse");
    expect(classifyTriangle(2, 4, 10, int32)).toBe("obtuse");
  });

  it("reports collinear quadrances as degenerate", () => {
    expect(classifyTriangle(2, 8, 2, int32)).toBe("degenerate");
    expect(classifyTriangle(1, 1, 9, int32)).toBe("degenerate");
  });
});

describe("lines", () => {
  it("detects parallel lines", () => {
    expect(areLinesParallel([1, 2, 3], [2, 4, -1], int32)).toBe(true);
    expect(areLinesParallel([1, 2, 3], [2, 1, 0], int32)).toBe(false);
  });

  it("detects perpendicular lines", () => {
    expect(areLinesPerpendicular([1, 2, 0], [-2, 1, 5], int32)).toBe(true);
    expect(areLinesPerpendicular([1, 2, 0], [1, 1, 0], int32)).toBe(false);
  });

  it("tests a point against a line", () => {
    expect(pointOnLine([1, 1], [1, 1, -2], int32)).toBe(true);
    expect(pointOnLine([1, 2], [1, 1, -2], int32)).toBe(false);
    const line: Line2<Rational> = [rat(1), rat(1), rat(-2)];
    expect(pointOnLine([rat(1, 2), rat(3, 2)], line, numericRational)).toBe(true);
  });
});

describe("pointInTriangle", () => {
  const p1: Point2<number> = [0, 0];
  const p2: Point2<number> = [2, 0];
  const p3: Point2<number> = [0, 2];

  it("contains interior points", () => {
    expect(pointInTriangle([0.5, 0.5], p1, p2, p3, float64)).toBe(true);
  });

  it("includes the boundary", () => {
    expect(pointInTriangle([1, 0], p1, p2, p3, float64)).toBe(true);
    expect(pointInTriangle([1, 1], p1, p2, p3, float64)).toBe(true);
    expect(pointInTriangle([0, 0], p1, p2, p3, float64)).toBe(true);
    expect(pointInTriangle([2, 0], p1, p2, p3, float64)).toBe(true);
  });

  it("excludes outside points", () => {
    expect(pointInTriangle([2, 2], p1, p2, p3, float64)).toBe(false);
    expect(pointInTriangle([-1, 0], p1, p2, p3, float64)).toBe(false);
  });

  it("is exact over rationals", () => {
    const r = (x: number, y: number) => [rat(x), rat(y)] as const;
    const [a, b, c] = [r(0, 0), r(2, 0), r(0, 2)];
    expect(pointInTriangle([rat(1, 3), rat(1, 3)], a, b, c, numericRational)).toBe(true);
    expect(pointInTriangle([rat(5, 4), rat(1)], a, b, c, numericRational)).toBe(false);
  });

  it("truncates barycentric coordinates in integer domains", () => {
    // (3, 3) lies outside; its first coordinate is -1/2, which truncates to 0
    expect(pointInTriangle([3, 3], [0, 0], [4, 0], [0, 4], int32)).toBe(true);
    expect(pointInTriangle([3, 3], [0, 0], [4, 0], [0, 4], float64)).toBe(false);
    expect(pointInTriangle([8, 0], [0, 0], [4, 0], [0, 4], int32)).toBe(false);
  });

  it("contains nothing when the triangle is degenerate", () => {
    const sink = memorySink();
    expect(pointInTriangle([1, 1], [0, 0], [1, 1], [2, 2], float64, sink)).toBe(false);
    expect(sink.records).toEqual([
      { level: "debug", message: "pointInTriangle: degenerate triangle" },
    ]);
  });
});
