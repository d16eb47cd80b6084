import { describe, it, expect } from "vitest";
import { float64, int32, int64, numericRational, rat, type Rational } from "@rattrig/math";
import {
  cross3d,
  displacement3d,
  dot3d,
  quadrance3d,
  quadranceFromThreePoints3d,
  quadrea3d,
  spread3d,
  spreadFromThreePoints3d,
  type Point3,
} from "../src/index.js";

describe("3D formulas", () => {
  it("computes quadrance in space", () => {
    expect(quadrance3d([1, 2, 3], [4, 6, 15], int32)).toBe(169);
    expect(quadrance3d([0n, 0n, 0n], [1n, 2n, 2n], int64)).toBe(9n);
  });

  it("computes displacement and dot product", () => {
    expect(displacement3d([1, 1, 1], [2, 3, 4], int32)).toEqual([1, 2, 3]);
    expect(dot3d([1, 2, 3], [4, 5, 6], int32)).toBe(32);
  });

  it("computes the cross product vector", () => {
    expect(cross3d([1, 0, 0], [0, 1, 0], int32)).toEqual([0, 0, 1]);
    expect(cross3d([0, 1, 0], [1, 0, 0], int32)).toEqual([0, 0, -1]);
    expect(cross3d([1, 2, 3], [4, 5, 6], int32)).toEqual([-3, 6, -3]);
  });

  it("computes the spread between 3D vectors", () => {
    expect(spread3d([1, 0, 0], [0, 0, 5], float64)).toBe(1);
    expect(spread3d([1, 1, 0], [1, 0, 0], float64)).toBe(0.5);
    const diagonal: Point3<Rational> = [rat(1), rat(1), rat(1)];
    expect(spread3d(diagonal, [rat(1), rat(0), rat(0)], numericRational)).toEqual(rat(2, 3));
  });

  it("measures a spatial triangle", () => {
    const p1: Point3<number> = [0, 0, 0];
    const p2: Point3<number> = [1, 0, 0];
    const p3: Point3<number> = [0, 1, 0];
    expect(quadranceFromThreePoints3d(p1, p2, p3, int32)).toEqual([2, 1, 1]);
    expect(spreadFromThreePoints3d(p1, p2, p3, float64)).toEqual([1, 0.5, 0.5]);
    expect(quadrea3d(p1, p2, p3, int32)).toBe(4);
  });

  it("agrees with the planar quadrea for a triangle lifted off the plane", () => {
    expect(quadrea3d([0, 0, 7], [3, 0, 7], [0, 4, 7], int32)).toBe(576);
  });
});
