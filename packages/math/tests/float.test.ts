import { describe, it, expect } from "vitest";
import { float64 } from "../src/index.js";

describe("float64", () => {
  it("follows IEEE-754 division by zero", () => {
    expect(float64.div(1, 0)).toBe(Infinity);
    expect(float64.div(-1, 0)).toBe(-Infinity);
    expect(float64.div(0, 0)).toBeNaN();
  });

  it("is named", () => {
    expect(float64.name).toBe("float64");
  });

  it("rounds as IEEE-754 does", () => {
    expect(float64.add(0.1, 0.2)).not.toBe(0.3);
    expect(float64.add(0.1, 0.2)).toBeCloseTo(0.3, 12);
  });
});
