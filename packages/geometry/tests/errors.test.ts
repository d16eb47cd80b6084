import { describe, it, expect } from "vitest";
import { MathError, MathFault, describeMathError, isMathError } from "../src/index.js";

describe("MathError", () => {
  it("has stable descriptions", () => {
    expect(describeMathError(MathError.DivisionByZero)).toBe("division by zero");
    expect(describeMathError(MathError.InvalidInput)).toBe("invalid input provided");
    expect(describeMathError(MathError.Overflow)).toBe("calculation overflow");
  });

  it("recognizes its members", () => {
    expect(isMathError("Overflow")).toBe(true);
    expect(isMathError("overflow")).toBe(false);
    expect(isMathError("toString")).toBe(false);
    expect(isMathError(42)).toBe(false);
  });

  it("wraps a fault in an Error", () => {
    const fault = new MathFault(MathError.Overflow);
    expect(fault).toBeInstanceOf(Error);
    expect(fault.name).toBe("MathFault");
    expect(fault.message).toBe("calculation overflow");
    expect(fault.kind).toBe("Overflow");
  });
});
