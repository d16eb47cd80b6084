/**
 * Faults reported by the checked formulas.
 *
 * The set is closed. The formulas themselves only ever report
 * `DivisionByZero`; `InvalidInput` and `Overflow` are reserved for callers
 * building on top of them.
 */
export const MathError = {
  DivisionByZero: "DivisionByZero",
  InvalidInput: "InvalidInput",
  Overflow: "Overflow",
} as const;

export type MathError = (typeof MathError)[keyof typeof MathError];

const DESCRIPTIONS: Record<MathError, string> = {
  DivisionByZero: "division by zero",
  InvalidInput: "invalid input provided",
  Overflow: "calculation overflow",
};

/**
 * Human-readable description of a fault. Stable across releases.
 */
export function describeMathError(error: MathError): string {
  return DESCRIPTIONS[error];
}

export function isMathError(value: unknown): value is MathError {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(DESCRIPTIONS, value);
}

/**
 * Thrown when a fault is forced out of an `Either` (see `unwrap`).
 */
export class MathFault extends Error {
  constructor(readonly kind: MathError) {
    super(describeMathError(kind));
    this.name = "MathFault";
  }
}
