/**
 * Coordinate tuples
 *
 * Formulas take plain readonly tuples of a single numeric type `A`; the
 * domain dictionary passed alongside decides what `A` is.
 */

/** A point `[x, y]` */
export type Point2<A> = readonly [A, A];

/** A vector `[x, y]`; same shape as a point, different role */
export type Vector2<A> = readonly [A, A];

/** A point `[x, y, z]` */
export type Point3<A> = readonly [A, A, A];

/** A vector `[x, y, z]` */
export type Vector3<A> = readonly [A, A, A];

/**
 * A line `[a, b, c]` meaning `a·x + b·y + c = 0`.
 *
 * Non-degenerate only when `(a, b) ≠ (0, 0)`; nothing here enforces that.
 */
export type Line2<A> = readonly [A, A, A];

/**
 * One value per vertex or side of a triangle, indexed by vertex:
 * entry `i` belongs to (or is opposite) vertex `i + 1`.
 */
export type Triple<A> = readonly [A, A, A];

/** Spread between consecutive edges and whether the turn is counter-clockwise */
export type Turn<A> = readonly [spread: A, counterClockwise: boolean];
