/**
 * Either Data Type
 *
 * Either represents a value of one of two possible types (a disjoint union).
 * An Either<E, A> is either Left<E> (representing failure/error) or Right<A>
 * (representing success).
 * By convention, Right is the "right" (correct/success) case.
 */

// ============================================================================
// Either Type Definition
// ============================================================================

/**
 * Either data type - either Left (error) or Right (success)
 */
export type Either<E, A> = Left<E> | Right<A>;

/**
 * Left variant - represents failure/error
 */
export interface Left<E> {
  readonly _tag: "Left";
  readonly left: E;
}

/**
 * Right variant - represents success
 */
export interface Right<A> {
  readonly _tag: "Right";
  readonly right: A;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Left value
 */
export function Left<E, A = never>(left: E): Either<E, A> {
  return { _tag: "Left", left };
}

/**
 * Create a Right value
 */
export function Right<E = never, A = unknown>(right: A): Either<E, A> {
  return { _tag: "Right", right };
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Either is Left
 */
export function isLeft<E, A>(either: Either<E, A>): either is Left<E> {
  return either._tag === "Left";
}

/**
 * Check if Either is Right
 */
export function isRight<E, A>(either: Either<E, A>): either is Right<A> {
  return either._tag === "Right";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Right value
 */
export function map<E, A, B>(either: Either<E, A>, f: (a: A) => B): Either<E, B> {
  return isRight(either) ? Right(f(either.right)) : either;
}

/**
 * FlatMap over the Right value
 */
export function flatMap<E, A, B>(
  either: Either<E, A>,
  f: (a: A) => Either<E, B>
): Either<E, B> {
  return isRight(either) ? f(either.right) : either;
}

/**
 * Get the Right value or throw with custom message
 */
export function getOrThrowWith<E, A>(either: Either<E, A>, toError: (e: E) => Error): A {
  if (isRight(either)) return either.right;
  throw toError(either.left);
}
