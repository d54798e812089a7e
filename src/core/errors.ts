/**
 * Error taxonomy
 *
 * Core operations are pure and never retry; errors propagate straight to
 * the caller.
 *
 * Missing optional collaborators (groundtruth) are a normal branch and have
 * no error class.
 */

export type TrajectoryErrorKind = "invalid-input" | "ordering" | "numeric-degeneracy";

/**
 * Base class for all errors raised by the core.
 */
export abstract class TrajectoryError extends Error {
  abstract readonly kind: TrajectoryErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed vector/array shape or out-of-domain argument */
export class InvalidInputError extends TrajectoryError {
  readonly kind = "invalid-input" as const;
}

/** Non-increasing timestamp sequence */
export class OrderingError extends TrajectoryError {
  readonly kind = "ordering" as const;

  constructor(
    message: string,
    readonly index: number
  ) {
    super(message);
  }
}

/** Input where the math loses meaning (pole latitude, singular covariance) */
export class NumericDegeneracyError extends TrajectoryError {
  readonly kind = "numeric-degeneracy" as const;
}

export function isTrajectoryError(value: unknown): value is TrajectoryError {
  return value instanceof TrajectoryError;
}
