/**
 * Errors raised while building or running an arc linearization.
 *
 * All failures are deterministic: the same input always fails the same way,
 * and no partial sequence is ever returned alongside an error.
 */

export type LinearizationErrorCode =
  | "INVALID_INPUT"
  | "DEGENERATE_ARC"
  | "TOLERANCE_OUT_OF_RANGE"
  | "STEP_LIMIT_EXCEEDED";

/**
 * Base class for every error this library throws on purpose.
 */
export abstract class LinearizationError extends Error {
  abstract readonly code: LinearizationErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A required position is missing, malformed, or of the wrong dimension. */
export class InvalidInputError extends LinearizationError {
  readonly code = "INVALID_INPUT";
}

/** The three points are collinear or coincident; no finite circle fits them. */
export class DegenerateArcError extends LinearizationError {
  readonly code = "DEGENERATE_ARC";
}

/**
 * The tolerance is not in (0, radius), or is too small against the radius to
 * give a positive acos((r - t) / r).
 */
export class ToleranceOutOfRangeError extends LinearizationError {
  readonly code = "TOLERANCE_OUT_OF_RANGE";

  constructor(
    readonly tolerance: number,
    readonly radius: number
  ) {
    super(`Tolerance ${tolerance} is out of range (0, ${radius}) for arc radius ${radius}`);
  }
}

/** A span would need more steps than the configured maxStepsPerSpan. */
export class StepLimitExceededError extends LinearizationError {
  readonly code = "STEP_LIMIT_EXCEEDED";

  constructor(
    readonly steps: number,
    readonly limit: number
  ) {
    super(`Span requires ${steps} steps, exceeding the limit of ${limit}`);
  }
}
