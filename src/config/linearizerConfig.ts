import { InvalidInputError } from "@/errors";

/**
 * Options shared by every linearization an ArcLinearizer performs
 */
export interface LinearizerOptions {
  /** Log circle fit and per-span step counts to the console */
  readonly debug: boolean;
  /**
   * Upper bound on the steps of a single span.
   * Tiny tolerances on huge radii can otherwise produce very long sequences.
   */
  readonly maxStepsPerSpan: number;
}

/**
 * Default linearizer options
 */
export const DEFAULT_LINEARIZER_OPTIONS: LinearizerOptions = {
  debug: false,
  maxStepsPerSpan: Number.POSITIVE_INFINITY,
};

/**
 * Merge caller overrides onto the defaults.
 *
 * @throws InvalidInputError if maxStepsPerSpan is not a positive integer or Infinity
 */
export function createLinearizerOptions(options: Partial<LinearizerOptions> = {}): LinearizerOptions {
  const opts = { ...DEFAULT_LINEARIZER_OPTIONS, ...options };

  const limit = opts.maxStepsPerSpan;
  if (!(limit === Number.POSITIVE_INFINITY || (Number.isInteger(limit) && limit > 0))) {
    throw new InvalidInputError(`maxStepsPerSpan must be a positive integer or Infinity, got ${limit}`);
  }

  return Object.freeze(opts);
}
