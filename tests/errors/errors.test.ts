import { describe, expect, it } from "vitest";
import {
  DegenerateArcError,
  InvalidInputError,
  LinearizationError,
  StepLimitExceededError,
  ToleranceOutOfRangeError,
} from "@/errors";

describe("LinearizationError", () => {
  it("should name each error after its class", () => {
    expect(new InvalidInputError("x").name).toBe("InvalidInputError");
    expect(new DegenerateArcError("x").name).toBe("DegenerateArcError");
    expect(new ToleranceOutOfRangeError(2, 1).name).toBe("ToleranceOutOfRangeError");
    expect(new StepLimitExceededError(10, 5).name).toBe("StepLimitExceededError");
  });

  it("should share one base class", () => {
    const errors = [
      new InvalidInputError("x"),
      new DegenerateArcError("x"),
      new ToleranceOutOfRangeError(2, 1),
      new StepLimitExceededError(10, 5),
    ];

    errors.forEach((err) => {
      expect(err).toBeInstanceOf(LinearizationError);
      expect(err).toBeInstanceOf(Error);
    });
    expect(errors.map((err) => err.code)).toEqual([
      "INVALID_INPUT",
      "DEGENERATE_ARC",
      "TOLERANCE_OUT_OF_RANGE",
      "STEP_LIMIT_EXCEEDED",
    ]);
  });

  it("should describe the step limit", () => {
    const err = new StepLimitExceededError(10, 5);

    expect(err.message).toBe("Span requires 10 steps, exceeding the limit of 5");
    expect(err.steps).toBe(10);
    expect(err.limit).toBe(5);
  });
});
