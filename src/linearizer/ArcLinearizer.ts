/**
 * ArcLinearizer - Polyline approximation of a three-point circular arc.
 *
 * The circle and winding are fixed at construction. Each linearization call
 * builds a fresh PositionSequence in two spans:
 *   arc:    p0 → p1 → p2
 *   circle: p0 → p1 → p0 (one full turn)
 *
 * The input positions are inserted verbatim at span boundaries, so they
 * appear in the output exactly, never recomputed from the circle equation.
 */

import { createLinearizerOptions, type LinearizerOptions } from "@/config/linearizerConfig";
import { InvalidInputError } from "@/errors";
import { fitCircle } from "@/geometry/CircleFit";
import { PositionSequence, PositionSequenceBuilder } from "@/geometry/PositionSequence";
import { isCounterClockwise } from "@/geometry/Winding";
import { Position } from "@/math/Position";
import type { Circle, Vector2, Winding } from "@/types";
import { angleInDirection, maxAngleIncrement, unwrapAngle } from "./AngleOps";
import { addPointsBetweenAngles } from "./ArcStepper";

/** Anything a caller may hand in for a position; validated on construction */
export type PositionInput = ReadonlyArray<number> | null | undefined;

export class ArcLinearizer {
  readonly p0: Position;
  readonly p1: Position;
  readonly p2: Position;
  /** Maximum chord-to-arc deviation, always non-negative */
  readonly tolerance: number;
  readonly circle: Circle;
  readonly isCounterClockwise: boolean;
  private readonly options: LinearizerOptions;

  /**
   * @throws InvalidInputError if a position is missing, malformed, or the dimensions differ
   * @throws DegenerateArcError if the positions are collinear or coincident
   */
  constructor(
    p0: PositionInput,
    p1: PositionInput,
    p2: PositionInput,
    tolerance: number,
    options: Partial<LinearizerOptions> = {}
  ) {
    this.p0 = Position.from(p0, "p0");
    this.p1 = Position.from(p1, "p1");
    this.p2 = Position.from(p2, "p2");

    const dims = [this.p0, this.p1, this.p2].map(Position.dimension);
    if (dims.some((d) => d !== dims[0])) {
      throw new InvalidInputError(`Positions must share one coordinate dimension, got ${dims.join(", ")}`);
    }

    this.options = createLinearizerOptions(options);
    this.tolerance = Math.abs(tolerance);
    this.circle = fitCircle(this.p0, this.p1, this.p2);
    this.isCounterClockwise = isCounterClockwise(this.p0, this.p1, this.p2);

    if (this.options.debug) {
      console.log("[ArcLinearizer] center:", this.circle.center.x, this.circle.center.y);
      console.log("[ArcLinearizer] radius:", this.circle.radius);
      console.log("[ArcLinearizer] winding:", this.winding);
    }

    Object.freeze(this);
  }

  get radius(): number {
    return this.circle.radius;
  }

  get center(): Vector2 {
    return this.circle.center;
  }

  get winding(): Winding {
    return this.isCounterClockwise ? "counterclockwise" : "clockwise";
  }

  getCircle(): Circle {
    return this.circle;
  }

  getRadius(): number {
    return this.circle.radius;
  }

  /**
   * Linearize the open arc from p0 through p1 to p2.
   *
   * @throws ToleranceOutOfRangeError if the tolerance is not in (0, radius)
   * @throws StepLimitExceededError if a span needs more than maxStepsPerSpan steps
   */
  linearizeArc(): PositionSequence {
    const theta0 = this.angleOf(this.p0);
    const theta1 = unwrapAngle(theta0, this.angleOf(this.p1), this.winding);
    const theta2 = unwrapAngle(theta1, this.angleOf(this.p2), this.winding);
    return this.linearizeSpans(theta0, theta1, theta2, this.p2);
  }

  /**
   * Linearize the full circle that starts at p0 and passes through p1.
   *
   * p2 only contributed to the circle fit. The result starts and ends on p0.
   *
   * @throws ToleranceOutOfRangeError if the tolerance is not in (0, radius)
   * @throws StepLimitExceededError if a span needs more than maxStepsPerSpan steps
   */
  linearizeCircle(): PositionSequence {
    const theta0 = this.angleOf(this.p0);
    const theta1 = unwrapAngle(theta0, this.angleOf(this.p1), this.winding);
    const closing = theta0 + (this.isCounterClockwise ? 2 * Math.PI : -2 * Math.PI);
    return this.linearizeSpans(theta0, theta1, closing, this.p0);
  }

  private linearizeSpans(theta0: number, theta1: number, theta2: number, last: Position): PositionSequence {
    const maxIncrement = maxAngleIncrement(this.circle.radius, this.tolerance);
    const { maxStepsPerSpan } = this.options;

    const builder = new PositionSequenceBuilder(Position.dimension(this.p0));
    builder.add(this.p0);
    const firstSteps = addPointsBetweenAngles(
      { startAngle: theta0, endAngle: theta1, start: this.p0, end: this.p1 },
      this.circle,
      maxIncrement,
      builder,
      maxStepsPerSpan
    );
    builder.add(this.p1);
    const secondSteps = addPointsBetweenAngles(
      { startAngle: theta1, endAngle: theta2, start: this.p1, end: last },
      this.circle,
      maxIncrement,
      builder,
      maxStepsPerSpan
    );
    builder.add(last);

    if (this.options.debug) {
      console.log("[ArcLinearizer] max angle increment:", maxIncrement);
      console.log("[ArcLinearizer] steps:", firstSteps, secondSteps);
      console.log("[ArcLinearizer] positions:", builder.size);
    }

    return builder.toPositionSequence();
  }

  private angleOf(position: Position): number {
    return angleInDirection(position, this.circle, this.winding);
  }
}

/**
 * Linearize the arc p0 → p1 → p2 in one call.
 */
export function linearizeArc(
  p0: PositionInput,
  p1: PositionInput,
  p2: PositionInput,
  tolerance: number,
  options: Partial<LinearizerOptions> = {}
): PositionSequence {
  return new ArcLinearizer(p0, p1, p2, tolerance, options).linearizeArc();
}

/**
 * Linearize the full circle through p0 and p1 (fitted with p2) in one call.
 */
export function linearizeCircle(
  p0: PositionInput,
  p1: PositionInput,
  p2: PositionInput,
  tolerance: number,
  options: Partial<LinearizerOptions> = {}
): PositionSequence {
  return new ArcLinearizer(p0, p1, p2, tolerance, options).linearizeCircle();
}
