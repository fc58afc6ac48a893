/**
 * ArcStepper - Interior points of one angular span.
 *
 * The span [startAngle, endAngle] is cut into `steps` equal parts, each no
 * wider than the maximum increment. Points are produced by integer index,
 * a = startAngle + sign * i * increment, so the count is exactly steps - 1
 * and never depends on floating-point comparisons against the end angle.
 */

import type { PositionSequenceBuilder } from "@/geometry/PositionSequence";
import { InvalidInputError, StepLimitExceededError } from "@/errors";
import type { AngularSpan, Circle } from "@/types";

/**
 * Number of equal steps needed so no step exceeds maxIncrement.
 */
export function stepsForSpan(startAngle: number, endAngle: number, maxIncrement: number): number {
  return Math.ceil(Math.abs(endAngle - startAngle) / maxIncrement);
}

/**
 * Append the points strictly between the span endpoints to the builder.
 *
 * Auxiliary coordinates (index >= 2) are interpolated linearly in step index
 * from span.start to span.end. The endpoints themselves are not appended.
 *
 * @param span - Angles and endpoint positions; startAngle must differ from endAngle
 * @param circle - Circle the planar coordinates lie on
 * @param maxIncrement - Largest allowed angle between consecutive points
 * @param builder - Destination, in traversal order
 * @param maxSteps - Fails the span rather than exceed this many steps
 * @returns The number of steps the span was divided into
 * @throws InvalidInputError if maxIncrement cannot give a finite step count
 */
export function addPointsBetweenAngles(
  span: AngularSpan,
  circle: Circle,
  maxIncrement: number,
  builder: PositionSequenceBuilder,
  maxSteps: number = Number.POSITIVE_INFINITY
): number {
  const { startAngle, endAngle, start, end } = span;
  const steps = stepsForSpan(startAngle, endAngle, maxIncrement);
  if (!Number.isFinite(steps)) {
    throw new InvalidInputError(
      `Span from ${startAngle} to ${endAngle} cannot be divided with a max increment of ${maxIncrement}`
    );
  }
  if (steps > maxSteps) {
    throw new StepLimitExceededError(steps, maxSteps);
  }

  const increment = Math.abs(endAngle - startAngle) / steps;
  const sign = startAngle < endAngle ? 1 : -1;

  // Per-step deltas for the auxiliary dimensions
  const dim = start.length;
  const auxStart = start.slice(2);
  const auxDelta = auxStart.map((value, k) => ((end[2 + k] ?? value) - value) / steps);

  const buf = new Array<number>(dim).fill(0);

  for (let i = 1; i < steps; i++) {
    const a = startAngle + sign * i * increment;
    buf[0] = circle.center.x + circle.radius * Math.cos(a);
    buf[1] = circle.center.y + circle.radius * Math.sin(a);
    for (let k = 0; k < auxStart.length; k++) {
      buf[2 + k] = (auxStart[k] ?? 0) + i * (auxDelta[k] ?? 0);
    }
    builder.addCoordinates(buf);
  }

  return steps;
}
