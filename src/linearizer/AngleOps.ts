/**
 * AngleOps - Angular coordinates on a fitted circle.
 *
 * Angles are normalized per winding so a span can be walked monotonically:
 * - counterclockwise: [0, 2π), angles increase along the arc
 * - clockwise:        (-2π, 0], angles decrease along the arc
 */

import { ToleranceOutOfRangeError } from "@/errors";
import type { Circle, Position, Winding } from "@/types";

const TWO_PI = 2 * Math.PI;

/**
 * Angle of a position around the circle center, normalized for the winding.
 *
 * Undefined for a position on the center itself, which cannot occur for
 * points that lie on a non-degenerate fitted circle.
 */
export function angleInDirection(position: Position, circle: Circle, winding: Winding): number {
  const theta = Math.atan2(position[1] - circle.center.y, position[0] - circle.center.x);
  if (winding === "counterclockwise") {
    return theta >= 0 ? theta : TWO_PI + theta;
  }
  return theta <= 0 ? theta : theta - TWO_PI;
}

/**
 * Shift `end` by whole turns so it lies strictly after `start` in the
 * winding direction, and no more than one turn away.
 *
 * Arcs that cross the zero angle (e.g. 300° → 10° counterclockwise) become
 * 300° → 370°. Equal angles become a full turn.
 */
export function unwrapAngle(start: number, end: number, winding: Winding): number {
  let unwrapped = end;
  if (winding === "counterclockwise") {
    while (unwrapped - start > TWO_PI) unwrapped -= TWO_PI;
    while (unwrapped <= start) unwrapped += TWO_PI;
  } else {
    while (start - unwrapped > TWO_PI) unwrapped += TWO_PI;
    while (unwrapped >= start) unwrapped -= TWO_PI;
  }
  return unwrapped;
}

/**
 * Largest angular step whose segment stays within `tolerance` of the arc.
 *
 * radius = radius * cos(increment) + error, with error <= tolerance, gives
 *   increment = acos((r - t) / r)
 *
 * A tolerance below the floating-point resolution of the radius makes
 * (r - t) / r round to 1 and the increment to 0; it is rejected as well.
 *
 * @throws ToleranceOutOfRangeError unless 0 < tolerance < radius and the increment is positive
 */
export function maxAngleIncrement(radius: number, tolerance: number): number {
  if (!(tolerance > 0 && tolerance < radius)) {
    throw new ToleranceOutOfRangeError(tolerance, radius);
  }
  const increment = Math.acos((radius - tolerance) / radius);
  if (!(increment > 0 && Number.isFinite(increment))) {
    throw new ToleranceOutOfRangeError(tolerance, radius);
  }
  return increment;
}
