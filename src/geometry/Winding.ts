/**
 * Winding - Rotational direction of a three-point traversal.
 */

import { Position } from "@/math/Position";
import { Vec2 } from "@/math/Vec2";
import type { Winding } from "@/types";

/**
 * Check whether the traversal p0 → p1 → p2 turns counter-clockwise.
 *
 * Sign of the 2D cross product of the two legs (y axis pointing up):
 *   (p1 - p0) × (p2 - p1) > 0  →  counter-clockwise
 *
 * A zero cross product (p2 back on p0, the full-circle form) is reported as
 * clockwise.
 */
export function isCounterClockwise(p0: Position, p1: Position, p2: Position): boolean {
  const a = Position.planar(p0);
  const b = Position.planar(p1);
  const c = Position.planar(p2);
  return Vec2.cross(Vec2.subtract(b, a), Vec2.subtract(c, b)) > 0;
}

export function windingOf(p0: Position, p1: Position, p2: Position): Winding {
  return isCounterClockwise(p0, p1, p2) ? "counterclockwise" : "clockwise";
}
