/**
 * CircleFit - Circle through three positions.
 *
 * Only the planar coordinates take part; auxiliary coordinates are ignored.
 */

import { DegenerateArcError } from "@/errors";
import { Position } from "@/math/Position";
import { Vec2 } from "@/math/Vec2";
import type { Circle, Vector2 } from "@/types";

/**
 * Fit the circle passing through p0, p1 and p2.
 *
 * Uses the circumcenter formula with p0 as origin (keeps magnitudes small for
 * points far from the coordinate origin):
 *   b = p1 - p0, c = p2 - p0, d = 2 (b × c)
 *   center = p0 + ((|b|² c.y - |c|² b.y) / d, (|c|² b.x - |b|² c.x) / d)
 *
 * When p0 and p2 coincide the input describes a full circle; p0-p1 is then
 * taken as a diameter.
 *
 * @throws DegenerateArcError if the points are collinear or coincident
 */
export function fitCircle(p0: Position, p1: Position, p2: Position): Circle {
  const a = Position.planar(p0);
  const b = Vec2.subtract(Position.planar(p1), a);
  const c = Vec2.subtract(Position.planar(p2), a);

  if (Position.planarEquals(p0, p2)) {
    return fromDiameter(Position.planar(p0), Position.planar(p1));
  }

  const d = 2 * Vec2.cross(b, c);
  if (d === 0) {
    throw new DegenerateArcError(
      `Positions (${a.x}, ${a.y}), (${p1[0]}, ${p1[1]}), (${p2[0]}, ${p2[1]}) are collinear or coincident`
    );
  }

  const bSq = Vec2.lengthSquared(b);
  const cSq = Vec2.lengthSquared(c);
  const offset = Vec2.create((bSq * c.y - cSq * b.y) / d, (cSq * b.x - bSq * c.x) / d);

  return checked({ center: Vec2.add(a, offset), radius: Vec2.length(offset) });
}

function fromDiameter(a: Vector2, b: Vector2): Circle {
  if (a.x === b.x && a.y === b.y) {
    throw new DegenerateArcError(`All three positions coincide at (${a.x}, ${a.y})`);
  }
  return checked({ center: Vec2.midpoint(a, b), radius: Vec2.distance(a, b) / 2 });
}

function checked(circle: Circle): Circle {
  const { center, radius } = circle;
  if (!Number.isFinite(radius) || radius <= 0 || !Number.isFinite(center.x) || !Number.isFinite(center.y)) {
    throw new DegenerateArcError(`No finite circle fits the positions (radius ${radius})`);
  }
  return Object.freeze({ center: Object.freeze({ ...center }), radius });
}
