import { InvalidInputError } from "@/errors";
import type { Position as PositionType, Vector2 } from "@/types";

export type Position = PositionType;

/**
 * Position - Pure utility functions for n-dimensional positions
 *
 * Positions are frozen tuples. Functions here never mutate their arguments.
 */
export const Position = {
  /**
   * Create a frozen position from planar coordinates and optional auxiliary ones
   */
  create(x: number, y: number, ...auxiliary: number[]): Position {
    const coordinates: Position = [x, y, ...auxiliary];
    return Object.freeze(coordinates);
  },

  /**
   * Validate an untrusted value and return it as a frozen position.
   *
   * Already frozen positions are returned as-is so callers keep identity.
   *
   * @param value - Anything a caller might pass in place of a position
   * @param label - Name used in the error message (e.g. "p0")
   */
  from(value: ReadonlyArray<number> | null | undefined, label: string): Position {
    if (value === null || value === undefined) {
      throw new InvalidInputError(`Position ${label} is missing`);
    }
    const [x, y, ...auxiliary] = value;
    if (x === undefined || y === undefined) {
      throw new InvalidInputError(
        `Position ${label} needs at least 2 coordinates, got ${value.length}`
      );
    }
    const index = value.findIndex((c) => !Number.isFinite(c));
    if (index !== -1) {
      throw new InvalidInputError(
        `Position ${label} has a non-finite coordinate at index ${index}`
      );
    }
    if (Object.isFrozen(value) && isPosition(value)) {
      return value;
    }
    return Position.create(x, y, ...auxiliary);
  },

  /**
   * Number of coordinates (2 for planar, 3 for XYZ or XYM, 4 for XYZM)
   */
  dimension(p: Position): number {
    return p.length;
  },

  /**
   * Planar x/y part of a position
   */
  planar(p: Position): Vector2 {
    return { x: p[0], y: p[1] };
  },

  /**
   * Exact, coordinate-wise equality. Positions of different dimension are never equal.
   */
  equals(a: Position, b: Position): boolean {
    if (a.length !== b.length) return false;
    return a.every((c, i) => c === b[i]);
  },

  /**
   * Exact planar equality, ignoring auxiliary coordinates
   */
  planarEquals(a: Position, b: Position): boolean {
    return a[0] === b[0] && a[1] === b[1];
  },
};

function isPosition(value: ReadonlyArray<number>): value is Position {
  return value.length >= 2;
}
