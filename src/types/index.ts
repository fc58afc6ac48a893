/**
 * Core type definitions for arc linearization
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 2D Vector representation (immutable) */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/**
 * A point of arbitrary coordinate dimension (at least 2).
 *
 * Coordinates 0 and 1 are the planar x/y. Coordinates 2..n-1 are auxiliary
 * dimensions (elevation, measure, ...) carried alongside the planar geometry.
 */
export type Position = readonly [number, number, ...number[]];

// =============================================================================
// ARC TYPES
// =============================================================================

/** Circle fitted through the three points of an arc */
export interface Circle {
  readonly center: Vector2;
  readonly radius: number; // Always > 0
}

/** Rotational direction of the traversal p0 → p1 → p2 */
export type Winding = "counterclockwise" | "clockwise";

/**
 * One angular span walked by the stepper.
 *
 * Angles follow the winding convention of the arc (see angleInDirection).
 * The endpoint positions are only read for their auxiliary coordinates.
 */
export interface AngularSpan {
  readonly startAngle: number;
  readonly endAngle: number;
  readonly start: Position;
  readonly end: Position;
}
