/**
 * Public entry point.
 */

export * from "./linearizer";
export * from "./errors";
export { fitCircle } from "./geometry/CircleFit";
export { isCounterClockwise, windingOf } from "./geometry/Winding";
export { PositionSequence, PositionSequenceBuilder } from "./geometry/PositionSequence";
export { Position } from "./math/Position";
export { Vec2 } from "./math/Vec2";
export {
  DEFAULT_LINEARIZER_OPTIONS,
  createLinearizerOptions,
  type LinearizerOptions,
} from "./config/linearizerConfig";
export type { AngularSpan, Circle, Vector2, Winding } from "./types";
