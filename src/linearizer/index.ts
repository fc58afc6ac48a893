/**
 * Linearizer Module Exports
 */

export {
  ArcLinearizer,
  linearizeArc,
  linearizeCircle,
  type PositionInput,
} from "./ArcLinearizer";
export { angleInDirection, unwrapAngle, maxAngleIncrement } from "./AngleOps";
export { addPointsBetweenAngles, stepsForSpan } from "./ArcStepper";
