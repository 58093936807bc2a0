export { Temporal, timeTransform, type TimeRestriction } from "./Temporal";
export { TInstant } from "./TInstant";
export { TSequence, defaultInterpolation } from "./TSequence";
export { TSequenceSet } from "./TSequenceSet";
export { integral, length, timeWeightedAverage } from "./aggregates";
export * from "./guards";
export {
  abs,
  add,
  atSpan,
  atSpanSet,
  deltaValue,
  distance,
  divide,
  minusSpan,
  minusSpanSet,
  multiply,
  nearestApproachDistance,
  scaleValue,
  shiftScaleValue,
  shiftValue,
  subtract,
  type ArithmeticOperator,
  type NumberSpanSet,
} from "./number";
export { cumulativeLength, getX, getY, getZ, speed } from "./point";
