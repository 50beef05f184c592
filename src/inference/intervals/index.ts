export type { ConfidenceInterval, UpliftEstimate, UpliftIntervals } from './DeltaMethod';
export {
  ZERO_CONTROL_TOLERANCE,
  absoluteDifference,
  relativeUplift,
  upliftEstimate,
  absoluteDifferenceInterval,
  relativeUpliftStandardError,
  relativeUpliftInterval,
  upliftIntervals,
} from './DeltaMethod';
