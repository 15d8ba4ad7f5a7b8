import {RatingCurveMatch} from '../rating-curve/rating-curve.interface';

export interface ObservationFlow {
  totalFlow: number; // cfs, 2 decimal places
  gateFlows: number[]; // cfs, unrounded, index-aligned with the observation's gate openings
  fallbackMatches: RatingCurveMatch[];
}
