//-------------------------------------------------
// Flow under a gate
//-------------------------------------------------
// Q = 2/3 * sqrt(2g) * C * L * (H1^(3/2) - H2^(3/2))    [USBR 'Design of Small Dams', p. 386]
//
// Q  = flow (cfs)
// g  = acceleration due to gravity (ft/s^2)
// C  = coefficient of discharge, from the reservoir's rating curve
// L  = length of the gate opening (ft)
// H1 = lake elevation - spillway invert elevation (ft)
// H2 = H1 - d, where d is the gate opening (ft)
//-------------------------------------------------
import {round, sum} from 'lodash';
import {RatingCurve} from '../rating-curve/rating-curve.class';
import {RatingCurveMatch} from '../rating-curve/rating-curve.interface';
import {Observation} from '../observation/observation.interface';
import {ObservationFlow} from './observation-flow.interface';


export const gravity = 32.2; // ft/s^2


// A negative head has no real 3/2 power, it contributes nothing.
function headToThreeHalves(head: number): number {
  return head > 0 ? Math.pow(head, 1.5) : 0;
}


function gateFlow(gateOpening: number, lakeElevation: number, ratingCurve: RatingCurve): {flow: number; match?: RatingCurveMatch} {

  // Closed gates don't need a coefficient
  if (gateOpening <= 0) {
    return {flow: 0};
  }

  const h1 = lakeElevation - ratingCurve.spillwayInvertElevation;
  const h2 = h1 - gateOpening;

  // i.e. the bottom of the gate opening is above the water
  if (h2 < 0) {
    return {flow: 0};
  }

  const match = ratingCurve.lookup(gateOpening);
  const flow = (2 / 3) * Math.sqrt(2 * gravity) * match.coefficient * ratingCurve.gateLength * (headToThreeHalves(h1) - headToThreeHalves(h2));

  return {flow, match};

}


export function calculateGateFlow(gateOpening: number, lakeElevation: number, ratingCurve: RatingCurve): number {
  return gateFlow(gateOpening, lakeElevation, ratingCurve).flow;
}


export function calculateObservationFlow(observation: Observation, ratingCurve: RatingCurve): ObservationFlow {

  const gateFlows: number[] = [];
  const fallbackMatches: RatingCurveMatch[] = [];

  observation.gateOpenings.forEach((gateOpening): void => {
    const {flow, match} = gateFlow(gateOpening, observation.lakeElevation, ratingCurve);
    gateFlows.push(flow);
    if (match && !match.exact) {
      fallbackMatches.push(match);
    }
  });

  return {
    totalFlow: round(sum(gateFlows), 2),
    gateFlows,
    fallbackMatches
  };

}
