import {calculateGateFlow, calculateObservationFlow} from './flow.service';
import {RatingCurve} from '../rating-curve/rating-curve.class';
import {Observation} from '../observation/observation.interface';


const lawtonka = new RatingCurve({
  name: 'Lawtonka',
  spillwayInvertElevation: 1335.55,
  gateLength: 20,
  entries: [
    {d: 0.5, C: 0.62},
    {d: 1, C: 0.64}
  ]
});


describe('Testing of calculateGateFlow function', () => {

  test('Calculates the flow under a single gate', () => {
    expect(calculateGateFlow(0.5, 1337.00, lawtonka)).toBeCloseTo(54.4042, 4);
  });

  test('A closed gate gives no flow and needs no rating curve lookup', () => {
    const lookupSpy = jest.spyOn(lawtonka, 'lookup');
    expect(calculateGateFlow(0, 1337.00, lawtonka)).toBe(0);
    expect(calculateGateFlow(-0.5, 1337.00, lawtonka)).toBe(0);
    expect(lookupSpy).not.toHaveBeenCalled();
    lookupSpy.mockRestore();
  });

  test('Gives no flow when the gate opening is above the water', () => {
    // H1 = 0.45, H2 = -0.55
    expect(calculateGateFlow(1, 1336.00, lawtonka)).toBe(0);
  });

  test('Gives no flow when the lake is below the spillway invert', () => {
    expect(calculateGateFlow(0.5, 1330.00, lawtonka)).toBe(0);
  });

  test('Flow does not decrease as the lake rises', () => {
    const elevations = [1336.05, 1336.5, 1337, 1338, 1340, 1345];
    const flows = elevations.map((elevation) => calculateGateFlow(0.5, elevation, lawtonka));
    flows.slice(1).forEach((flow, idx) => {
      expect(flow).toBeGreaterThanOrEqual(flows[idx]);
    });
  });

});


describe('Testing of calculateObservationFlow function', () => {

  test('Sums the flow of each gate and rounds the total', () => {
    const observation: Observation = {
      rowNumber: 3,
      timestamp: new Date('2020-05-01T08:00:00.000Z'),
      lakeElevation: 1337.00,
      gateOpenings: [0.5, 0, 1]
    };
    const flow = calculateObservationFlow(observation, lawtonka);
    expect(flow.totalFlow).toBe(153.3);
    expect(flow.gateFlows[1]).toBe(0);
    expect(flow.fallbackMatches).toEqual([]);
  });

  test('Reports any gates that needed a fallback coefficient', () => {
    const observation: Observation = {
      rowNumber: 4,
      timestamp: new Date('2020-05-01T09:00:00.000Z'),
      lakeElevation: 1337.00,
      gateOpenings: [0.58]
    };
    const flow = calculateObservationFlow(observation, lawtonka);
    expect(flow.fallbackMatches).toEqual([{requested: 0.58, d: 0.5, coefficient: 0.62, exact: false}]);
  });

  test('An observation with every gate closed has zero flow', () => {
    const observation: Observation = {
      rowNumber: 5,
      timestamp: new Date('2020-05-01T10:00:00.000Z'),
      lakeElevation: 1340.00,
      gateOpenings: [0, 0]
    };
    expect(calculateObservationFlow(observation, lawtonka)).toEqual({totalFlow: 0, gateFlows: [0, 0], fallbackMatches: []});
  });

});
