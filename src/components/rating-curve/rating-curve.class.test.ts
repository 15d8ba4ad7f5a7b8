import {RatingCurve} from './rating-curve.class';
import {EmptyRatingCurve} from './errors/EmptyRatingCurve';
import {InvalidReservoirConfig} from '../reservoir/errors/InvalidReservoirConfig';
import {logger} from '../../utils/logger';


function buildCurve(entries: {d: unknown; C: unknown}[]): RatingCurve {
  return new RatingCurve({
    name: 'Lawtonka',
    entries,
    spillwayInvertElevation: 1335.55,
    gateLength: 20
  });
}


describe('Testing of RatingCurve class', () => {

  const curve = buildCurve([
    {d: 0.25, C: 0.6},
    {d: 0.5, C: 0.62},
    {d: 0.75, C: 0.63},
    {d: 1, C: 0.64}
  ]);

  test('Returns the coefficient of an exact match, with no fallback', () => {
    expect(curve.lookup(0.5)).toEqual({requested: 0.5, d: 0.5, coefficient: 0.62, exact: true});
  });

  test('Lookup is idempotent', () => {
    expect(curve.lookup(0.58)).toEqual(curve.lookup(0.58));
    expect(curve.lookup(0.5).coefficient).toBe(curve.lookup(0.5).coefficient);
  });

  test('Falls back to the nearest d', () => {
    expect(curve.lookup(0.58)).toEqual({requested: 0.58, d: 0.5, coefficient: 0.62, exact: false});
    expect(curve.lookup(3)).toEqual({requested: 3, d: 1, coefficient: 0.64, exact: false});
  });

  test('Only logs a notice when the fallback is used', () => {
    const infoSpy = jest.spyOn(logger, 'info');
    curve.lookup(0.75);
    expect(infoSpy).not.toHaveBeenCalled();
    curve.lookup(0.7);
    expect(infoSpy).toHaveBeenCalledWith('Gate opening 0.7 ft not found in the Lawtonka rating curve. Using closest d value: 0.75 ft.');
    infoSpy.mockRestore();
  });

  test('A tie goes to the entry listed first', () => {
    const tied = buildCurve([
      {d: 1.5, C: 0.65},
      {d: 0.5, C: 0.62}
    ]);
    expect(tied.lookup(1).coefficient).toBe(0.65);
  });

  test('Table order is respected for unsorted curves', () => {
    const unsorted = buildCurve([
      {d: 1, C: 0.64},
      {d: 0.25, C: 0.6}
    ]);
    expect(unsorted.lookup(0.3).d).toBe(0.25);
  });

  test('Rounds d on the way in', () => {
    const unrounded = buildCurve([{d: 0.4999, C: 0.62}]);
    expect(unrounded.lookup(0.5)).toEqual({requested: 0.5, d: 0.5, coefficient: 0.62, exact: true});
  });

  test('Skips entries without a numeric d or C', () => {
    const messy = buildCurve([
      {d: 'd', C: 'C'},
      {d: null, C: 0.7},
      {d: '0.5', C: '0.62'}
    ]);
    expect(messy.size).toBe(1);
    expect(messy.lookup(0.5).coefficient).toBe(0.62);
  });

  test('Throws an EmptyRatingCurve error when nothing is usable', () => {
    expect(() => {
      buildCurve([{d: undefined, C: 0.6}]);
    }).toThrowError(EmptyRatingCurve);
    expect(() => {
      buildCurve([]);
    }).toThrowError(EmptyRatingCurve);
  });

  test('Throws when a reservoir constant is missing', () => {
    expect(() => {
      new RatingCurve({name: 'Ellsworth', entries: [{d: 0.5, C: 0.62}], spillwayInvertElevation: NaN, gateLength: 20});
    }).toThrowError(InvalidReservoirConfig);
  });

});
