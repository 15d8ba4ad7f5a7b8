import {buildPathname, flowSeriesToPayload, assertStrictlyOrdered} from './timeseries.service';
import {UnorderedTimeseries} from './errors/UnorderedTimeseries';
import {InvalidPathname} from './errors/InvalidPathname';


describe('Testing of buildPathname function', () => {

  test('Builds a pathname with blank parts', () => {
    const pathname = buildPathname({b: 'Lawtonka', c: 'RES FLOW-OUT', e: 'IR-CENTURY', f: 'Obs Gate Ops'});
    expect(pathname).toBe('//LAWTONKA/RES FLOW-OUT//IR-CENTURY/OBS GATE OPS/');
  });

  test('Throws when a required part is blank', () => {
    expect(() => {
      buildPathname({b: 'Lawtonka', c: '  ', e: 'IR-CENTURY'});
    }).toThrowError(InvalidPathname);
  });

});


describe('Testing of flowSeriesToPayload function', () => {

  test('Tags the series as instantaneous flows in cfs', () => {
    const records = [
      {timestamp: new Date('2020-05-01T08:00:00.000Z'), totalFlow: 54.4, rowNumbers: [3]}
    ];
    expect(flowSeriesToPayload(records, '//LAWTONKA/RES FLOW-OUT//IR-CENTURY/OBS GATE OPS/')).toEqual({
      pathname: '//LAWTONKA/RES FLOW-OUT//IR-CENTURY/OBS GATE OPS/',
      unit: 'cfs',
      type: 'INST',
      points: [{time: new Date('2020-05-01T08:00:00.000Z'), value: 54.4}]
    });
  });

});


describe('Testing of assertStrictlyOrdered function', () => {

  test('Accepts increasing points', () => {
    expect(() => {
      assertStrictlyOrdered([
        {time: new Date('2020-05-01T08:00:00.000Z'), value: 1},
        {time: new Date('2020-05-01T09:00:00.000Z'), value: 2}
      ]);
    }).not.toThrow();
  });

  test('Rejects repeated times', () => {
    expect(() => {
      assertStrictlyOrdered([
        {time: new Date('2020-05-01T08:00:00.000Z'), value: 1},
        {time: new Date('2020-05-01T08:00:00.000Z'), value: 2}
      ]);
    }).toThrowError(UnorderedTimeseries);
  });

  test('Rejects points going back in time', () => {
    expect(() => {
      assertStrictlyOrdered([
        {time: new Date('2020-05-01T09:00:00.000Z'), value: 1},
        {time: new Date('2020-05-01T08:00:00.000Z'), value: 2}
      ]);
    }).toThrowError(UnorderedTimeseries);
  });

});
