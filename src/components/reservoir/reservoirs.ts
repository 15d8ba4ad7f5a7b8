import {ReservoirConfig} from './reservoir-config.interface';


const gateLogColumns = {
  dateColumn: 'Date',
  timeColumn: 'Time',
  lakeElevationColumn: 'Lake Elevation',
  dropTrailingColumn: true,
  skipRows: 1
};


export const lawtonka: ReservoirConfig = {
  name: 'Lawtonka',
  spillwayInvertElevation: 1335.55,
  gateLength: 20.0,
  gateLog: {
    ...gateLogColumns,
    gateColumns: {start: 4, end: 12}
  },
  ratingCurve: {
    skipRows: 12
  },
  pathname: {b: 'LAWTONKA', c: 'RES FLOW-OUT', e: 'IR-CENTURY', f: 'Obs Gate Ops'}
};


export const ellsworth: ReservoirConfig = {
  name: 'Ellsworth',
  spillwayInvertElevation: 1225.00,
  gateLength: 20.0,
  gateLog: {
    ...gateLogColumns,
    gateColumns: {start: 4, end: 19}
  },
  ratingCurve: {
    skipRows: 12
  },
  pathname: {b: 'ELLSWORTH', c: 'RES FLOW-OUT', e: 'IR-CENTURY', f: 'Obs Gate Ops'}
};


export const reservoirs = [lawtonka, ellsworth];
