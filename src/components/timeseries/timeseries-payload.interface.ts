export interface TimeseriesPoint {
  time: Date;
  value: number;
}

// INST = instantaneous values, as opposed to period averages.
export type TimeseriesType = 'INST' | 'PER-AVER';

export interface TimeseriesPayload {
  pathname: string;
  unit: string;
  type: TimeseriesType;
  points: TimeseriesPoint[];
}

// The six parts of a pathname, e.g. //LAWTONKA/RES FLOW-OUT//IR-CENTURY/OBS GATE OPS/
export interface PathnameParts {
  a?: string; // group
  b: string; // location
  c: string; // parameter
  d?: string; // block start date, left blank
  e: string; // interval
  f?: string; // version
}
