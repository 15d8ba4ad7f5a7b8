import * as check from 'check-types';
import {TimeseriesPayload, TimeseriesPoint, PathnameParts} from './timeseries-payload.interface';
import {FlowRecord} from '../flow-series/flow-record.interface';
import {UnorderedTimeseries} from './errors/UnorderedTimeseries';
import {InvalidPathname} from './errors/InvalidPathname';


export const flowUnit = 'cfs';


// The location, parameter and interval parts are required, the rest may be left blank.
export function buildPathname(parts: PathnameParts): string {
  const required = {b: parts.b, c: parts.c, e: parts.e};
  Object.entries(required).forEach(([key, part]): void => {
    if (!check.nonEmptyString(part) || part.trim() === '') {
      throw new InvalidPathname(`Pathname part ${key.toUpperCase()} must be a non-empty string.`);
    }
  });
  const ordered = [parts.a, parts.b, parts.c, parts.d, parts.e, parts.f].map((part) => (part || '').trim().toUpperCase());
  return `/${ordered.join('/')}/`;
}


export function flowSeriesToPayload(records: FlowRecord[], pathname: string): TimeseriesPayload {
  return {
    pathname,
    unit: flowUnit,
    type: 'INST',
    points: records.map((record): TimeseriesPoint => ({time: record.timestamp, value: record.totalFlow}))
  };
}


export function assertStrictlyOrdered(points: TimeseriesPoint[]): void {
  points.slice(1).forEach((point, idx): void => {
    const previous = points[idx];
    if (point.time.getTime() <= previous.time.getTime()) {
      throw new UnorderedTimeseries(`Point at ${point.time.toISOString()} does not come after the point at ${previous.time.toISOString()}.`);
    }
  });
}
