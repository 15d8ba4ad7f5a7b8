import {TimeseriesPayload} from './timeseries-payload.interface';

// Where the finished series ends up. Any previous values stored under the same pathname are replaced.
export interface TimeseriesSink {
  replaceTimeseries(payload: TimeseriesPayload): Promise<void>;
}
