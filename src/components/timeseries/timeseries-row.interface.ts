export interface TimeseriesRow {
  id: number;
  pathname: string;
  unit: string;
  type: string;
  first_obs: string | Date | null;
  last_obs: string | Date | null;
}

export interface TimeseriesValueRow {
  timeseries: number;
  time: string | Date; // ISO string on the way in, pg hands back a Date
  value: number;
}
