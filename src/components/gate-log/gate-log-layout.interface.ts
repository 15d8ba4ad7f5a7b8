export interface GateLogLayout {
  dateColumn: string;
  timeColumn: string;
  lakeElevationColumn: string;
  // Positional range of the gate block in the raw headers, end exclusive.
  gateColumns: {start: number; end: number};
  dropTrailingColumn: boolean;
}
