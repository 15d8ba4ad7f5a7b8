export interface Observation {
  readonly rowNumber: number;
  readonly timestamp: Date;
  readonly lakeElevation: number; // ft
  readonly gateOpenings: readonly number[]; // ft, index-aligned with the gate log's gateIds
}
