export interface FlowRecord {
  timestamp: Date;
  totalFlow: number; // cfs
  rowNumbers: number[]; // source rows the value came from
}

export interface DuplicateTimestamp {
  timestamp: Date;
  rowNumbers: number[];
  flows: number[];
}

// How to resolve several observations logged at the same time.
// last: the row logged later in the sheet wins (later entries tend to be corrections).
// first: the row logged first wins.
// mean: the flows are averaged.
export type DuplicatePolicy = 'last' | 'first' | 'mean';

export const duplicatePolicies: DuplicatePolicy[] = ['last', 'first', 'mean'];

export interface FlowSeries {
  records: FlowRecord[]; // strictly increasing in time
  duplicates: DuplicateTimestamp[];
  policy: DuplicatePolicy;
}
