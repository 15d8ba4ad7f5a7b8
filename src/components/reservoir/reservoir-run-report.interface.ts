import {DroppedRow} from '../gate-log/repaired-gate-log.interface';
import {RatingCurveMatch} from '../rating-curve/rating-curve.interface';
import {DuplicateTimestamp, DuplicatePolicy} from '../flow-series/flow-record.interface';

export interface ReservoirRunReport {
  reservoir: string;
  pathname: string;
  rowsRead: number;
  dropped: DroppedRow[];
  observations: number;
  fallbackMatches: RatingCurveMatch[];
  duplicates: DuplicateTimestamp[];
  duplicatePolicy: DuplicatePolicy;
  valuesWritten: number;
}

export interface ReservoirFailure {
  reservoir: string;
  error: Error;
}
