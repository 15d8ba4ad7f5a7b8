import {CellValue} from '../../utils/cell-values';

export interface RepairedRow {
  rowNumber: number;
  date: CellValue;
  time: CellValue;
  lakeElevation: CellValue;
  gates: CellValue[]; // index-aligned with RepairedGateLog.gateIds
}

export interface RepairedGateLog {
  gateIds: string[];
  rows: RepairedRow[];
}

export type RowDropReason =
  | 'year-divider'
  | 'incomplete'
  | 'unparseable-date'
  | 'unparseable-time'
  | 'unparseable-lake-elevation';

export interface DroppedRow {
  rowNumber: number;
  reason: RowDropReason;
}
