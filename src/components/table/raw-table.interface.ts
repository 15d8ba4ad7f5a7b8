import {CellValue} from '../../utils/cell-values';

export interface RawRow {
  // 1-based line number in the source, so the header line is row 1 and the first data row is row 2.
  rowNumber: number;
  cells: CellValue[];
}

// Cells are positional rather than keyed by header, because group labels are often repeated across several columns.
export interface RawTable {
  headers: string[];
  rows: RawRow[];
}
