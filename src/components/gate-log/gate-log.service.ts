import {RawTable} from '../table/raw-table.interface';
import {GateLogLayout} from './gate-log-layout.interface';
import {RepairedGateLog, RepairedRow, DroppedRow} from './repaired-gate-log.interface';
import {InvalidGateLogTable} from './errors/InvalidGateLogTable';
import {CellValue, cellToString, isMissing} from '../../utils/cell-values';
import {logger} from '../../utils/logger';


const yearOnlyRegex = /^\d{4}$/;


//-------------------------------------------------
// Headers
//-------------------------------------------------
// The gate columns come with a two-level header: a group label (e.g. 'Gates') over the whole block, with the individual gate numbers sitting in the first data row. This swaps the group labels for those gate numbers.
export function spliceGateHeaders(headers: string[], subHeaders: CellValue[], gateColumns: GateLogLayout['gateColumns']): string[] {

  const {start, end} = gateColumns;

  if (start < 0 || end <= start || end > headers.length) {
    throw new InvalidGateLogTable(`Gate columns ${start}-${end} fall outside the ${headers.length} columns of the gate log.`);
  }

  const gateIds = subHeaders.slice(start, end).map((value, idx): string => {
    const id = cellToString(value);
    if (id === undefined) {
      throw new InvalidGateLogTable(`The gate identifier for column ${start + idx} is blank.`);
    }
    return id;
  });

  return [...headers.slice(0, start), ...gateIds, ...headers.slice(end)];

}


function findColumn(headers: string[], label: string): number {
  const idx = headers.indexOf(label);
  if (idx === -1) {
    throw new InvalidGateLogTable(`Gate log is missing a '${label}' column.`);
  }
  return idx;
}


//-------------------------------------------------
// Repair
//-------------------------------------------------
export function repairGateLogTable(table: RawTable, layout: GateLogLayout): {gateLog: RepairedGateLog; dropped: DroppedRow[]} {

  if (table.rows.length === 0) {
    throw new InvalidGateLogTable('Gate log has no rows, not even the gate identifier row.');
  }

  const {start, end} = layout.gateColumns;
  const [headerSource, ...dataRows] = table.rows;

  let headers = spliceGateHeaders(table.headers, headerSource.cells, layout.gateColumns);
  if (layout.dropTrailingColumn) {
    if (end === headers.length) {
      throw new InvalidGateLogTable('Can not drop the trailing column as it is part of the gate block.');
    }
    headers = headers.slice(0, -1);
  }
  const gateIds = headers.slice(start, end);

  const dateIdx = findColumn(headers, layout.dateColumn);
  const timeIdx = findColumn(headers, layout.timeColumn);
  const lakeElevationIdx = findColumn(headers, layout.lakeElevationColumn);

  const rows: RepairedRow[] = [];
  const dropped: DroppedRow[] = [];
  let lastDate: CellValue;

  dataRows.forEach((row): void => {

    const dateStr = cellToString(row.cells[dateIdx]);

    // Rows with just a year in the date column are section dividers
    if (dateStr !== undefined && yearOnlyRegex.test(dateStr)) {
      dropped.push({rowNumber: row.rowNumber, reason: 'year-divider'});
      return;
    }

    // Operators tend to write the date once and then log several readings beneath it.
    let date = row.cells[dateIdx];
    if (isMissing(date)) {
      date = lastDate;
    } else {
      lastDate = date;
    }

    const time = row.cells[timeIdx];
    const lakeElevation = row.cells[lakeElevationIdx];
    if (isMissing(time) || isMissing(lakeElevation)) {
      dropped.push({rowNumber: row.rowNumber, reason: 'incomplete'});
      return;
    }

    rows.push({
      rowNumber: row.rowNumber,
      date,
      time,
      lakeElevation,
      gates: row.cells.slice(start, end)
    });

  });

  logger.debug({kept: rows.length, dropped: dropped.length, gateIds}, 'Gate log repaired');

  return {
    gateLog: {gateIds, rows},
    dropped
  };

}
