import * as Papa from 'papaparse';
import {readFile} from 'fs/promises';
import {RawTable, RawRow} from './raw-table.interface';
import {ReadTableFail} from './errors/ReadTableFail';
import {logger} from '../../utils/logger';


export interface CsvTableOptions {
  // Number of lines (e.g. a title block) that come before the header line.
  skipRows?: number;
}


function isBlankRecord(record: string[]): boolean {
  return record.every((cell) => cell.trim() === '');
}


export function parseCsvTable(text: string, options: CsvTableOptions = {}): RawTable {

  const skipRows = options.skipRows || 0;

  const result = Papa.parse<string[]>(text, {
    delimiter: ',',
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false
  });

  result.errors.forEach((err): void => {
    logger.warn(`CSV parsing issue at record ${err.row}: ${err.message}`);
  });

  const records = result.data.slice(skipRows);
  if (records.length === 0) {
    throw new ReadTableFail(`Expected a header line after skipping ${skipRows} lines, but there was nothing left.`);
  }

  const [headerRecord, ...dataRecords] = records;

  const rows: RawRow[] = [];
  dataRecords.forEach((record, idx): void => {
    if (isBlankRecord(record)) return;
    rows.push({
      // +1 for the header line, +1 to make it 1-based
      rowNumber: skipRows + idx + 2,
      cells: record
    });
  });

  return {
    headers: headerRecord.map((header) => header.trim()),
    rows
  };

}


export async function readCsvTable(filePath: string, options: CsvTableOptions = {}): Promise<RawTable> {

  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new ReadTableFail(`Failed to read table from ${filePath}`, err instanceof Error ? err.message : String(err));
  }

  logger.debug(`Parsing table from ${filePath}`);
  return parseCsvTable(text, options);

}
