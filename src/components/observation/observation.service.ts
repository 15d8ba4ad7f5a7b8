import {CellValue, isMissing, toFiniteNumber} from '../../utils/cell-values';
import {roundHalfEven} from '../../utils/round-half-even';
import {normalizeAndParseTime} from '../time-encoding/time-encoding.service';
import {TimeOfDay} from '../time-encoding/time-of-day.interface';
import {RepairedGateLog, DroppedRow} from '../gate-log/repaired-gate-log.interface';
import {Observation} from './observation.interface';
import {logger} from '../../utils/logger';


const isoDateRegex = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T].*)?$/;
const usDateRegex = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})(?:\s.*)?$/;

const inchesPerFoot = 12;


//-------------------------------------------------
// Dates
//-------------------------------------------------
// The log's timestamps have no timezone, so they're held as UTC to stop the host's timezone (or DST) shifting them.
function utcDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC happily rolls e.g. Feb 30 into March, which we don't want.
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}


// Returns midnight (UTC) of the day, or undefined if it can't be read as a date.
export function parseLogDate(value: CellValue): Date | undefined {

  if (isMissing(value)) {
    return undefined;
  }

  if (value instanceof Date) {
    return utcDate(value.getUTCFullYear(), value.getUTCMonth() + 1, value.getUTCDate());
  }

  const str = String(value).trim();

  const isoMatch = str.match(isoDateRegex);
  if (isoMatch) {
    return utcDate(Number(isoMatch[1]), Number(isoMatch[2]), Number(isoMatch[3]));
  }

  const usMatch = str.match(usDateRegex);
  if (usMatch) {
    const year = usMatch[3].length === 2 ? 2000 + Number(usMatch[3]) : Number(usMatch[3]);
    return utcDate(year, Number(usMatch[1]), Number(usMatch[2]));
  }

  return undefined;

}


export function combineDateAndTime(date: Date, time: TimeOfDay): Date {
  return new Date(Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    time.hours,
    time.minutes,
    time.seconds
  ));
}


//-------------------------------------------------
// Gate openings
//-------------------------------------------------
// Gate openings are logged in inches, sometimes with an inch mark, e.g. '6"'. Returns feet.
export function parseGateOpening(value: CellValue): number {

  const cleaned = typeof value === 'string' ? value.replace(/"/g, '') : value;
  const inches = toFiniteNumber(cleaned);

  if (inches === undefined) {
    if (!isMissing(cleaned)) {
      logger.debug(`Gate opening '${String(value)}' is not numeric, treating the gate as closed.`);
    }
    return 0;
  }

  if (inches < 0) {
    logger.warn(`Negative gate opening '${String(value)}' found, treating the gate as closed.`);
    return 0;
  }

  return roundHalfEven(inches / inchesPerFoot, 2);

}


//-------------------------------------------------
// Build observations
//-------------------------------------------------
export function buildObservations(gateLog: RepairedGateLog): {observations: Observation[]; dropped: DroppedRow[]} {

  const observations: Observation[] = [];
  const dropped: DroppedRow[] = [];

  gateLog.rows.forEach((row): void => {

    const date = parseLogDate(row.date);
    if (!date) {
      logger.debug(`Dropping row ${row.rowNumber}, unable to parse date '${String(row.date)}'.`);
      dropped.push({rowNumber: row.rowNumber, reason: 'unparseable-date'});
      return;
    }

    const time = normalizeAndParseTime(row.time);
    if (!time) {
      logger.debug(`Dropping row ${row.rowNumber}, unable to parse time '${String(row.time)}'.`);
      dropped.push({rowNumber: row.rowNumber, reason: 'unparseable-time'});
      return;
    }

    const lakeElevation = toFiniteNumber(row.lakeElevation);
    if (lakeElevation === undefined) {
      logger.debug(`Dropping row ${row.rowNumber}, unable to parse lake elevation '${String(row.lakeElevation)}'.`);
      dropped.push({rowNumber: row.rowNumber, reason: 'unparseable-lake-elevation'});
      return;
    }

    const gateOpenings = gateLog.gateIds.map((_gateId, idx): number => parseGateOpening(row.gates[idx]));

    observations.push(Object.freeze({
      rowNumber: row.rowNumber,
      timestamp: combineDateAndTime(date, time),
      lakeElevation,
      gateOpenings: Object.freeze(gateOpenings)
    }));

  });

  return {observations, dropped};

}
