import {RawTable} from '../table/raw-table.interface';
import {RatingCurve, RatingCurveOptions} from './rating-curve.class';
import {InvalidRatingCurveTable} from './errors/InvalidRatingCurveTable';


const gateOpeningColumn = 'd';
const coefficientColumn = 'C';


// The discharge rate sheets hold other columns too (e.g. elevation and flow), we only need d and C.
export function ratingCurveFromTable(table: RawTable, options: Omit<RatingCurveOptions, 'entries'>): RatingCurve {

  const headers = table.headers.map((header) => header.trim());
  const dIdx = headers.indexOf(gateOpeningColumn);
  const cIdx = headers.indexOf(coefficientColumn);

  if (dIdx === -1 || cIdx === -1) {
    throw new InvalidRatingCurveTable(`The ${options.name} rating curve table needs both a '${gateOpeningColumn}' and a '${coefficientColumn}' column. Found: ${headers.join(', ')}`);
  }

  const entries = table.rows.map((row) => ({d: row.cells[dIdx], C: row.cells[cIdx]}));

  return new RatingCurve({...options, entries});

}
