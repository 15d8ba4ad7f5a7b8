import {roundHalfEven} from '../../utils/round-half-even';
import {RatingCurveEntry, RatingCurveMatch} from './rating-curve.interface';
import {EmptyRatingCurve} from './errors/EmptyRatingCurve';
import {InvalidReservoirConfig} from '../reservoir/errors/InvalidReservoirConfig';
import {logger} from '../../utils/logger';


export interface RatingCurveOptions {
  name: string;
  entries: {d: unknown; C: unknown}[];
  spillwayInvertElevation: number; // ft
  gateLength: number; // ft
}


function asFiniteNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}


// Maps a gate opening to a coefficient of discharge for a single reservoir. Read-only once built.
export class RatingCurve {

  public readonly name: string;
  public readonly spillwayInvertElevation: number;
  public readonly gateLength: number;
  private readonly entries: readonly RatingCurveEntry[];

  public constructor(options: RatingCurveOptions) {

    this.name = options.name;

    const constants = {spillwayInvertElevation: options.spillwayInvertElevation, gateLength: options.gateLength};
    Object.entries(constants).forEach(([key, value]): void => {
      if (!Number.isFinite(value)) {
        throw new InvalidReservoirConfig(`The ${options.name} rating curve needs a finite ${key}, got '${value}'.`);
      }
    });
    this.spillwayInvertElevation = options.spillwayInvertElevation;
    this.gateLength = options.gateLength;

    const entries: RatingCurveEntry[] = [];
    options.entries.forEach((entry): void => {
      const d = asFiniteNumber(entry.d);
      const C = asFiniteNumber(entry.C);
      if (d === undefined || C === undefined) {
        logger.debug({entry}, `Skipping unusable entry in the ${this.name} rating curve.`);
        return;
      }
      entries.push(Object.freeze({d: roundHalfEven(d, 2), C}));
    });

    if (entries.length === 0) {
      throw new EmptyRatingCurve(`The ${this.name} rating curve has no usable entries.`);
    }

    this.entries = Object.freeze(entries);

  }


  public get size(): number {
    return this.entries.length;
  }


  // Exact match if we can, otherwise the entry with the nearest d (the first one wins a tie).
  // A fallback is logged, and is flagged on the returned match.
  public lookup(gateOpening: number): RatingCurveMatch {

    const requested = roundHalfEven(gateOpening, 2);

    let nearest = this.entries[0];
    let nearestDiff = Math.abs(nearest.d - requested);

    for (const entry of this.entries) {
      if (entry.d === requested) {
        return {requested, d: entry.d, coefficient: entry.C, exact: true};
      }
      const diff = Math.abs(entry.d - requested);
      if (diff < nearestDiff) {
        nearest = entry;
        nearestDiff = diff;
      }
    }

    logger.info(`Gate opening ${requested} ft not found in the ${this.name} rating curve. Using closest d value: ${nearest.d} ft.`);
    return {requested, d: nearest.d, coefficient: nearest.C, exact: false};

  }

}
