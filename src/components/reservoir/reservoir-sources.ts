import {RawTable} from '../table/raw-table.interface';
import {readCsvTable} from '../table/csv-table.service';
import {ReservoirConfig} from './reservoir-config.interface';
import {InvalidReservoirConfig} from './errors/InvalidReservoirConfig';


export interface ReservoirSources {
  readGateLog(reservoir: ReservoirConfig): Promise<RawTable>;
  readRatingCurve(reservoir: ReservoirConfig): Promise<RawTable>;
}

export interface ReservoirFiles {
  gateLogFile: string;
  ratingCurveFile: string;
}


// Reads the CSV exports of the gate log and discharge rates sheets, keyed by reservoir name.
export function csvReservoirSources(filesByReservoir: {[name: string]: ReservoirFiles}): ReservoirSources {

  function filesFor(reservoir: ReservoirConfig): ReservoirFiles {
    const files = filesByReservoir[reservoir.name];
    if (!files) {
      throw new InvalidReservoirConfig(`No gate log or rating curve files have been configured for ${reservoir.name}.`);
    }
    return files;
  }

  return {
    readGateLog: async (reservoir): Promise<RawTable> => {
      return readCsvTable(filesFor(reservoir).gateLogFile, {skipRows: reservoir.gateLog.skipRows});
    },
    readRatingCurve: async (reservoir): Promise<RawTable> => {
      return readCsvTable(filesFor(reservoir).ratingCurveFile, {skipRows: reservoir.ratingCurve.skipRows});
    }
  };

}
