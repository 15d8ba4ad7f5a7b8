import Bluebird from 'bluebird';
import * as check from 'check-types';
import {ReservoirConfig} from './reservoir-config.interface';
import {ReservoirSources} from './reservoir-sources';
import {ReservoirRunReport, ReservoirFailure} from './reservoir-run-report.interface';
import {validateReservoirConfig} from './reservoir-validator';
import {RawTable} from '../table/raw-table.interface';
import {repairGateLogTable} from '../gate-log/gate-log.service';
import {buildObservations} from '../observation/observation.service';
import {ratingCurveFromTable} from '../rating-curve/rating-curve.service';
import {calculateObservationFlow} from '../flow/flow.service';
import {assembleFlowSeries} from '../flow-series/flow-series.service';
import {DuplicatePolicy, FlowSeries} from '../flow-series/flow-record.interface';
import {buildPathname, flowSeriesToPayload} from '../timeseries/timeseries.service';
import {TimeseriesPayload} from '../timeseries/timeseries-payload.interface';
import {TimeseriesSink} from '../timeseries/timeseries-sink.interface';
import {OperationalError} from '../../errors/OperationalError';
import {logger} from '../../utils/logger';


//-------------------------------------------------
// Compute
//-------------------------------------------------
// No I/O in here, the tables have already been read.
export function computeReservoirFlows(
  reservoir: ReservoirConfig,
  gateLogTable: RawTable,
  ratingCurveTable: RawTable,
  policy: DuplicatePolicy = 'last'
): {series: FlowSeries; payload: TimeseriesPayload; report: ReservoirRunReport} {

  validateReservoirConfig(reservoir);

  // Build the curve first, there's no point cleaning the gate log if it's unusable.
  const ratingCurve = ratingCurveFromTable(ratingCurveTable, {
    name: reservoir.name,
    spillwayInvertElevation: reservoir.spillwayInvertElevation,
    gateLength: reservoir.gateLength
  });

  const {gateLog, dropped: droppedDuringRepair} = repairGateLogTable(gateLogTable, reservoir.gateLog);
  const {observations, dropped: droppedDuringBuild} = buildObservations(gateLog);

  const flows = observations.map((observation) => calculateObservationFlow(observation, ratingCurve));
  const series = assembleFlowSeries(observations, flows.map((flow) => flow.totalFlow), policy);

  const pathname = buildPathname(reservoir.pathname);
  const payload = flowSeriesToPayload(series.records, pathname);

  const report: ReservoirRunReport = {
    reservoir: reservoir.name,
    pathname,
    rowsRead: gateLogTable.rows.length,
    dropped: [...droppedDuringRepair, ...droppedDuringBuild],
    observations: observations.length,
    fallbackMatches: flows.flatMap((flow) => flow.fallbackMatches),
    duplicates: series.duplicates,
    duplicatePolicy: policy,
    valuesWritten: payload.points.length
  };

  return {series, payload, report};

}


//-------------------------------------------------
// Process
//-------------------------------------------------
export async function processReservoir(
  reservoir: ReservoirConfig,
  sources: ReservoirSources,
  sink: TimeseriesSink,
  policy: DuplicatePolicy = 'last'
): Promise<ReservoirRunReport> {

  logger.info(`Processing ${reservoir.name} gate log`);

  const gateLogTable = await sources.readGateLog(reservoir);
  const ratingCurveTable = await sources.readRatingCurve(reservoir);

  const {payload, report} = computeReservoirFlows(reservoir, gateLogTable, ratingCurveTable, policy);

  await sink.replaceTimeseries(payload);

  logger.info({
    rowsRead: report.rowsRead,
    dropped: report.dropped.length,
    observations: report.observations,
    fallbackMatches: report.fallbackMatches.length,
    duplicates: report.duplicates.length,
    valuesWritten: report.valuesWritten
  }, `Finished processing ${reservoir.name}`);

  return report;

}


// A reservoir that fails with an operational error (e.g. an empty rating curve) is skipped, the others still get processed. Anything else is a bug and is rethrown.
export async function processReservoirs(
  reservoirs: ReservoirConfig[],
  sources: ReservoirSources,
  sink: TimeseriesSink,
  policy: DuplicatePolicy = 'last'
): Promise<{reports: ReservoirRunReport[]; failures: ReservoirFailure[]}> {

  const reports: ReservoirRunReport[] = [];
  const failures: ReservoirFailure[] = [];

  await Bluebird.mapSeries(reservoirs, async (reservoir): Promise<void> => {
    try {
      reports.push(await processReservoir(reservoir, sources, sink, policy));
    } catch (err) {
      if (err instanceof OperationalError) {
        logger.error({err}, `Failed to process ${reservoir.name}`);
        failures.push({reservoir: reservoir.name, error: err});
      } else {
        throw err;
      }
    }
  });

  if (check.nonEmptyArray(failures)) {
    logger.warn(`${failures.length} of ${reservoirs.length} reservoirs could not be processed`);
  }

  return {reports, failures};

}
