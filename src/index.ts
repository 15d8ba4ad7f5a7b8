//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import {config} from './config';
import {logger, configureLogger} from './utils/logger';
// Handle Uncaught Errors - Make sure the logger is already configured first.
import './utils/handle-uncaught-errors';
import {createKnex} from './db/knex';
import {KnexTimeseriesSink} from './components/timeseries/knex-timeseries-sink.class';
import {processReservoirs} from './components/reservoir/reservoir.service';
import {csvReservoirSources} from './components/reservoir/reservoir-sources';
import {reservoirs} from './components/reservoir/reservoirs';


//-------------------------------------------------
// Logging
//-------------------------------------------------
configureLogger(config.logger);
logger.info(`Computing gate flows (${config.common.env})`);


(async (): Promise<void> => {

  const db = createKnex(config.timescale);
  const sink = new KnexTimeseriesSink(db);

  try {

    //-------------------------------------------------
    // Database
    //-------------------------------------------------
    await sink.createTimeseriesTables();
    logger.info('Timeseries tables are ready');

    //-------------------------------------------------
    // Reservoirs
    //-------------------------------------------------
    const sources = csvReservoirSources(config.flows.files);
    const {reports, failures} = await processReservoirs(reservoirs, sources, sink, config.flows.duplicatePolicy);

    reports.forEach((report): void => {
      logger.info(`${report.reservoir}: ${report.valuesWritten} values written to ${report.pathname}`);
    });

    process.exitCode = failures.length > 0 ? 1 : 0;

  } finally {
    await db.destroy();
  }

})().catch((err): void => {
  logger.fatal({err}, 'Failed to compute gate flows');
  process.exitCode = 1;
});
