import {Knex} from 'knex';
import {chunk} from 'lodash';
import {TimeseriesSink} from './timeseries-sink.interface';
import {TimeseriesPayload, TimeseriesPoint} from './timeseries-payload.interface';
import {TimeseriesRow, TimeseriesValueRow} from './timeseries-row.interface';
import {assertStrictlyOrdered} from './timeseries.service';
import {ReplaceTimeseriesFail} from './errors/ReplaceTimeseriesFail';
import {GetTimeseriesFail} from './errors/GetTimeseriesFail';
import {logger} from '../../utils/logger';


const timeseriesTable = 'timeseries';
const valuesTable = 'timeseries_values';

// Keeps each insert under SQLite's limit on bound parameters.
const insertChunkSize = 300;


function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}


export class KnexTimeseriesSink implements TimeseriesSink {

  public constructor(private readonly db: Knex) {}


  public async createTimeseriesTables(): Promise<void> {

    if (!(await this.db.schema.hasTable(timeseriesTable))) {
      await this.db.schema.createTable(timeseriesTable, (table): void => {
        table.increments('id');
        table.string('pathname').notNullable().unique();
        table.string('unit').notNullable();
        table.string('type').notNullable();
        table.timestamp('first_obs', {useTz: true});
        table.timestamp('last_obs', {useTz: true});
      });
      logger.info(`Created ${timeseriesTable} table`);
    }

    if (!(await this.db.schema.hasTable(valuesTable))) {
      await this.db.schema.createTable(valuesTable, (table): void => {
        table.integer('timeseries').unsigned().notNullable()
        .references('id')
        .inTable(timeseriesTable)
        .onDelete('CASCADE');
        table.timestamp('time', {useTz: true}).notNullable();
        table.double('value').notNullable();
        table.unique(['timeseries', 'time']);
      });
      logger.info(`Created ${valuesTable} table`);
    }

  }


  // Same as the old workflow of deleting the pathname and then putting the new series.
  public async replaceTimeseries(payload: TimeseriesPayload): Promise<void> {

    assertStrictlyOrdered(payload.points);

    const {points} = payload;
    const firstObs = points.length > 0 ? points[0].time.toISOString() : null;
    const lastObs = points.length > 0 ? points[points.length - 1].time.toISOString() : null;

    try {
      await this.db.transaction(async (trx): Promise<void> => {

        const existing = await trx<TimeseriesRow>(timeseriesTable)
        .where({pathname: payload.pathname})
        .first();

        if (existing) {
          await trx<TimeseriesValueRow>(valuesTable).where({timeseries: existing.id}).del();
          await trx<TimeseriesRow>(timeseriesTable).where({id: existing.id}).del();
        }

        await trx<TimeseriesRow>(timeseriesTable).insert({
          pathname: payload.pathname,
          unit: payload.unit,
          type: payload.type,
          first_obs: firstObs,
          last_obs: lastObs
        });

        const created = await trx<TimeseriesRow>(timeseriesTable)
        .where({pathname: payload.pathname})
        .first();
        if (!created) {
          throw new Error(`Timeseries '${payload.pathname}' was not found straight after inserting it.`);
        }

        const rows = points.map((point): TimeseriesValueRow => ({
          timeseries: created.id,
          time: point.time.toISOString(),
          value: point.value
        }));

        for (const rowsChunk of chunk(rows, insertChunkSize)) {
          await trx<TimeseriesValueRow>(valuesTable).insert(rowsChunk);
        }

      });
    } catch (err) {
      throw new ReplaceTimeseriesFail(`Failed to replace timeseries '${payload.pathname}'`, errorMessage(err));
    }

    logger.info(`Wrote ${points.length} values to ${payload.pathname}`);

  }


  public async getTimeseriesPoints(pathname: string): Promise<TimeseriesPoint[]> {

    let rows: TimeseriesValueRow[];
    try {
      const timeseries = await this.db<TimeseriesRow>(timeseriesTable)
      .where({pathname})
      .first();
      rows = timeseries ? await this.db<TimeseriesValueRow>(valuesTable)
      .where({timeseries: timeseries.id})
      .orderBy('time', 'asc') : [];
    } catch (err) {
      throw new GetTimeseriesFail(`Failed to get the values of timeseries '${pathname}'`, errorMessage(err));
    }

    return rows.map((row): TimeseriesPoint => ({time: new Date(row.time), value: Number(row.value)}));

  }

}
