import {knex, Knex} from 'knex';
import {TimescaleConfig} from '../config/components/timescale';


export function createKnex(timescale: TimescaleConfig): Knex {
  return knex({
    client: 'pg',
    connection: {
      host: timescale.host,
      user: timescale.user,
      port: timescale.port,
      password: timescale.password,
      database: timescale.name,
      ssl: timescale.ssl
    },
    pool: {
      min: 0,
      max: 2 // one reservoir is written at a time
    }
  });
}
