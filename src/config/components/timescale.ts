//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from '@hapi/joi';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
const schema = joi.object({
  TIMESCALE_HOST: joi.string()
    .required(),
  TIMESCALE_PORT: joi.number()
    .port()
    .default(5432),
  TIMESCALE_USER: joi.string()
    .required(),
  TIMESCALE_PASSWORD: joi.string()
    .allow('')
    .default(''),
  TIMESCALE_NAME: joi.string()
    .required(),
  TIMESCALE_SSL: joi.boolean()
    .default(false)
}).unknown()
  .required();


//-------------------------------------------------
// Validate
//-------------------------------------------------
const {error: err, value: envVars} = schema.validate(process.env);

if (err) {
  throw new Error(`An error occured whilst validating process.env: ${err.message}`);
}


//-------------------------------------------------
// Create config object
//-------------------------------------------------
export interface TimescaleConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  ssl: boolean;
}

export const timescale: TimescaleConfig = {
  host: envVars.TIMESCALE_HOST,
  port: envVars.TIMESCALE_PORT,
  user: envVars.TIMESCALE_USER,
  password: envVars.TIMESCALE_PASSWORD,
  name: envVars.TIMESCALE_NAME,
  ssl: envVars.TIMESCALE_SSL
};
