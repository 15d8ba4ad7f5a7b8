import * as joi from '@hapi/joi';
import {ReservoirConfig} from './reservoir-config.interface';
import {InvalidReservoirConfig} from './errors/InvalidReservoirConfig';


const reservoirConfigSchema = joi.object({
  name: joi.string().required(),
  spillwayInvertElevation: joi.number().required(),
  gateLength: joi.number().positive().required(),
  gateLog: joi.object({
    dateColumn: joi.string().required(),
    timeColumn: joi.string().required(),
    lakeElevationColumn: joi.string().required(),
    gateColumns: joi.object({
      start: joi.number().integer().min(0).required(),
      end: joi.number().integer().greater(joi.ref('start')).required()
    }).required(),
    dropTrailingColumn: joi.boolean().required(),
    skipRows: joi.number().integer().min(0).required()
  }).required(),
  ratingCurve: joi.object({
    skipRows: joi.number().integer().min(0).required()
  }).required(),
  pathname: joi.object({
    a: joi.string().allow(''),
    b: joi.string().required(),
    c: joi.string().required(),
    d: joi.string().allow(''),
    e: joi.string().required(),
    f: joi.string().allow('')
  }).required()
}).required();


export function validateReservoirConfig(reservoir: ReservoirConfig): ReservoirConfig {

  const {error: validationErr} = reservoirConfigSchema.validate(reservoir);
  if (validationErr) {
    throw new InvalidReservoirConfig(`Reservoir config is invalid. Reason: ${validationErr.message}`);
  }

  return reservoir;

}
