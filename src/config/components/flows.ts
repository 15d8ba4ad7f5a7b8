//-------------------------------------------------
// Dependencies
//-------------------------------------------------
import * as joi from '@hapi/joi';
import {duplicatePolicies, DuplicatePolicy} from '../../components/flow-series/flow-record.interface';
import {ReservoirFiles} from '../../components/reservoir/reservoir-sources';


//-------------------------------------------------
// Validation Schema
//-------------------------------------------------
// The gate logs and discharge rate tables are sheets of a workbook, exported to CSV.
const schema = joi.object({
  LAWTONKA_GATE_LOG_FILE: joi.string()
    .required(),
  LAWTONKA_RATING_CURVE_FILE: joi.string()
    .required(),
  ELLSWORTH_GATE_LOG_FILE: joi.string()
    .required(),
  ELLSWORTH_RATING_CURVE_FILE: joi.string()
    .required(),
  DUPLICATE_POLICY: joi.string()
    .valid(...duplicatePolicies)
    .default('last')
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
export const flows: {files: {[reservoirName: string]: ReservoirFiles}; duplicatePolicy: DuplicatePolicy} = {
  files: {
    Lawtonka: {
      gateLogFile: envVars.LAWTONKA_GATE_LOG_FILE,
      ratingCurveFile: envVars.LAWTONKA_RATING_CURVE_FILE
    },
    Ellsworth: {
      gateLogFile: envVars.ELLSWORTH_GATE_LOG_FILE,
      ratingCurveFile: envVars.ELLSWORTH_RATING_CURVE_FILE
    }
  },
  duplicatePolicy: envVars.DUPLICATE_POLICY
};
