// Load any environmental variables set in the .env file into process.env
import * as dotenv from 'dotenv';
dotenv.config();

// Retrieve each of our configuration components
import * as common from './components/common';
import * as logger from './components/logger';
import * as timescale from './components/timescale';
import * as flows from './components/flows';


// Export
export const config = Object.assign({}, common, logger, timescale, flows);
