import {OperationalError} from './OperationalError';

// Halts processing of the reservoir it concerns, but not of any other reservoir.
export class ConfigurationError extends OperationalError {

  public constructor(message = 'Configuration error') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
