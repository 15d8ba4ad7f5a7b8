import {ConfigurationError} from '../../../errors/ConfigurationError';

export class InvalidReservoirConfig extends ConfigurationError {

  public constructor(message = 'Invalid reservoir configuration') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
