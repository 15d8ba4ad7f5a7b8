import {OperationalError} from '../../../errors/OperationalError';

export class InvalidPathname extends OperationalError {

  public constructor(message = 'Invalid timeseries pathname') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
