import {OperationalError} from '../../../errors/OperationalError';

export class UnorderedTimeseries extends OperationalError {

  public constructor(message = 'Timeseries points must be strictly increasing in time') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
