import {DatabaseError} from '../../../errors/DatabaseError';

export class ReplaceTimeseriesFail extends DatabaseError {

  public constructor(message = 'Failed to replace timeseries', privateMessage?: string) {
    super(message, privateMessage); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
