import {OperationalError} from '../../../errors/OperationalError';

export class InvalidGateLogTable extends OperationalError {

  public constructor(message = 'Gate log table does not have the expected layout') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
