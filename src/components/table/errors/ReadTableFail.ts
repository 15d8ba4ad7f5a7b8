import {OperationalError} from '../../../errors/OperationalError';

export class ReadTableFail extends OperationalError {

  public privateMessage?: string;

  public constructor(message = 'Failed to read table', privateMessage?: string) {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.privateMessage = privateMessage;
  }

}
