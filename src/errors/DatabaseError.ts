import {OperationalError} from './OperationalError';

export class DatabaseError extends OperationalError {

  public privateMessage?: string;

  public constructor(message = 'Database Error', privateMessage?: string) {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    // Extra detail from the underlying driver, for the logs.
    this.privateMessage = privateMessage;
  }

}
