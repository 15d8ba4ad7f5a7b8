import {OperationalError} from '../../../errors/OperationalError';

export class InvalidRatingCurveTable extends OperationalError {

  public constructor(message = 'Rating curve table is missing a required column') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
