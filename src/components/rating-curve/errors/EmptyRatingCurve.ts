import {ConfigurationError} from '../../../errors/ConfigurationError';

export class EmptyRatingCurve extends ConfigurationError {

  public constructor(message = 'Rating curve has no usable entries') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
  }

}
