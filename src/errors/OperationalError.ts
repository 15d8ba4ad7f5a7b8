// Errors we expect to happen from time to time, e.g. a malformed input file, as opposed to programmer errors.
export class OperationalError extends Error {

  public constructor(message = 'Operational Error') {
    super(message); // 'Error' breaks prototype chain here
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = new.target.name;
  }

}
