export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidUserIdError extends DomainError {
  constructor(message = 'User id must be an unsigned 64-bit integer') {
    super(message);
  }
}
