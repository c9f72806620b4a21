export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when an entity would be built with data that breaks one of its
 * invariants. Nothing is persisted when this is thrown.
 */
export class ValidationError extends DomainError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

export class ProfileRequiredError extends DomainError {
  constructor(message = 'User has no profile') {
    super(message);
  }
}
