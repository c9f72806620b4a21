/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Authentication failed: missing, invalid or expired credentials. */
export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Authenticated, but the caller's role is too low for the operation. */
export class ForbiddenError extends Error {
  constructor(message = 'Forbidden') {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The resource exists but belongs to another profile. */
export class UnauthorizedAccessError extends Error {
  constructor(message = 'You do not have access to this resource') {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UserAlreadyExistsError extends ConflictError {}
export class ProfileAlreadyExistsError extends ConflictError {
  constructor(message = 'User already has a profile') {
    super(message);
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(message = 'User not found') {
    super(message);
  }
}

export class ProfileNotFoundError extends NotFoundError {
  constructor(message = 'Profile not found') {
    super(message);
  }
}

export class WorkExperienceNotFoundError extends NotFoundError {
  constructor(message = 'Work experience not found') {
    super(message);
  }
}

export class ProjectNotFoundError extends NotFoundError {
  constructor(message = 'Project not found') {
    super(message);
  }
}

export class TechnologyNotFoundError extends NotFoundError {
  constructor(message = 'Technology not found') {
    super(message);
  }
}

export class ClientNotFoundError extends NotFoundError {
  constructor(message = 'Client not found') {
    super(message);
  }
}

export class SocialNotFoundError extends NotFoundError {
  constructor(message = 'Social link not found') {
    super(message);
  }
}
