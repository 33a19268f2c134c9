/**
 * Application-level errors for HTTP layer mapping.
 * Auth and ownership errors carry a fixed message so responses never say
 * which part of a check failed.
 */
export type AuthFailureKind = 'MISSING_CREDENTIAL' | 'INVALID_OR_EXPIRED' | 'IDENTITY_MISSING';

export abstract class AuthFailure extends Error {
  abstract readonly kind: AuthFailureKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class MissingCredentialError extends AuthFailure {
  readonly kind = 'MISSING_CREDENTIAL';

  constructor() {
    super('Authorization header missing');
  }
}

export class InvalidOrExpiredCredentialError extends AuthFailure {
  readonly kind = 'INVALID_OR_EXPIRED';

  constructor() {
    super('Invalid or expired API key');
  }
}

export class IdentityMissingError extends AuthFailure {
  readonly kind = 'IDENTITY_MISSING';

  constructor() {
    super('Identity not found');
  }
}

export class NotFoundOrForbiddenError extends Error {
  constructor(resource = 'Resource') {
    super(`${resource} not found or access denied`);
    this.name = 'NotFoundOrForbiddenError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCredentialsError extends Error {
  constructor(message = 'Invalid email or password') {
    super(message);
    this.name = 'InvalidCredentialsError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class StoreUnavailableError extends Error {
  constructor(message = 'Database unavailable', options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
