import type { RunStatus } from './flowRun.js';

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidTransitionError extends DomainError {
  constructor(
    public readonly from: RunStatus,
    public readonly to: RunStatus,
    message = `Cannot move run from ${from} to ${to}`
  ) {
    super(message);
  }
}
