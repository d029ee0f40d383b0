export interface ValidationIssue {
  loc: string[];
  msg: string;
  type: string;
}

export type ErrorDetail = string | ValidationIssue[];

/**
 * Base class for every error the registry and its HTTP layer raise on purpose.
 * `status` is the HTTP status the error handler answers with; `detail` is
 * sent back verbatim as `{ "detail": ... }`.
 */
export class RegistryError extends Error {
  readonly status: number;
  readonly detail: ErrorDetail;

  constructor(message: string, opts: { status: number; detail?: ErrorDetail }) {
    super(message);
    this.name = 'RegistryError';
    this.status = opts.status;
    this.detail = opts.detail ?? message;
  }
}

export class RequestValidationError extends RegistryError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super('Request validation failed', { status: 422, detail: issues });
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}

export class ActivityNotFoundError extends RegistryError {
  constructor(message = 'Activity not found') {
    super(message, { status: 404 });
    this.name = 'ActivityNotFoundError';
  }
}

export class AlreadyRegisteredError extends RegistryError {
  constructor(message = 'Student already signed up for this activity') {
    super(message, { status: 400 });
    this.name = 'AlreadyRegisteredError';
  }
}

export class NotRegisteredError extends RegistryError {
  constructor(message = 'Student not signed up for this activity') {
    super(message, { status: 400 });
    this.name = 'NotRegisteredError';
  }
}

export class ActivityFullError extends RegistryError {
  constructor(message = 'Activity is full') {
    super(message, { status: 400 });
    this.name = 'ActivityFullError';
  }
}

// Raised while building a registry from bad seed data; never reaches a client
export class InvalidSeedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSeedError';
  }
}
