import type { ZodError } from 'zod';

/** A single field-level problem reported with a `ValidationError`. */
export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Root of the service's domain errors. Storage backends only ever throw
 * these (or programming errors), never raw driver exceptions.
 */
export class ItemServiceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ItemServiceError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad input shape or a violated constraint. */
export class ValidationError extends ItemServiceError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends ItemServiceError {
  public readonly resource: string;
  public readonly id: string;

  constructor(resource: string, id: string, options?: ErrorOptions) {
    super(`${resource} with id ${id} not found`, options);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

/** The storage backend could not be reached or failed mid-operation. */
export class UnavailableError extends ItemServiceError {
  public readonly backend: string;

  constructor(backend: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UnavailableError';
    this.backend = backend;
  }
}

export function issuesFromZod(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function summarizeIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}
