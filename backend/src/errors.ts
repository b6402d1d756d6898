import type { ZodIssue } from 'zod';

/**
 * Base class for failures that map onto an HTTP status at the route boundary.
 */
export class ParleyError extends Error {
  readonly status: number;

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
  }
}

/** Credentials or other server settings are missing. Raised before any model work. */
export class ConfigurationError extends ParleyError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** A conversational session could not be constructed. */
export class ModelInitializationError extends ParleyError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}

/** A call to the model provider failed. */
export class RemoteCallError extends ParleyError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, { cause });
  }
}

export class RequestValidationError extends ParleyError {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super('Invalid negotiation request', 400);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
