import type { ZodError } from "zod";

/**
 * A single failed check, reported back to the caller
 */
export interface ValidationFailure {
  field: string;
  message: string;
}

/**
 * Request data failed validation. Answered with 400 and the failures as body.
 */
export class ValidationError extends Error {
  readonly validationErrors: ValidationFailure[];

  constructor(validationErrors: ValidationFailure[], message?: string) {
    super(message ?? validationErrors.map((e) => `${e.field}: ${e.message}`).join("; "));
    this.name = "ValidationError";
    this.validationErrors = validationErrors;
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }

  static fromZodError(error: ZodError): ValidationError {
    return new ValidationError(
      error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
}

/**
 * Caller is not allowed to do this. Answered with 403.
 */
export class UnauthorizedError extends Error {
  constructor(message = "Unauthorized") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

/**
 * Requested entity does not exist. Answered with 404.
 */
export class NotFoundError extends Error {
  constructor(message = "Not found") {
    super(message);
    this.name = "NotFoundError";
  }
}
