/**
 * Error taxonomy shared by the store adapter, the services and the routes.
 *
 * "Not found" is not an error here: lookups return null.
 */

export type ErrorCode = "INVALID_IDENTIFIER" | "STORE_ERROR" | "VALIDATION_ERROR";

export class ServiceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An identifier that is not a UUID in 8-4-4-4-12 hex form. */
export class InvalidIdentifierError extends ServiceError {
  readonly field: string;

  constructor(field: string, value: unknown) {
    super("INVALID_IDENTIFIER", `${field} is not a valid UUID: ${String(value)}`);
    this.field = field;
  }
}

export class StoreError extends ServiceError {
  readonly statement: string;

  constructor(statement: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("STORE_ERROR", `Statement ${statement} failed: ${reason}`, { cause });
    this.statement = statement;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}
