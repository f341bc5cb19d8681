/**
 * Assessment error types. Validation failures carry the kind of check that
 * failed and the field (factor name, `factor.question`, or config path) it
 * failed on.
 */

export type ValidationErrorKind =
  | "MissingFactorResponse"
  | "OutOfRangeScore"
  | "InvalidWeightSum"
  | "UnknownFactorResponse"
  | "DuplicateFactorResponse"
  | "InvalidFactorDefinition"
  | "InvalidThresholds"
  | "MalformedInput";

export class ValidationError extends Error {
  public readonly kind: ValidationErrorKind;
  public readonly field?: string;
  public readonly context?: Record<string, unknown>;

  constructor(kind: ValidationErrorKind, message: string, field?: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
    this.field = field;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** An input, config or output file could not be read, parsed or written. */
export class FileAccessError extends Error {
  public readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${filePath}: ${message}`, options);
    this.name = "FileAccessError";
    this.filePath = filePath;

    Error.captureStackTrace(this, this.constructor);
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
