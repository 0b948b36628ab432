/**
 * Error Classes for NOM Collab
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Validation errors (1xxx)
  VALIDATION_FAILED = "E1000",
  VALIDATION_OBJECT_NOT_IN_PROJECT = "E1001",
  VALIDATION_SELF_REFERENCE = "E1002",
  VALIDATION_INVALID_SNAPSHOT = "E1003",

  // Conflict errors (2xxx)
  CONFLICT_DUPLICATE_RELATIONSHIP = "E2000",
  CONFLICT_LOCK_HELD = "E2001",

  // Not found errors (3xxx)
  NOT_FOUND_RELATIONSHIP = "E3000",

  // Storage errors (4xxx)
  STORAGE_FAILED = "E4000",
  STORAGE_UNIQUE_VIOLATION = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all NOM Collab errors
 */
export class NomCollabError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "NomCollabError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Malformed input, a referenced object missing from the project, or an invalid
 * enum value. The caller fixes the input and retries.
 */
export class ValidationError extends NomCollabError {
  public readonly kind = "validation" as const;
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ValidationError";
    this.issues = context?.issues ?? [];
  }
}

/**
 * Duplicate relationship pair or a cell lock held by someone else.
 * Surfaced to the user as "already in use".
 */
export class ConflictError extends NomCollabError {
  public readonly kind = "conflict" as const;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFLICT_DUPLICATE_RELATIONSHIP,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ConflictError";
  }
}

/**
 * Unknown id, or an id that does not belong to the addressed project
 */
export class NotFoundError extends NomCollabError {
  public readonly kind = "not-found" as const;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND_RELATIONSHIP,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "NotFoundError";
  }
}

/**
 * Storage backend failure. Not recoverable by the caller; never converted into
 * a result value.
 */
export class StorageError extends NomCollabError {
  public readonly table?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_FAILED,
    context?: Record<string, unknown> & { table?: string }
  ) {
    super(message, code, context);
    this.name = "StorageError";
    this.table = context?.table;
  }
}

/**
 * Raised by a table when a write collides with one of its unique keys.
 * Callers translate it into a domain outcome (usually a conflict).
 */
export class UniqueConstraintError extends NomCollabError {
  public readonly table: string;
  public readonly constraint: string;

  constructor(table: string, constraint: string, context?: Record<string, unknown>) {
    super(
      `Unique constraint ${constraint} violated on ${table}`,
      ErrorCode.STORAGE_UNIQUE_VIOLATION,
      { ...context, table, constraint }
    );
    this.name = "UniqueConstraintError";
    this.table = table;
    this.constraint = constraint;
  }
}

/**
 * Invalid configuration file or overrides
 */
export class ConfigurationError extends NomCollabError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Errors the collaboration facade returns as values
 */
export type CollaborationError = ValidationError | ConflictError | NotFoundError;

export function isNomCollabError(error: unknown): error is NomCollabError {
  return error instanceof NomCollabError;
}

export function isUniqueConstraintError(error: unknown): error is UniqueConstraintError {
  return error instanceof UniqueConstraintError;
}

/**
 * Wrap an unknown storage failure in a StorageError, leaving errors that
 * already carry a NOM Collab meaning untouched
 */
export function wrapStorageError(
  error: unknown,
  defaultMessage: string = "Storage operation failed",
  context?: Record<string, unknown>
): NomCollabError {
  if (isNomCollabError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new StorageError(error.message || defaultMessage, ErrorCode.STORAGE_FAILED, {
      ...context,
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new StorageError(
    typeof error === "string" ? error : defaultMessage,
    ErrorCode.STORAGE_FAILED,
    context
  );
}
