/**
 * Base error class for all outline-lens errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Parse errors (1xxx)
  PARSE_UNREADABLE_DOCUMENT = 1001,

  // Embedding errors (2xxx)
  EMBEDDING_UNAVAILABLE = 2001,
  EMBEDDING_DEGENERATE_VECTOR = 2002,
  EMBEDDING_DIMENSION_MISMATCH = 2003,

  // Validation errors (4xxx)
  VALIDATION_MISSING_PARAM = 4003,
  VALIDATION_INVALID_FORMAT = 4004,
  VALIDATION_INVALID_POLICY = 4005,

  // Collection errors (5xxx)
  COLLECTION_NO_READABLE_DOCUMENTS = 5001,

  // I/O errors (6xxx)
  IO_READ_FAILED = 6001,
  IO_WRITE_FAILED = 6002,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  documentId?: string;
  path?: string;
  correlationId?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

/**
 * Base error class for outline-lens.
 * All library errors extend this class.
 */
export class OutlineLensError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  declare readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = "OutlineLensError";
    this.code = code;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission.
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  toUserMessage(): string {
    return this.message;
  }

  /**
   * Create detailed error message for logging.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.documentId) parts.push(`DocID: ${this.context.documentId}`);
    if (this.context.path) parts.push(`Path: ${this.context.path}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in OutlineLensError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): OutlineLensError {
  if (error instanceof OutlineLensError) {
    return new OutlineLensError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new OutlineLensError(error.message, code, context, { cause: error });
  }

  return new OutlineLensError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

/**
 * Type guard for OutlineLensError.
 */
export function isOutlineLensError(error: unknown): error is OutlineLensError {
  return error instanceof OutlineLensError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (isOutlineLensError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}

/** Normalize a thrown value to an Error instance for `cause` chains. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
