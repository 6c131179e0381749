import { OutlineLensError, ErrorCode, type ErrorContext } from "./OutlineLensError";

/**
 * Error for input and configuration validation failures.
 */
export class OutlineLensValidationError extends OutlineLensError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "OutlineLensValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static missingParam(paramName: string, context: Partial<ErrorContext> = {}) {
    return new OutlineLensValidationError(
      `Missing required parameter: ${paramName}`,
      ErrorCode.VALIDATION_MISSING_PARAM,
      { ...context, field: paramName }
    );
  }

  static invalidFormat(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new OutlineLensValidationError(
      `Invalid format for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { ...context, field, value: actual }
    );
  }

  static invalidPolicy(field: string, reason: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new OutlineLensValidationError(
      `Invalid policy value for ${field}: ${reason}`,
      ErrorCode.VALIDATION_INVALID_POLICY,
      { ...context, operation: context.operation ?? "policy", field, value: actual }
    );
  }
}
