import { OutlineLensError, ErrorCode, type ErrorContext } from "./OutlineLensError";

/**
 * Error for documents the PDF collaborator cannot read.
 * Collection runs skip the document and continue.
 */
export class OutlineLensParseError extends OutlineLensError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_UNREADABLE_DOCUMENT,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "OutlineLensParseError";
  }

  static unreadable(documentId: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    const detail = cause ? `: ${cause.message}` : "";
    return new OutlineLensParseError(
      `Unable to read document ${documentId}${detail}`,
      ErrorCode.PARSE_UNREADABLE_DOCUMENT,
      { ...context, operation: context.operation ?? "parse", documentId },
      { cause }
    );
  }
}
