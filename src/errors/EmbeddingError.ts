import { OutlineLensError, ErrorCode, type ErrorContext } from "./OutlineLensError";

/**
 * Signals that the embeddings collaborator cannot serve vectors for this run.
 * Not fatal: the pipeline switches the whole run to keyword scoring.
 */
export class OutlineLensEmbeddingError extends OutlineLensError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EMBEDDING_UNAVAILABLE,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "OutlineLensEmbeddingError";
  }

  static unavailable(cause?: Error, context: Partial<ErrorContext> = {}) {
    const detail = cause ? `: ${cause.message}` : "";
    return new OutlineLensEmbeddingError(
      `Embeddings unavailable${detail}`,
      ErrorCode.EMBEDDING_UNAVAILABLE,
      { ...context, operation: context.operation ?? "embed" },
      { cause }
    );
  }

  static degenerateVector(reason: string, context: Partial<ErrorContext> = {}) {
    return new OutlineLensEmbeddingError(
      `Embedding vector rejected: ${reason}`,
      ErrorCode.EMBEDDING_DEGENERATE_VECTOR,
      { ...context, operation: context.operation ?? "embed" }
    );
  }

  static dimensionMismatch(expected: number, actual: number, context: Partial<ErrorContext> = {}) {
    return new OutlineLensEmbeddingError(
      `Embedding dimension changed mid-run: expected ${expected}, got ${actual}`,
      ErrorCode.EMBEDDING_DIMENSION_MISMATCH,
      { ...context, operation: context.operation ?? "embed", expected, actual }
    );
  }
}

export function isEmbeddingUnavailable(error: unknown): error is OutlineLensEmbeddingError {
  return error instanceof OutlineLensEmbeddingError;
}
