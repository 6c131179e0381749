import { OutlineLensError, ErrorCode, type ErrorContext } from "./OutlineLensError";

/**
 * Collection-level failure. Raised only when no document of the collection
 * could be read; single unreadable documents are skipped instead.
 */
export class OutlineLensCollectionError extends OutlineLensError {
  public readonly skippedDocuments: readonly string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.COLLECTION_NO_READABLE_DOCUMENTS,
    context: Partial<ErrorContext> & { skippedDocuments?: readonly string[] } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "OutlineLensCollectionError";
    this.skippedDocuments = context.skippedDocuments ?? [];
  }

  static noReadableDocuments(skippedDocuments: readonly string[], context: Partial<ErrorContext> = {}) {
    const message = skippedDocuments.length === 0
      ? "Collection contains no documents"
      : `None of the ${skippedDocuments.length} documents in the collection could be read`;
    return new OutlineLensCollectionError(
      message,
      ErrorCode.COLLECTION_NO_READABLE_DOCUMENTS,
      { ...context, operation: context.operation ?? "analyzeCollection", skippedDocuments }
    );
  }
}
