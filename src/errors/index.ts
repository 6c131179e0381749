export {
  OutlineLensError,
  ErrorCode,
  wrapError,
  isOutlineLensError,
  getErrorCode,
  toError,
  type ErrorContext,
  type SerializedError,
} from "./OutlineLensError";

export { OutlineLensParseError } from "./ParseError";
export { OutlineLensEmbeddingError, isEmbeddingUnavailable } from "./EmbeddingError";
export { OutlineLensValidationError } from "./ValidationError";
export { OutlineLensCollectionError } from "./CollectionError";
