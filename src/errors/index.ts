export {
  JsonScopeError,
  ErrorCode,
  wrapError,
  isJsonScopeError,
  getErrorCode,
  type ErrorContext,
  type SerializedError,
} from "./JsonScopeError";

export { JsonParseError } from "./ParseError";
export { JsonResolveError } from "./ResolveError";
export { JsonLoadError } from "./LoadError";
export { JsonSearchError } from "./SearchError";
export { JsonIoError } from "./IoError";
export { OperationCancelledError, isCancellation } from "./CancelledError";
