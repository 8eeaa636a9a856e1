import { JsonScopeError, ErrorCode, type ErrorContext } from "./JsonScopeError";

/**
 * Error for documents that cannot be opened: malformed JSON, nesting beyond
 * the depth cap, or input beyond the size cap. Fatal to the open attempt.
 */
export class JsonParseError extends JsonScopeError {
  public readonly offset?: number;
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_MALFORMED,
    context: Partial<ErrorContext> & { line?: number; column?: number } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { cause: options?.cause, isRetryable: false });
    this.name = "JsonParseError";
    this.offset = context.offset;
    this.line = context.line;
    this.column = context.column;
  }

  static malformed(
    detail: string,
    offset: number,
    line: number,
    column: number,
    context: Partial<ErrorContext> = {}
  ) {
    return new JsonParseError(
      `Malformed JSON at line ${line}, column ${column} (byte ${offset}): ${detail}`,
      ErrorCode.PARSE_MALFORMED,
      { operation: "parse", ...context, offset, line, column }
    );
  }

  static depthExceeded(maxDepth: number, offset: number, context: Partial<ErrorContext> = {}) {
    return new JsonParseError(
      `JSON nesting exceeds the maximum depth of ${maxDepth} (byte ${offset})`,
      ErrorCode.PARSE_DEPTH_EXCEEDED,
      { operation: "parse", ...context, offset, maxDepth }
    );
  }

  static sizeExceeded(sizeBytes: number, limitBytes: number, context: Partial<ErrorContext> = {}) {
    return new JsonParseError(
      `Document is ${sizeBytes} bytes, larger than the ${limitBytes} byte limit`,
      ErrorCode.PARSE_SIZE_EXCEEDED,
      { operation: "open", ...context, sizeBytes, limitBytes }
    );
  }

  static empty(context: Partial<ErrorContext> = {}) {
    return new JsonParseError(
      "Document is empty",
      ErrorCode.PARSE_EMPTY,
      { operation: "parse", ...context }
    );
  }

  static invalidEncoding(cause?: Error, context: Partial<ErrorContext> = {}) {
    return new JsonParseError(
      "Document is not valid UTF-8",
      ErrorCode.PARSE_INVALID_ENCODING,
      { operation: "decode", ...context },
      { cause }
    );
  }
}
