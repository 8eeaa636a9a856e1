import { promises as fs } from "node:fs";
import path from "node:path";

import { JsonIoError, JsonParseError } from "../errors";
import { PARSE_DEFAULTS } from "../config/constants";
import { mergeParsePolicy, type ParsePolicyInput } from "../config/ParsePolicy";
import { withRetry, RetryPresets } from "../utils/retry";
import { createLogger } from "../utils/logger";
import { formatByteSize } from "../utils/format";
import { throwIfAborted } from "../utils/cancellation";
import { decodeTree, parseDocument, type JsonDocument } from "./JsonDocument";

const log = createLogger({ component: "DocumentLoader" });

export type ValidationResult = { valid: true } | { valid: false; error: JsonParseError };

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function toIoError(error: unknown, filePath: string): JsonIoError {
  if (errnoCode(error) === "ENOENT") return JsonIoError.notFound(filePath);
  return JsonIoError.readFailed(filePath, error instanceof Error ? error : undefined);
}

export function isJsonFileName(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return PARSE_DEFAULTS.JSON_EXTENSIONS.some((candidate) => candidate === ext);
}

/**
 * Open a document from a file path or from bytes already in memory.
 *
 * For files the size cap is enforced from `stat` before anything is read.
 * Reads are retried on transient descriptor and locking errors.
 */
export async function openDocument(
  source: string | Uint8Array,
  policyInput: ParsePolicyInput = {},
  signal?: AbortSignal
): Promise<JsonDocument> {
  const policy = mergeParsePolicy(policyInput);

  if (typeof source !== "string") {
    return parseDocument(source, policy, { signal });
  }

  const filePath = path.resolve(source);
  let size: number;
  try {
    const stat = await fs.stat(filePath);
    size = stat.size;
  } catch (error) {
    throw toIoError(error, filePath);
  }

  if (size > policy.maxBytes) {
    throw JsonParseError.sizeExceeded(size, policy.maxBytes, { filePath });
  }
  throwIfAborted(signal, "open", { filePath });

  log.info("Opening document", { filePath, size: formatByteSize(size) });

  let bytes: Uint8Array;
  try {
    bytes = await withRetry(() => fs.readFile(filePath, { signal }), RetryPresets.fileRead, `read ${filePath}`);
  } catch (error) {
    throwIfAborted(signal, "open", { filePath });
    throw toIoError(error, filePath);
  }

  return parseDocument(bytes, policy, { signal, filePath });
}

/**
 * Syntax check without keeping a document, for the validate command.
 */
export function validateJson(text: string, policyInput: ParsePolicyInput = {}): ValidationResult {
  try {
    decodeTree(text, mergeParsePolicy(policyInput));
    return { valid: true };
  } catch (error) {
    if (error instanceof JsonParseError) return { valid: false, error };
    throw error;
  }
}

/**
 * Write text output, retrying while another process holds the file.
 */
export async function writeDocumentText(filePath: string, text: string): Promise<void> {
  const target = path.resolve(filePath);
  try {
    await withRetry(() => fs.writeFile(target, text, "utf8"), RetryPresets.fileWrite, `write ${target}`);
  } catch (error) {
    throw JsonIoError.writeFailed(target, error instanceof Error ? error : undefined);
  }
  log.info("Document saved", { filePath: target, size: formatByteSize(Buffer.byteLength(text, "utf8")) });
}
