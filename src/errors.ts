const BODY_SNIPPET_CHARS = 300;

export type QwenChatErrorCode =
  | "CREDENTIALS_MISSING"
  | "CONVERSATION_CREATION_FAILED"
  | "TRANSPORT_FAILURE"
  | "REQUEST_TIMEOUT"
  | "ABORTED"
  | "TURN_IN_PROGRESS";

export class QwenChatError extends Error {
  readonly code: QwenChatErrorCode;
  readonly status: number | undefined;
  readonly bodySnippet: string | undefined;

  constructor(
    code: QwenChatErrorCode,
    message: string,
    options: { status?: number; bodySnippet?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "QwenChatError";
    this.code = code;
    this.status = options.status;
    this.bodySnippet = options.bodySnippet;
  }
}

export function isQwenChatError(error: unknown): error is QwenChatError {
  return error instanceof QwenChatError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function createAbortError(): Error {
  const error = new Error("Request interrupted by user.");
  error.name = "AbortError";
  return error;
}

export function assertNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

/**
 * Compacts whitespace and clips a response body so it can ride along in an
 * error message.
 */
export function summarizeHttpBody(text: string, maxChars = BODY_SNIPPET_CHARS): string {
  const compact = text.replace(/\s+/g, " ").trim();
  if (compact.length <= maxChars) {
    return compact;
  }
  return `${compact.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...`;
}

export function summarizeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function toQwenChatError(error: unknown, fallbackCode: QwenChatErrorCode): QwenChatError {
  if (isQwenChatError(error)) {
    return error;
  }
  if (isAbortError(error)) {
    return new QwenChatError("ABORTED", "Request interrupted by user.", { cause: error });
  }
  return new QwenChatError(fallbackCode, summarizeError(error), { cause: error });
}

/** The single-line form `sendTurn` hands back to callers. */
export function formatChatError(error: QwenChatError): string {
  return `Error: ${error.message}`;
}
