import type { DebugListener } from "./chat-types.js";
import type { CreateConversationResult } from "./conversation.js";
import { QwenChatError, createAbortError, summarizeError, summarizeHttpBody } from "./errors.js";
import type { ChatTurnPayload, CreateConversationPayload } from "./request-builder.js";

const CREATE_CONVERSATION_PATH = "/api/v2/chats/new";
const CHAT_COMPLETIONS_PATH = "/api/v2/chat/completions";

export type QwenTransportOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
  onDebug?: DebugListener;
};

export type StreamChatTurnResult =
  | { ok: true; status: number; lines: AsyncIterable<string> }
  | { ok: false; error: QwenChatError };

/**
 * HTTP calls against the chat web service. Ordinary HTTP failures come back as
 * values; only a failure while the caller is consuming `lines` is thrown, from
 * the iterator.
 */
export class QwenTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly onDebug: DebugListener | undefined;

  constructor(options: QwenTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.onDebug = options.onDebug;
  }

  async createConversation(
    headers: Record<string, string>,
    payload: CreateConversationPayload,
    signal?: AbortSignal,
  ): Promise<CreateConversationResult> {
    const guard = new RequestGuard(this.timeoutMs, signal);
    this.onDebug?.({
      stage: "conversation_create",
      data: { url: `${this.baseUrl}${CREATE_CONVERSATION_PATH}`, payload },
    });

    try {
      guard.arm();
      const response = await guard.race(
        this.fetchImpl(`${this.baseUrl}${CREATE_CONVERSATION_PATH}`, {
          method: "POST",
          headers,
          body: JSON.stringify(payload),
          signal: guard.signal,
        }),
      );
      const text = await guard.race(response.text());
      guard.disarm();

      const id = response.status === 200 ? readCreatedConversationId(safeParseJson(text)) : null;
      if (!id) {
        const error = new QwenChatError(
          "CONVERSATION_CREATION_FAILED",
          `Failed to create conversation (${response.status})`,
          { status: response.status, bodySnippet: summarizeHttpBody(text) },
        );
        this.onDebug?.({
          stage: "conversation_create_failed",
          data: { status: response.status, body: error.bodySnippet },
        });
        return { ok: false, error };
      }

      this.onDebug?.({ stage: "conversation_created", data: { id } });
      return { ok: true, id };
    } catch (error) {
      const failure = guard.translate(error);
      const reported =
        failure.code === "TRANSPORT_FAILURE"
          ? new QwenChatError("CONVERSATION_CREATION_FAILED", `Error creating conversation: ${failure.message}`, {
              cause: error,
            })
          : failure;
      this.onDebug?.({
        stage: "conversation_create_failed",
        data: { code: reported.code, message: reported.message },
      });
      return { ok: false, error: reported };
    } finally {
      guard.dispose();
    }
  }

  async streamChatTurn(
    headers: Record<string, string>,
    payload: ChatTurnPayload,
    conversationId: string,
    signal?: AbortSignal,
  ): Promise<StreamChatTurnResult> {
    const query = new URLSearchParams({ chat_id: conversationId });
    const url = `${this.baseUrl}${CHAT_COMPLETIONS_PATH}?${query.toString()}`;
    const guard = new RequestGuard(this.timeoutMs, signal);
    this.onDebug?.({
      stage: "request",
      data: { url, payload },
    });

    let response: Response;
    try {
      guard.arm();
      response = await guard.race(
        this.fetchImpl(url, {
          method: "POST",
          headers,
          body: JSON.stringify(payload),
          signal: guard.signal,
        }),
      );
      guard.disarm();
    } catch (error) {
      guard.dispose();
      return { ok: false, error: guard.translate(error) };
    }

    this.onDebug?.({
      stage: "response_status",
      data: { status: response.status },
    });

    if (response.status !== 200 || !response.body) {
      const bodyText = await readBodyText(response, guard);
      guard.dispose();
      return {
        ok: false,
        error: new QwenChatError("TRANSPORT_FAILURE", `Request failed with status ${response.status}`, {
          status: response.status,
          bodySnippet: summarizeHttpBody(bodyText),
        }),
      };
    }

    return {
      ok: true,
      status: response.status,
      lines: readLines(response.body, guard),
    };
  }
}

/**
 * Splits a byte stream into text lines as chunks arrive. Every read is bounded
 * by the guard's timeout; stopping iteration early cancels the body.
 */
export async function* readLines(
  body: ReadableStream<Uint8Array>,
  guard: RequestGuard,
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let drained = false;

  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      guard.arm();
      try {
        chunk = await guard.race(reader.read());
      } catch (error) {
        throw guard.translate(error);
      } finally {
        guard.disarm();
      }

      if (chunk.done) {
        drained = true;
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      let newlineIndex = buffer.indexOf("\n");
      while (newlineIndex >= 0) {
        const line = stripCarriageReturn(buffer.slice(0, newlineIndex));
        buffer = buffer.slice(newlineIndex + 1);
        yield line;
        newlineIndex = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield stripCarriageReturn(buffer);
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
    guard.dispose();
  }
}

/**
 * One request's timeout and cancellation wiring. The timer is armed around
 * each wait on the network and tells a timeout apart from a caller abort.
 */
export class RequestGuard {
  private readonly controller = new AbortController();
  private readonly callerSignal: AbortSignal | undefined;
  private readonly timeoutMs: number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timedOut = false;
  readonly signal: AbortSignal;

  constructor(timeoutMs: number, callerSignal?: AbortSignal) {
    this.timeoutMs = timeoutMs;
    this.callerSignal = callerSignal;
    this.signal = callerSignal ? AbortSignal.any([callerSignal, this.controller.signal]) : this.controller.signal;
  }

  arm(): void {
    this.disarm();
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, this.timeoutMs);
  }

  disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  dispose(): void {
    this.disarm();
  }

  /** Settles with `promise`, or rejects as soon as the request is aborted. */
  race<T>(promise: Promise<T>): Promise<T> {
    const signal = this.signal;
    if (signal.aborted) {
      promise.catch(() => undefined);
      return Promise.reject(createAbortError());
    }
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(createAbortError());
      signal.addEventListener("abort", onAbort, { once: true });
      promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  translate(error: unknown): QwenChatError {
    if (error instanceof QwenChatError) {
      return error;
    }
    if (this.callerSignal?.aborted) {
      return new QwenChatError("ABORTED", "Request interrupted by user.", { cause: error });
    }
    if (this.timedOut) {
      return new QwenChatError("REQUEST_TIMEOUT", `No response from server within ${this.timeoutMs}ms.`, {
        cause: error,
      });
    }
    return new QwenChatError("TRANSPORT_FAILURE", summarizeError(error), { cause: error });
  }
}

async function readBodyText(response: Response, guard: RequestGuard): Promise<string> {
  guard.arm();
  try {
    return await guard.race(response.text());
  } catch {
    return "";
  } finally {
    guard.disarm();
  }
}

function readCreatedConversationId(parsed: unknown): string | null {
  if (!isRecord(parsed) || parsed.success !== true || !isRecord(parsed.data)) {
    return null;
  }
  const id = parsed.data.id;
  return typeof id === "string" && id.trim() ? id.trim() : null;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
