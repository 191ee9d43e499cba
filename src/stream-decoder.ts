import type { AccumulatedResult, ContentDelta, DebugListener, StreamEvent, StreamPhase } from "./chat-types.js";
import { QwenChatError, toQwenChatError } from "./errors.js";

const EVENT_PREFIX = "data:";
const STREAM_SENTINEL = "[DONE]";
const SESSION_CREATED_KEY = "response.created";
const FINISHED_STATUS = "finished";
const REASONING_WIRE_PHASES = new Set(["think", "reasoning"]);
const MALFORMED_PREVIEW_CHARS = 120;

export type DecoderState = "idle" | "awaiting" | "done";

export type StreamTermination = "sentinel" | "finished" | "exhausted";

/** The slice of conversation state the decoder is allowed to touch. */
export type ParentPointerSink = {
  advanceParent(parentTurnId: string): void;
};

export type StreamDecoderOptions = {
  conversation: ParentPointerSink;
  onReasoningFlush?: (text: string) => void;
  onDebug?: DebugListener;
};

export type DecodedTurn = {
  answerText: string;
  reasoningText: string;
  termination: StreamTermination;
};

export type DecodeOutcome =
  | ({ ok: true } & DecodedTurn)
  | { ok: false; error: QwenChatError; answerText: string; reasoningText: string };

export function parseStreamLine(line: string): StreamEvent {
  const trimmed = line.trim();
  if (!trimmed || !trimmed.startsWith(EVENT_PREFIX)) {
    return { type: "ignored" };
  }

  const payload = trimmed.slice(EVENT_PREFIX.length).trim();
  if (!payload) {
    return { type: "ignored" };
  }
  if (payload === STREAM_SENTINEL) {
    return { type: "end" };
  }

  const parsed = safeParseJson(payload);
  if (!isRecord(parsed)) {
    return { type: "unparseable", payload };
  }

  const created = parsed[SESSION_CREATED_KEY];
  if (isRecord(created)) {
    const parentId = typeof created.response_id === "string" ? created.response_id.trim() : "";
    return parentId ? { type: "session_created", parentId } : { type: "ignored" };
  }

  if (Array.isArray(parsed.choices)) {
    return {
      type: "content",
      deltas: parsed.choices.map((choice) => toContentDelta(choice)),
    };
  }

  return { type: "ignored" };
}

export function normalizePhase(rawPhase: unknown): StreamPhase {
  if (typeof rawPhase === "string" && REASONING_WIRE_PHASES.has(rawPhase.trim().toLowerCase())) {
    return "reasoning";
  }
  return "answer";
}

/**
 * Line-at-a-time decoder for one chat turn. Reasoning is surfaced as a block
 * each time the stream leaves the reasoning phase; answer text is only
 * returned once the stream is over.
 */
export class StreamDecoder {
  private readonly options: StreamDecoderOptions;
  private decoderState: DecoderState = "idle";
  private termination: StreamTermination = "exhausted";
  private result: AccumulatedResult = {
    reasoningText: "",
    answerText: "",
    currentPhase: null,
  };
  private flushedReasoningChars = 0;
  private malformedCount = 0;

  constructor(options: StreamDecoderOptions) {
    this.options = options;
  }

  get state(): DecoderState {
    return this.decoderState;
  }

  get currentPhase(): StreamPhase | null {
    return this.result.currentPhase;
  }

  get answerText(): string {
    return this.result.answerText;
  }

  get reasoningText(): string {
    return this.result.reasoningText;
  }

  get malformedLines(): number {
    return this.malformedCount;
  }

  /** Returns false once the decoder wants no further lines. */
  push(line: string): boolean {
    if (this.decoderState === "done") {
      return false;
    }
    this.decoderState = "awaiting";

    const event = parseStreamLine(line);
    switch (event.type) {
      case "ignored":
        return true;
      case "end":
        this.termination = "sentinel";
        this.decoderState = "done";
        return false;
      case "unparseable":
        this.malformedCount += 1;
        this.options.onDebug?.({
          stage: "malformed_event",
          data: { preview: event.payload.slice(0, MALFORMED_PREVIEW_CHARS) },
        });
        return true;
      case "session_created":
        this.options.conversation.advanceParent(event.parentId);
        this.options.onDebug?.({
          stage: "parent_advanced",
          data: { parentId: event.parentId },
        });
        return true;
      case "content":
        return this.applyDeltas(event.deltas);
    }
  }

  finish(): DecodedTurn {
    this.decoderState = "done";
    return {
      answerText: this.result.answerText,
      reasoningText: this.result.reasoningText,
      termination: this.termination,
    };
  }

  private applyDeltas(deltas: ContentDelta[]): boolean {
    for (const delta of deltas) {
      if (delta.phase !== this.result.currentPhase) {
        if (this.result.currentPhase === "reasoning") {
          this.flushReasoning();
        }
        this.result.currentPhase = delta.phase;
      }

      if (delta.phase === "reasoning") {
        this.result.reasoningText += delta.text;
      } else {
        this.result.answerText += delta.text;
      }

      if (delta.finished && delta.phase === "answer") {
        this.termination = "finished";
        this.decoderState = "done";
        return false;
      }
    }
    return true;
  }

  private flushReasoning(): void {
    const block = this.result.reasoningText.slice(this.flushedReasoningChars);
    this.flushedReasoningChars = this.result.reasoningText.length;
    if (!block) {
      return;
    }
    this.options.onDebug?.({
      stage: "phase_flush",
      data: { phase: "reasoning", chars: block.length },
    });
    this.options.onReasoningFlush?.(block);
  }
}

/**
 * Drives a decoder over a lazily produced line source. Stops reading at the
 * sentinel or at a finished answer, which also releases the source.
 */
export async function decodeChatStream(
  lines: AsyncIterable<string>,
  options: StreamDecoderOptions & { signal?: AbortSignal },
): Promise<DecodeOutcome> {
  const decoder = new StreamDecoder(options);

  try {
    for await (const line of lines) {
      if (options.signal?.aborted) {
        throw toQwenChatError(options.signal.reason, "ABORTED");
      }
      if (!decoder.push(line)) {
        break;
      }
    }
  } catch (error) {
    const failure = toQwenChatError(error, "TRANSPORT_FAILURE");
    options.onDebug?.({
      stage: "stream_failed",
      data: {
        code: failure.code,
        message: failure.message,
        partialAnswerChars: decoder.answerText.length,
      },
    });
    const partial = decoder.finish();
    return {
      ok: false,
      error: failure,
      answerText: partial.answerText,
      reasoningText: partial.reasoningText,
    };
  }

  const decoded = decoder.finish();
  options.onDebug?.({
    stage: "stream_finished",
    data: {
      termination: decoded.termination,
      answerChars: decoded.answerText.length,
      reasoningChars: decoded.reasoningText.length,
      malformedLines: decoder.malformedLines,
    },
  });
  return { ok: true, ...decoded };
}

function toContentDelta(choice: unknown): ContentDelta {
  const delta: Record<string, unknown> = isRecord(choice) && isRecord(choice.delta) ? choice.delta : {};
  return {
    phase: normalizePhase(delta.phase),
    text: typeof delta.content === "string" ? delta.content : "",
    finished: delta.status === FINISHED_STATUS,
  };
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
