import type { DebugListener, ThinkingSettings } from "./chat-types.js";
import { getQwenConfig, type QwenConfig } from "./config.js";
import { ConversationState, type ConversationSnapshot } from "./conversation.js";
import { FileCredentialStore, type CredentialStore } from "./credential-store.js";
import { combineDebugListeners, createDebugLogger } from "./debug-log.js";
import { QwenChatError, assertNotAborted, formatChatError, toQwenChatError } from "./errors.js";
import { buildChatTurnPayload, buildCreateConversationPayload, createTurnRequest } from "./request-builder.js";
import { SessionManager } from "./session.js";
import { decodeChatStream } from "./stream-decoder.js";
import { QwenTransport } from "./transport.js";

export type ChatTurnOptions = {
  systemInstruction?: string;
  signal?: AbortSignal;
  onReasoningFlush?: (text: string) => void;
};

export type ChatTurnOutcome =
  | { ok: true; answer: string; reasoning: string }
  | { ok: false; error: QwenChatError; partialAnswer: string };

export type QwenChatClientOptions = {
  config: QwenConfig;
  session: SessionManager;
  transport: QwenTransport;
  conversation?: ConversationState;
  onDebug?: DebugListener;
  now?: () => Date;
};

export type CreateQwenChatClientOptions = {
  config?: QwenConfig;
  store?: CredentialStore;
  fetch?: typeof fetch;
  onDebug?: DebugListener;
  /** Also append debug events to this JSONL file. */
  debugLogFile?: string;
};

/**
 * One conversation against the chat web service. Turns on a client are
 * serialized; use separate clients for parallel conversations.
 */
export class QwenChatClient {
  private readonly config: QwenConfig;
  private readonly session: SessionManager;
  private readonly transport: QwenTransport;
  private readonly conversationState: ConversationState;
  private readonly onDebug: DebugListener | undefined;
  private readonly now: () => Date;
  private thinkingSettings: ThinkingSettings;
  private turnInFlight = false;

  constructor(options: QwenChatClientOptions) {
    this.config = options.config;
    this.session = options.session;
    this.transport = options.transport;
    this.conversationState = options.conversation ?? new ConversationState();
    this.onDebug = options.onDebug;
    this.now = options.now ?? (() => new Date());
    this.thinkingSettings = {
      enabled: options.config.thinkingEnabled,
      budget: options.config.thinkingBudget,
    };
  }

  static async create(options: CreateQwenChatClientOptions = {}): Promise<QwenChatClient> {
    const config = options.config ?? getQwenConfig();
    const onDebug = options.debugLogFile
      ? combineDebugListeners(options.onDebug, createDebugLogger(options.debugLogFile))
      : options.onDebug;
    const session = new SessionManager(options.store ?? new FileCredentialStore(config.dataDir), {
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
      policy: { maxAgeMs: config.sessionMaxAgeMs },
      account: { email: config.email, password: config.password },
      onDebug,
    });
    await session.load();

    const transport = new QwenTransport({
      baseUrl: config.baseUrl,
      timeoutMs: config.requestTimeoutMs,
      fetch: options.fetch,
      onDebug,
    });

    return new QwenChatClient({
      config,
      session,
      transport,
      onDebug,
    });
  }

  get sessionManager(): SessionManager {
    return this.session;
  }

  get conversation(): ConversationSnapshot {
    return this.conversationState.snapshot();
  }

  get thinking(): ThinkingSettings {
    return { ...this.thinkingSettings };
  }

  setThinking(enabled: boolean, budget = this.thinkingSettings.budget): void {
    if (!Number.isInteger(budget) || budget <= 0) {
      throw new RangeError(`Thinking budget must be a positive integer, received ${budget}.`);
    }
    this.thinkingSettings = { enabled, budget };
    this.onDebug?.({
      stage: "thinking_updated",
      data: { enabled, budget },
    });
  }

  newConversation(): void {
    this.conversationState.reset();
    this.onDebug?.({ stage: "conversation_reset", data: {} });
  }

  async chat(prompt: string, options: ChatTurnOptions = {}): Promise<ChatTurnOutcome> {
    if (this.turnInFlight) {
      return failed(new QwenChatError("TURN_IN_PROGRESS", "A turn is already in progress for this conversation."));
    }

    this.turnInFlight = true;
    try {
      return await this.runTurn(prompt, options);
    } catch (error) {
      return failed(toQwenChatError(error, "TRANSPORT_FAILURE"));
    } finally {
      this.turnInFlight = false;
    }
  }

  /**
   * Programmatic entry point: the answer text, or an `Error: ...` line. A turn
   * that failed mid-stream keeps the answer decoded so far ahead of the error.
   */
  async sendTurn(prompt: string, systemInstruction?: string): Promise<string> {
    const outcome = await this.chat(prompt, { systemInstruction });
    if (outcome.ok) {
      return outcome.answer;
    }
    const message = formatChatError(outcome.error);
    return outcome.partialAnswer ? `${outcome.partialAnswer}\n\n${message}` : message;
  }

  private async runTurn(prompt: string, options: ChatTurnOptions): Promise<ChatTurnOutcome> {
    assertNotAborted(options.signal);
    if (!this.session.hasCookies()) {
      return failed(new QwenChatError("CREDENTIALS_MISSING", "No cookies found - please login first."));
    }

    const parentSink = this.conversationState.turnSink();
    const created = await this.conversationState.ensureConversation(() =>
      this.transport.createConversation(
        this.session.headers(),
        buildCreateConversationPayload({
          model: this.config.model,
          timestampMs: this.now().getTime(),
        }),
        options.signal,
      ),
    );
    if (!created.ok) {
      return failed(created.error);
    }

    const request = createTurnRequest({
      prompt,
      systemInstruction: options.systemInstruction,
      conversation: { id: created.id, parentTurnId: this.conversationState.parentTurnId },
      thinking: this.thinkingSettings,
      model: this.config.model,
      now: this.now(),
    });

    const streamed = await this.transport.streamChatTurn(
      this.session.headers(),
      buildChatTurnPayload(request),
      created.id,
      options.signal,
    );
    if (!streamed.ok) {
      return failed(streamed.error);
    }

    const decoded = await decodeChatStream(streamed.lines, {
      conversation: parentSink,
      onReasoningFlush: options.onReasoningFlush,
      onDebug: this.onDebug,
      signal: options.signal,
    });
    if (!decoded.ok) {
      return failed(decoded.error, decoded.answerText);
    }

    return {
      ok: true,
      answer: decoded.answerText,
      reasoning: decoded.reasoningText,
    };
  }
}

function failed(error: QwenChatError, partialAnswer = ""): ChatTurnOutcome {
  return { ok: false, error, partialAnswer };
}
