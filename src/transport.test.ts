import { describe, expect, it, vi } from "vitest";
import { buildChatTurnPayload, buildCreateConversationPayload } from "./request-builder.js";
import { QwenTransport } from "./transport.js";

type FetchInput = string | URL | Request;

const encoder = new TextEncoder();
const HEADERS = { "Content-Type": "application/json" };

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

function transportWith(fetchImpl: (input: FetchInput, init?: RequestInit) => Promise<Response>, timeoutMs = 1_000) {
  return new QwenTransport({ baseUrl: "https://chat.example.test/", timeoutMs, fetch: fetchImpl });
}

function neverResolves(): Promise<Response> {
  return new Promise<Response>(() => undefined);
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) {
    out.push(line);
  }
  return out;
}

const turnPayload = buildChatTurnPayload({
  prompt: "hi",
  thinkingEnabled: false,
  thinkingBudget: 81920,
  conversationId: "chat-1",
  parentTurnId: null,
  messageId: "msg-1",
  childId: "child-1",
  model: "qwen3-max-2025-10-30",
  timestampSeconds: 1_700_000_000,
});

const createPayload = buildCreateConversationPayload({ model: "qwen3-max-2025-10-30", timestampMs: 1_700_000_000_000 });

describe("QwenTransport.createConversation", () => {
  it("posts the creation payload and returns the new id", async () => {
    const fetchMock = vi.fn(
      async (_input: FetchInput, _init?: RequestInit) =>
        new Response(JSON.stringify({ success: true, data: { id: "chat-1" } }), { status: 200 }),
    );

    const result = await transportWith(fetchMock).createConversation(HEADERS, createPayload);

    expect(result).toEqual({ ok: true, id: "chat-1" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://chat.example.test/api/v2/chats/new");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify(createPayload));
  });

  it("fails when the body does not report success", async () => {
    const result = await transportWith(async () => new Response('{"success": false}', { status: 200 })).createConversation(
      HEADERS,
      createPayload,
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CONVERSATION_CREATION_FAILED");
      expect(result.error.message).toBe("Failed to create conversation (200)");
      expect(result.error.bodySnippet).toBe('{"success": false}');
    }
  });

  it("carries the status and a compacted body snippet on HTTP errors", async () => {
    const result = await transportWith(
      async () => new Response("<html>\n  forbidden\n</html>", { status: 403 }),
    ).createConversation(HEADERS, createPayload);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(403);
      expect(result.error.bodySnippet).toBe("<html> forbidden </html>");
    }
  });

  it("reports network errors as creation failures", async () => {
    const result = await transportWith(async () => {
      throw new TypeError("fetch failed");
    }).createConversation(HEADERS, createPayload);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CONVERSATION_CREATION_FAILED");
      expect(result.error.message).toBe("Error creating conversation: fetch failed");
    }
  });

  it("times out a request that never answers", async () => {
    const result = await transportWith(neverResolves, 20).createConversation(HEADERS, createPayload);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("REQUEST_TIMEOUT");
      expect(result.error.message).toBe("No response from server within 20ms.");
    }
  });
});

describe("QwenTransport.streamChatTurn", () => {
  it("targets the completions endpoint with the conversation id", async () => {
    const fetchMock = vi.fn(
      async (_input: FetchInput, _init?: RequestInit) => new Response(streamOf(["data: [DONE]\n"]), { status: 200 }),
    );

    const result = await transportWith(fetchMock).streamChatTurn(HEADERS, turnPayload, "chat-1");

    expect(result.ok).toBe(true);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://chat.example.test/api/v2/chat/completions?chat_id=chat-1");
  });

  it("yields lines split across chunks and strips carriage returns", async () => {
    const result = await transportWith(
      async () => new Response(streamOf(["data: a\r\nda", "ta: b\n", "\n", "tail"]), { status: 200 }),
    ).streamChatTurn(HEADERS, turnPayload, "chat-1");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(await collect(result.lines)).toEqual(["data: a", "data: b", "", "tail"]);
    }
  });

  it("returns a failure for non-200 responses", async () => {
    const result = await transportWith(async () => new Response("server exploded", { status: 500 })).streamChatTurn(
      HEADERS,
      turnPayload,
      "chat-1",
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("TRANSPORT_FAILURE");
      expect(result.error.message).toBe("Request failed with status 500");
      expect(result.error.status).toBe(500);
      expect(result.error.bodySnippet).toBe("server exploded");
    }
  });

  it("reports a caller abort distinctly from a timeout", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await transportWith(neverResolves).streamChatTurn(HEADERS, turnPayload, "chat-1", controller.signal);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("ABORTED");
    }
  });

  it("times out a stream that stalls between chunks", async () => {
    const stalled = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode("data: first\n"));
      },
    });
    const result = await transportWith(async () => new Response(stalled, { status: 200 }), 30).streamChatTurn(
      HEADERS,
      turnPayload,
      "chat-1",
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      const seen: string[] = [];
      await expect(
        (async () => {
          for await (const line of result.lines) {
            seen.push(line);
          }
        })(),
      ).rejects.toMatchObject({ code: "REQUEST_TIMEOUT" });
      expect(seen).toEqual(["data: first"]);
    }
  });

  it("cancels the body when the consumer stops early", async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode("one\ntwo\n"));
      },
      cancel() {
        cancelled = true;
      },
    });
    const result = await transportWith(async () => new Response(body, { status: 200 })).streamChatTurn(
      HEADERS,
      turnPayload,
      "chat-1",
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      for await (const line of result.lines) {
        expect(line).toBe("one");
        break;
      }
    }
    expect(cancelled).toBe(true);
  });
});
