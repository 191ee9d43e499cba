import { describe, expect, it, vi } from "vitest";
import { ConversationState, type CreateConversationResult } from "./conversation.js";
import { QwenChatError } from "./errors.js";

function succeedWith(id: string) {
  return vi.fn(async (): Promise<CreateConversationResult> => ({ ok: true, id }));
}

describe("ConversationState", () => {
  it("creates the conversation once until reset", async () => {
    const state = new ConversationState();
    const create = succeedWith("chat-1");

    expect(await state.ensureConversation(create)).toEqual({ ok: true, id: "chat-1" });
    expect(await state.ensureConversation(create)).toEqual({ ok: true, id: "chat-1" });
    expect(create).toHaveBeenCalledTimes(1);

    state.reset();
    await state.ensureConversation(create);
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("leaves the id unset when creation fails so a later call retries", async () => {
    const state = new ConversationState();
    const error = new QwenChatError("CONVERSATION_CREATION_FAILED", "Failed to create conversation (200)", {
      status: 200,
      bodySnippet: '{"success": false}',
    });
    const create = vi
      .fn(async (): Promise<CreateConversationResult> => ({ ok: true, id: "unused" }))
      .mockResolvedValueOnce({ ok: false, error })
      .mockResolvedValueOnce({ ok: true, id: "chat-2" });

    const first = await state.ensureConversation(create);
    expect(first).toEqual({ ok: false, error });
    expect(state.id).toBeNull();

    const second = await state.ensureConversation(create);
    expect(second).toEqual({ ok: true, id: "chat-2" });
    expect(state.id).toBe("chat-2");
  });

  it("shares one in-flight creation between concurrent callers", async () => {
    const state = new ConversationState();
    let resolveCreate: (result: CreateConversationResult) => void = () => undefined;
    const create = vi.fn(
      () =>
        new Promise<CreateConversationResult>((resolve) => {
          resolveCreate = resolve;
        }),
    );

    const first = state.ensureConversation(create);
    const second = state.ensureConversation(create);
    resolveCreate({ ok: true, id: "chat-3" });

    expect(await first).toEqual({ ok: true, id: "chat-3" });
    expect(await second).toEqual({ ok: true, id: "chat-3" });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("discards a creation that completes after a reset", async () => {
    const state = new ConversationState();
    let resolveCreate: (result: CreateConversationResult) => void = () => undefined;
    const pending = state.ensureConversation(
      () =>
        new Promise<CreateConversationResult>((resolve) => {
          resolveCreate = resolve;
        }),
    );

    state.reset();
    resolveCreate({ ok: true, id: "stale" });
    await pending;

    expect(state.id).toBeNull();
  });

  it("threads the parent pointer and clears it on reset", async () => {
    const state = new ConversationState();
    await state.ensureConversation(succeedWith("chat-4"));

    state.advanceParent("resp-1");
    state.advanceParent("resp-2");
    expect(state.snapshot()).toEqual({ id: "chat-4", parentTurnId: "resp-2" });

    state.reset();
    expect(state.snapshot()).toEqual({ id: null, parentTurnId: null });
  });

  it("drops parent updates from a turn sink taken before a reset", async () => {
    const state = new ConversationState();
    await state.ensureConversation(succeedWith("chat-5"));
    const staleSink = state.turnSink();

    state.reset();
    staleSink.advanceParent("resp-old");
    expect(state.parentTurnId).toBeNull();

    state.turnSink().advanceParent("resp-new");
    expect(state.parentTurnId).toBe("resp-new");
  });
});
