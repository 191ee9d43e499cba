import type { QwenChatError } from "./errors.js";
import type { ParentPointerSink } from "./stream-decoder.js";

export type ConversationSnapshot = {
  id: string | null;
  parentTurnId: string | null;
};

export type CreateConversationResult =
  | { ok: true; id: string }
  | { ok: false; error: QwenChatError };

/**
 * Threading state for one server-side conversation. A client owns exactly one
 * of these; run at most one turn against it at a time.
 */
export class ConversationState {
  private conversationId: string | null = null;
  private parentId: string | null = null;
  private pendingCreation: Promise<CreateConversationResult> | null = null;
  private generation = 0;

  get id(): string | null {
    return this.conversationId;
  }

  get parentTurnId(): string | null {
    return this.parentId;
  }

  snapshot(): ConversationSnapshot {
    return {
      id: this.conversationId,
      parentTurnId: this.parentId,
    };
  }

  async ensureConversation(
    createFn: () => Promise<CreateConversationResult>,
  ): Promise<CreateConversationResult> {
    if (this.conversationId) {
      return { ok: true, id: this.conversationId };
    }
    if (this.pendingCreation) {
      return this.pendingCreation;
    }

    const creation = this.runCreation(createFn);
    this.pendingCreation = creation;
    try {
      return await creation;
    } finally {
      if (this.pendingCreation === creation) {
        this.pendingCreation = null;
      }
    }
  }

  advanceParent(parentTurnId: string): void {
    this.parentId = parentTurnId;
  }

  /**
   * Parent updates for the turn starting now. Once the state is reset the
   * sink drops them, so a turn still streaming cannot leak its parent id into
   * the next conversation.
   */
  turnSink(): ParentPointerSink {
    const generation = this.generation;
    return {
      advanceParent: (parentTurnId) => {
        if (this.generation === generation) {
          this.advanceParent(parentTurnId);
        }
      },
    };
  }

  reset(): void {
    this.conversationId = null;
    this.parentId = null;
    this.pendingCreation = null;
    this.generation += 1;
  }

  private async runCreation(
    createFn: () => Promise<CreateConversationResult>,
  ): Promise<CreateConversationResult> {
    const generation = this.generation;
    const result = await createFn();
    // a reset while the call was in flight discards its result
    if (result.ok && this.generation === generation) {
      this.conversationId = result.id;
    }
    return result;
  }
}
