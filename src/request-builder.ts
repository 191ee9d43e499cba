import { randomUUID } from "node:crypto";
import type { ChatTurnRequest, ThinkingSettings } from "./chat-types.js";
import type { ConversationSnapshot } from "./conversation.js";

const DEFAULT_CONVERSATION_TITLE = "New Chat";
const CHAT_MODE = "normal";
const CHAT_TYPE = "t2t";
const PROTOCOL_VERSION = "2.1";

export type CreateConversationPayload = {
  title: string;
  models: string[];
  chat_mode: string;
  chat_type: string;
  timestamp: number;
  project_id: string;
};

export type FeatureConfig = {
  thinking_enabled: boolean;
  output_schema: "phase";
  research_mode: "normal";
  thinking_budget?: number;
};

export type ChatTurnMessage = {
  fid: string;
  parentId: string | null;
  childrenIds: string[];
  role: "user";
  content: string;
  user_action: "chat";
  files: unknown[];
  timestamp: number;
  models: string[];
  chat_type: string;
  feature_config: FeatureConfig;
  extra: { meta: { subChatType: string } };
  sub_chat_type: string;
  parent_id: string | null;
};

export type ChatTurnPayload = {
  stream: true;
  version: string;
  incremental_output: true;
  chat_id: string;
  chat_mode: string;
  model: string;
  parent_id: string | null;
  messages: ChatTurnMessage[];
  timestamp: number;
};

/**
 * The chat endpoint accepts one text field per turn, so a system instruction
 * is folded into the user content ahead of the request.
 */
export function composePrompt(prompt: string, systemInstruction?: string): string {
  const system = systemInstruction?.trim();
  if (!system) {
    return prompt;
  }
  return `[System Instructions: ${system}]\n\nUser Request: ${prompt}`;
}

export function buildCreateConversationPayload(input: {
  model: string;
  timestampMs: number;
  title?: string;
}): CreateConversationPayload {
  return {
    title: input.title?.trim() || DEFAULT_CONVERSATION_TITLE,
    models: [input.model],
    chat_mode: CHAT_MODE,
    chat_type: CHAT_TYPE,
    timestamp: input.timestampMs,
    project_id: "",
  };
}

export function buildFeatureConfig(thinking: ThinkingSettings): FeatureConfig {
  const featureConfig: FeatureConfig = {
    thinking_enabled: thinking.enabled,
    output_schema: "phase",
    research_mode: "normal",
  };
  if (thinking.enabled) {
    featureConfig.thinking_budget = thinking.budget;
  }
  return featureConfig;
}

export function buildChatTurnPayload(request: ChatTurnRequest): ChatTurnPayload {
  const featureConfig = buildFeatureConfig({
    enabled: request.thinkingEnabled,
    budget: request.thinkingBudget,
  });

  return {
    stream: true,
    version: PROTOCOL_VERSION,
    incremental_output: true,
    chat_id: request.conversationId,
    chat_mode: CHAT_MODE,
    model: request.model,
    parent_id: request.parentTurnId,
    messages: [
      {
        fid: request.messageId,
        parentId: request.parentTurnId,
        childrenIds: [request.childId],
        role: "user",
        content: composePrompt(request.prompt, request.systemInstruction),
        user_action: "chat",
        files: [],
        timestamp: request.timestampSeconds,
        models: [request.model],
        chat_type: CHAT_TYPE,
        feature_config: featureConfig,
        extra: { meta: { subChatType: CHAT_TYPE } },
        sub_chat_type: CHAT_TYPE,
        parent_id: request.parentTurnId,
      },
    ],
    timestamp: request.timestampSeconds,
  };
}

export function createTurnRequest(input: {
  prompt: string;
  systemInstruction?: string;
  conversation: ConversationSnapshot & { id: string };
  thinking: ThinkingSettings;
  model: string;
  now?: Date;
}): ChatTurnRequest {
  const now = input.now ?? new Date();
  return {
    prompt: input.prompt,
    systemInstruction: input.systemInstruction,
    thinkingEnabled: input.thinking.enabled,
    thinkingBudget: input.thinking.budget,
    conversationId: input.conversation.id,
    parentTurnId: input.conversation.parentTurnId,
    messageId: randomUUID(),
    childId: randomUUID(),
    model: input.model,
    timestampSeconds: Math.floor(now.getTime() / 1000),
  };
}
