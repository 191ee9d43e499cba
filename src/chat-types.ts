export type StreamPhase = "reasoning" | "answer";

export type Credentials = {
  cookies: Record<string, string>;
  token: string | null;
  issuedAt: Date | null;
};

export type SessionPolicy = {
  maxAgeMs: number;
};

export type ThinkingSettings = {
  enabled: boolean;
  budget: number;
};

export type ChatTurnRequest = {
  prompt: string;
  systemInstruction?: string;
  thinkingEnabled: boolean;
  thinkingBudget: number;
  conversationId: string;
  parentTurnId: string | null;
  messageId: string;
  childId: string;
  model: string;
  timestampSeconds: number;
};

export type ContentDelta = {
  phase: StreamPhase;
  text: string;
  finished: boolean;
};

export type StreamEvent =
  | { type: "session_created"; parentId: string }
  | { type: "content"; deltas: ContentDelta[] }
  | { type: "unparseable"; payload: string }
  | { type: "end" }
  | { type: "ignored" };

export type AccumulatedResult = {
  reasoningText: string;
  answerText: string;
  currentPhase: StreamPhase | null;
};

export type DebugEvent = {
  stage: string;
  data: unknown;
};

export type DebugListener = (event: DebugEvent) => void;
