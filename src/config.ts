import os from "node:os";
import path from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const envSchema = z.object({
  QWEN_BASE_URL: z.string().url().default("https://chat.qwen.ai"),
  QWEN_MODEL: z.string().min(1).default("qwen3-max-2025-10-30"),
  QWEN_DATA_DIR: z.string().min(1).optional(),
  QWEN_SESSION_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
  QWEN_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  QWEN_THINKING_ENABLED: z.enum(["true", "false"]).default("false"),
  QWEN_THINKING_BUDGET: z.coerce.number().int().positive().default(81_920),
  QWEN_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  QWEN_EMAIL: z.string().optional(),
  QWEN_PASSWORD: z.string().optional(),
});

export type QwenConfig = {
  baseUrl: string;
  model: string;
  dataDir: string;
  sessionMaxAgeMs: number;
  requestTimeoutMs: number;
  thinkingEnabled: boolean;
  thinkingBudget: number;
  userAgent: string;
  email?: string;
  password?: string;
};

export function loadQwenConfig(env: Record<string, string | undefined>): QwenConfig {
  const parsed = envSchema.safeParse(stripBlankValues(env));
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid qwenweb configuration: ${invalid.join("; ")}`);
  }

  const values = parsed.data;
  return {
    baseUrl: values.QWEN_BASE_URL.replace(/\/+$/, ""),
    model: values.QWEN_MODEL.trim(),
    dataDir: values.QWEN_DATA_DIR?.trim() || path.join(os.homedir(), ".qwenweb"),
    sessionMaxAgeMs: Math.round(values.QWEN_SESSION_MAX_AGE_HOURS * 60 * 60 * 1000),
    requestTimeoutMs: values.QWEN_REQUEST_TIMEOUT_MS,
    thinkingEnabled: values.QWEN_THINKING_ENABLED === "true",
    thinkingBudget: values.QWEN_THINKING_BUDGET,
    userAgent: values.QWEN_USER_AGENT,
    email: values.QWEN_EMAIL?.trim() || undefined,
    password: values.QWEN_PASSWORD || undefined,
  };
}

let cachedConfig: QwenConfig | null = null;

export function getQwenConfig(): QwenConfig {
  if (!cachedConfig) {
    loadEnv();
    cachedConfig = loadQwenConfig(process.env);
  }
  return cachedConfig;
}

// Empty assignments in .env files mean "use the default".
function stripBlankValues(env: Record<string, string | undefined>): Record<string, string> {
  const next: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim()) {
      next[key] = value;
    }
  }
  return next;
}
