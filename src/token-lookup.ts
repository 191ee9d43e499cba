/**
 * Token discovery policy for login collaborators. A browser session keeps the
 * bearer token under one of several storage keys depending on the web app
 * build, so lookups are expressed as an ordered list of strategies and the
 * first hit wins.
 */

export type KeyValueReader = (key: string) => Promise<string | null>;

export type TokenLookupStrategy = {
  label: string;
  lookup: (storage: KeyValueReader) => Promise<string | null>;
};

const DIRECT_TOKEN_KEYS = ["access_token", "token", "auth_token", "userToken", "jwt"];
const NESTED_TOKEN_KEYS = ["user", "auth", "session"];
const NESTED_TOKEN_FIELDS = ["access_token", "token", "value"];

export function directKeyStrategy(key: string): TokenLookupStrategy {
  return {
    label: `key:${key}`,
    lookup: async (storage) => {
      const value = await storage(key);
      return readNonEmpty(value);
    },
  };
}

export function nestedKeyStrategy(key: string, fields: string[]): TokenLookupStrategy {
  return {
    label: `json:${key}`,
    lookup: async (storage) => {
      const raw = await storage(key);
      if (!raw) {
        return null;
      }
      const parsed = safeParseJson(raw);
      if (!isRecord(parsed)) {
        return null;
      }
      for (const field of fields) {
        const candidate = readNonEmpty(parsed[field]);
        if (candidate) {
          return candidate;
        }
      }
      return null;
    },
  };
}

export function defaultTokenLookupStrategies(): TokenLookupStrategy[] {
  return [
    ...DIRECT_TOKEN_KEYS.map((key) => directKeyStrategy(key)),
    ...NESTED_TOKEN_KEYS.map((key) => nestedKeyStrategy(key, NESTED_TOKEN_FIELDS)),
  ];
}

export async function findToken(
  storage: KeyValueReader,
  strategies: TokenLookupStrategy[] = defaultTokenLookupStrategies(),
): Promise<{ token: string; strategy: string } | null> {
  for (const strategy of strategies) {
    let token: string | null = null;
    try {
      token = await strategy.lookup(storage);
    } catch {
      // a failing lookup is a miss
      continue;
    }
    if (token) {
      return { token, strategy: strategy.label };
    }
  }
  return null;
}

function readNonEmpty(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
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
