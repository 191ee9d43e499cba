import { describe, expect, it, vi } from "vitest";
import {
  defaultTokenLookupStrategies,
  directKeyStrategy,
  findToken,
  nestedKeyStrategy,
  type KeyValueReader,
} from "./token-lookup.js";

function storageOf(entries: Record<string, string>): KeyValueReader {
  return async (key) => entries[key] ?? null;
}

describe("findToken", () => {
  it("prefers direct keys in order", async () => {
    const result = await findToken(storageOf({ jwt: "test-jwt", token: "test-token" }));
    expect(result).toEqual({ token: "test-token", strategy: "key:token" });
  });

  it("falls back to nested JSON objects", async () => {
    const result = await findToken(storageOf({ auth: JSON.stringify({ value: "test-nested" }) }));
    expect(result).toEqual({ token: "test-nested", strategy: "json:auth" });
  });

  it("returns null when no strategy matches", async () => {
    expect(await findToken(storageOf({ user: "not json", theme: "dark" }))).toBeNull();
  });

  it("treats a throwing lookup as a miss and keeps going", async () => {
    const storage = vi.fn(async (key: string) => {
      if (key === "access_token") {
        throw new Error("storage unavailable");
      }
      return key === "token" ? "test-token" : null;
    });

    expect(await findToken(storage)).toEqual({ token: "test-token", strategy: "key:token" });
  });

  it("stops at the first hit", async () => {
    const storage = vi.fn(async (key: string) => (key === "access_token" ? "test-first" : null));
    await findToken(storage);
    expect(storage).toHaveBeenCalledTimes(1);
  });
});

describe("strategies", () => {
  it("ignores blank direct values", async () => {
    expect(await directKeyStrategy("token").lookup(storageOf({ token: "   " }))).toBeNull();
  });

  it("reads the first non-empty nested field", async () => {
    const strategy = nestedKeyStrategy("session", ["access_token", "token"]);
    const storage = storageOf({ session: JSON.stringify({ access_token: "", token: " test-token " }) });
    expect(await strategy.lookup(storage)).toBe("test-token");
  });

  it("lists direct keys before nested keys", () => {
    expect(defaultTokenLookupStrategies().map((strategy) => strategy.label)).toEqual([
      "key:access_token",
      "key:token",
      "key:auth_token",
      "key:userToken",
      "key:jwt",
      "json:user",
      "json:auth",
      "json:session",
    ]);
  });
});
