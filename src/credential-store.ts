import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Credentials } from "./chat-types.js";
import { summarizeError } from "./errors.js";

const COOKIES_FILE_NAME = "cookies.json";
const TOKEN_FILE_NAME = "token.txt";
const LAST_LOGIN_FILE_NAME = "last-login.txt";

const cookieMapSchema = z.record(z.string(), z.string());

export type SaveResult = { ok: true } | { ok: false; error: string };

export interface CredentialStore {
  load(): Promise<Credentials | null>;
  save(credentials: Credentials): Promise<SaveResult>;
  clear(): Promise<void>;
}

export class FileCredentialStore implements CredentialStore {
  constructor(private readonly dataDir: string) {}

  get cookiesFilePath(): string {
    return path.join(this.dataDir, COOKIES_FILE_NAME);
  }

  get tokenFilePath(): string {
    return path.join(this.dataDir, TOKEN_FILE_NAME);
  }

  get lastLoginFilePath(): string {
    return path.join(this.dataDir, LAST_LOGIN_FILE_NAME);
  }

  async load(): Promise<Credentials | null> {
    const rawCookies = await readOptionalFile(this.cookiesFilePath);
    if (rawCookies === null) {
      return null;
    }

    const cookies = parseCookieMap(rawCookies);
    if (!cookies) {
      return null;
    }

    const storedToken = (await readOptionalFile(this.tokenFilePath))?.trim() ?? "";
    const issuedAt = parseTimestamp(await readOptionalFile(this.lastLoginFilePath));

    return {
      cookies,
      token: storedToken || null,
      issuedAt,
    };
  }

  async save(credentials: Credentials): Promise<SaveResult> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await writeFileAtomic(this.cookiesFilePath, `${JSON.stringify(credentials.cookies, null, 2)}\n`);

      const token = credentials.token?.trim() ?? "";
      if (token) {
        await writeFileAtomic(this.tokenFilePath, token);
      } else {
        await fs.rm(this.tokenFilePath, { force: true });
      }

      if (credentials.issuedAt) {
        await writeFileAtomic(this.lastLoginFilePath, credentials.issuedAt.toISOString());
      } else {
        await fs.rm(this.lastLoginFilePath, { force: true });
      }
      return { ok: true };
    } catch (error) {
      return { ok: false, error: summarizeError(error) };
    }
  }

  async clear(): Promise<void> {
    await Promise.all(
      [this.cookiesFilePath, this.tokenFilePath, this.lastLoginFilePath].map((filePath) =>
        fs.rm(filePath, { force: true }),
      ),
    );
  }
}

/**
 * Keeps credentials in memory only. Useful for callers that acquire cookies
 * per process and for tests.
 */
export class MemoryCredentialStore implements CredentialStore {
  private stored: Credentials | null;

  constructor(initial: Credentials | null = null) {
    this.stored = initial ? cloneCredentials(initial) : null;
  }

  async load(): Promise<Credentials | null> {
    return this.stored ? cloneCredentials(this.stored) : null;
  }

  async save(credentials: Credentials): Promise<SaveResult> {
    this.stored = cloneCredentials(credentials);
    return { ok: true };
  }

  async clear(): Promise<void> {
    this.stored = null;
  }
}

function cloneCredentials(credentials: Credentials): Credentials {
  return {
    cookies: { ...credentials.cookies },
    token: credentials.token,
    issuedAt: credentials.issuedAt ? new Date(credentials.issuedAt.getTime()) : null,
  };
}

function parseCookieMap(raw: string): Record<string, string> | null {
  try {
    const parsed = cookieMapSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function parseTimestamp(raw: string | null): Date | null {
  const trimmed = raw?.trim() ?? "";
  if (!trimmed) {
    return null;
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tmpPath, contents, "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw error;
  }
}
