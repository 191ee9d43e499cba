import { randomUUID } from "node:crypto";
import type { Credentials, DebugListener, SessionPolicy } from "./chat-types.js";
import type { CredentialStore, SaveResult } from "./credential-store.js";
import { QwenChatError, summarizeError } from "./errors.js";

/** Account details a login provider may use to sign in unattended. */
export type LoginAccount = {
  email?: string;
  password?: string;
};

/**
 * Implemented by whatever performs the interactive login (browser automation
 * in practice). Returns null when the login did not produce credentials.
 */
export interface LoginProvider {
  login(account: LoginAccount): Promise<Credentials | null>;
}

const TOKEN_COOKIE_NAME = "token";

export type SessionManagerOptions = {
  baseUrl: string;
  userAgent: string;
  policy: SessionPolicy;
  account?: LoginAccount;
  now?: () => Date;
  onDebug?: DebugListener;
};

export type EnsureSessionResult =
  | { ok: true; reauthenticated: false }
  | { ok: true; reauthenticated: true; persisted: boolean }
  | { ok: false; error: QwenChatError };

export class SessionManager {
  private readonly store: CredentialStore;
  private readonly options: SessionManagerOptions;
  private current: Credentials | null = null;

  constructor(store: CredentialStore, options: SessionManagerOptions) {
    this.store = store;
    this.options = options;
  }

  get credentials(): Credentials | null {
    return this.current;
  }

  hasCookies(): boolean {
    return Boolean(this.current && Object.keys(this.current.cookies).length > 0);
  }

  async load(): Promise<Credentials | null> {
    try {
      this.current = await this.store.load();
    } catch (error) {
      this.current = null;
      this.options.onDebug?.({
        stage: "credentials_unreadable",
        data: { error: summarizeError(error) },
      });
    }
    return this.current;
  }

  headers(): Record<string, string> {
    const baseUrl = this.options.baseUrl;
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      Origin: baseUrl,
      Referer: `${baseUrl}/`,
      "User-Agent": this.options.userAgent,
      "X-Request-Id": randomUUID(),
      "X-Accel-Buffering": "no",
      source: "web",
    };

    const token = this.bearerToken();
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    const cookieHeader = serializeCookies(this.current?.cookies ?? {});
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }
    return headers;
  }

  needsReauth(): boolean {
    const credentials = this.current;
    if (!credentials || Object.keys(credentials.cookies).length === 0 || !credentials.issuedAt) {
      return true;
    }
    const ageMs = this.now().getTime() - credentials.issuedAt.getTime();
    return ageMs > this.options.policy.maxAgeMs;
  }

  async recordSuccessfulLogin(credentials: Omit<Credentials, "issuedAt">): Promise<SaveResult> {
    const next: Credentials = {
      cookies: { ...credentials.cookies },
      token: credentials.token?.trim() || null,
      issuedAt: this.now(),
    };
    this.current = next;

    const saved = await this.store.save(next);
    this.options.onDebug?.({
      stage: "login_recorded",
      data: {
        cookieCount: Object.keys(next.cookies).length,
        hasToken: next.token !== null,
        persisted: saved.ok,
        error: saved.ok ? undefined : saved.error,
      },
    });
    return saved;
  }

  async ensureSession(loginProvider?: LoginProvider): Promise<EnsureSessionResult> {
    if (!this.needsReauth()) {
      return { ok: true, reauthenticated: false };
    }

    this.options.onDebug?.({
      stage: "reauth_required",
      data: {
        hasCredentials: this.current !== null,
        issuedAt: this.current?.issuedAt?.toISOString() ?? null,
      },
    });

    if (!loginProvider) {
      return {
        ok: false,
        error: new QwenChatError("CREDENTIALS_MISSING", "Session expired and no login provider is configured."),
      };
    }

    let acquired: Credentials | null;
    try {
      acquired = await loginProvider.login({ ...this.options.account });
    } catch (error) {
      return {
        ok: false,
        error: new QwenChatError("CREDENTIALS_MISSING", `Login failed: ${summarizeError(error)}`, { cause: error }),
      };
    }

    if (!acquired || Object.keys(acquired.cookies).length === 0) {
      return {
        ok: false,
        error: new QwenChatError("CREDENTIALS_MISSING", "Login did not return any cookies."),
      };
    }

    const saved = await this.recordSuccessfulLogin(acquired);
    return { ok: true, reauthenticated: true, persisted: saved.ok };
  }

  /** The stored token, else the `token` cookie the web app also sets. */
  bearerToken(): string | null {
    const credentials = this.current;
    if (!credentials) {
      return null;
    }
    return credentials.token?.trim() || credentials.cookies[TOKEN_COOKIE_NAME]?.trim() || null;
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }
}

export function serializeCookies(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .filter(([name]) => name.trim())
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}
