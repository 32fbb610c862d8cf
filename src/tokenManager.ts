import { AuthError, TransportError, errMessage } from "./errors.js";
import { RequestTimeoutError, isDebugEnabled, isRecord, parseJson, timedFetch } from "./httpFetch.js";
import { Mutex } from "./mutex.js";
import type { Credentials, Token } from "./types.js";

export const DEFAULT_TOKEN_URL = "https://kc.elering.ee/realms/elering-sso/protocol/openid-connect/token";

// Refresh this long before the server-side expiry.
export const TOKEN_EXPIRY_MARGIN_MS = 30_000;

const DEFAULT_EXPIRES_IN_S = 300;

function parseExpiresIn(v: unknown): number {
  const n = typeof v === "string" ? Number(v) : v;
  if (typeof n === "number" && Number.isFinite(n) && n > 0) return n;
  return DEFAULT_EXPIRES_IN_S;
}

export type TokenManagerOptions = {
  timeoutMs?: number;
  safetyMarginMs?: number;
};

/**
 * Client-credentials token cache. At most one token request is in flight:
 * callers queue on the mutex and pick up the token the first one fetched.
 */
export class TokenManager {
  private readonly tokenUrl: string;
  private readonly safetyMarginMs: number;
  private readonly timeoutMs?: number;
  private readonly mutex = new Mutex();

  private token?: Token;
  private refreshCount = 0;

  constructor(
    private readonly credentials: Credentials,
    opts: TokenManagerOptions = {},
  ) {
    this.tokenUrl = credentials.tokenUrl ?? DEFAULT_TOKEN_URL;
    this.safetyMarginMs = opts.safetyMarginMs ?? TOKEN_EXPIRY_MARGIN_MS;
    this.timeoutMs = opts.timeoutMs;
  }

  /** Number of token requests sent so far. */
  get refreshes(): number {
    return this.refreshCount;
  }

  async getValidToken(): Promise<Token> {
    const cached = this.usableToken();
    if (cached) return cached;

    return this.mutex.run(async () => {
      // Another caller may have refreshed while we waited.
      const fresh = this.usableToken();
      if (fresh) return fresh;
      this.token = await this.requestToken();
      return this.token;
    });
  }

  /** Drops the cached token so the next call fetches a new one. */
  invalidate(token?: Token): void {
    if (token && this.token !== token) return;
    this.token = undefined;
  }

  clear(): void {
    this.token = undefined;
  }

  private usableToken(): Token | undefined {
    const t = this.token;
    if (t && Date.now() < t.expiresAt - this.safetyMarginMs) return t;
    return undefined;
  }

  private async requestToken(): Promise<Token> {
    this.refreshCount++;
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
    });

    let resp: Response;
    let text: string;
    try {
      ({ resp, text } = await timedFetch(
        this.tokenUrl,
        {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          body: body.toString(),
        },
        "token",
        this.timeoutMs,
      ));
    } catch (e) {
      const what = e instanceof RequestTimeoutError ? "timed out" : "failed";
      throw new TransportError(`Token request to ${this.tokenUrl} ${what}: ${errMessage(e)}`, e);
    }

    const data = parseJson(text);

    if (!resp.ok) {
      console.error(`[token] token request failed (HTTP ${resp.status}), check client id and secret`);
      throw new AuthError(`Token request failed (HTTP ${resp.status})`, resp.status);
    }

    const accessToken = isRecord(data) ? data.access_token : undefined;
    if (typeof accessToken !== "string" || accessToken.length === 0) {
      throw new AuthError("Token response missing access_token", resp.status);
    }

    const expiresIn = parseExpiresIn(isRecord(data) ? data.expires_in : undefined);
    if (isDebugEnabled()) {
      console.log(`[token] new access token, expires in ${expiresIn}s`);
    }
    return { accessToken, expiresAt: Date.now() + expiresIn * 1000 };
  }
}
