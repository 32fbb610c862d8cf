import { vi } from "vitest";
import { StorageError } from "../src/errors.js";
import type { HistoryBackend, StoredSeries } from "../src/storage.js";
import { DAY_MS, dayStartMs } from "../src/time.js";
import type { Credentials, DataPoint, Resolution } from "../src/types.js";

export const TOKEN_URL = "https://sso.test/token";
export const API_HOST = "https://api.test";
export const EIC = "38ZEE-1000000A-B";

export const credentials: Credentials = {
  apiHost: API_HOST,
  clientId: "test-client-id",
  clientSecret: "test-secret",
  tokenUrl: TOKEN_URL,
};

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json", ...headers } });
}

export function tokenResponse(accessToken: string, expiresIn = 300): Response {
  return jsonResponse({ access_token: accessToken, expires_in: expiresIn, token_type: "Bearer" });
}

type Handler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Replaces global fetch. Token requests get "tok-1", "tok-2", ... unless a
 * token handler is given; everything else goes to `api`.
 */
export function stubFetch(api: Handler, token?: Handler) {
  let issued = 0;
  const mock = vi.fn<typeof fetch>(async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    if (url.href === TOKEN_URL) {
      issued++;
      return token ? token(url, init) : tokenResponse(`tok-${issued}`);
    }
    return api(url, init);
  });
  vi.stubGlobal("fetch", mock);
  return mock;
}

export function apiCalls(mock: ReturnType<typeof stubFetch>): Array<[URL, RequestInit | undefined]> {
  return mock.mock.calls
    .map(([input, init]): [URL, RequestInit | undefined] => [new URL(input instanceof Request ? input.url : String(input)), init])
    .filter(([url]) => url.href !== TOKEN_URL);
}

export function authHeader(init: RequestInit | undefined): string | null {
  return new Headers(init?.headers).get("Authorization");
}

/** 24 hourly points of one field for the UTC day starting at `start`. */
export function dayPoints(start: Date | string, resolution: Resolution = "hour", fieldName = "energyIn"): DataPoint[] {
  const base = typeof start === "string" ? dayStartMs(start) : start.getTime();
  return Array.from({ length: 24 }, (_, h) => ({
    timestamp: new Date(base + h * 60 * 60 * 1000).toISOString(),
    resolution,
    fieldName,
    value: h,
  }));
}

export function daysPoints(firstDay: string, days: number): DataPoint[] {
  const start = dayStartMs(firstDay);
  return Array.from({ length: days }, (_, i) => dayPoints(new Date(start + i * DAY_MS))).flat();
}

/** In-process stand-in for the file backend. */
export class MemoryHistoryBackend implements HistoryBackend {
  readonly data = new Map<string, StoredSeries>();
  writes = 0;
  failWrites = false;

  async read(key: string): Promise<StoredSeries | undefined> {
    const s = this.data.get(key);
    return s ? structuredClone(s) : undefined;
  }

  async write(key: string, series: StoredSeries): Promise<void> {
    if (this.failWrites) throw new StorageError("disk full", "write", undefined, { key });
    this.writes++;
    this.data.set(key, structuredClone(series));
  }

  async remove(key: string): Promise<void> {
    this.data.delete(key);
  }
}

/** Headers arrive, the body never finishes. */
export function stalledBodyResponse(): Response {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 });
}

/** Headers arrive, then the connection breaks off mid-body. */
export function brokenBodyResponse(): Response {
  return new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new TypeError("terminated"));
      },
    }),
    { status: 200 },
  );
}
