import { Mutex } from "./mutex.js";

export const RATE_LIMIT_MS = 5_000;

// Header names differ between servers; anything that looks like rate-limit
// metadata is kept verbatim for diagnostics.
const RATE_LIMIT_HEADER_RE = /ratelimit|rate-limit|retry-after/i;

export type RateLimitInfo = {
  lastRequestTime: string | null;
  nextAllowedTime: string | null;
  blockedRequestsCount: number;
  waitingRequests: number;
  serverHeaders: Record<string, string>;
};

type HeaderSource = Headers | Record<string, string | undefined>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Enforces a fixed minimum interval between outbound requests.
 * One instance is shared by every caller of an ApiClient.
 */
export class RateLimiter {
  private readonly gate = new Mutex();

  private lastRequestAt?: number;
  private blockedCount = 0;
  private serverHeaders: Record<string, string> = {};

  constructor(readonly minIntervalMs: number = RATE_LIMIT_MS) {}

  /**
   * Suspends until the next request may go out, then claims the slot.
   * Resolves with the time waited in ms.
   */
  async acquire(): Promise<number> {
    return this.gate.run(async () => {
      let waited = 0;
      // A response recorded while we slept moves the slot; check again.
      while (Date.now() < this.nextAllowedAt()) {
        waited += await this.waitUntil(this.nextAllowedAt());
      }
      this.lastRequestAt = Date.now();
      return waited;
    });
  }

  /** Suspends until `timestamp` (epoch ms). Resolves at once if it is in the past. */
  async waitUntil(timestamp: number): Promise<number> {
    const wait = Math.max(0, timestamp - Date.now());
    if (wait > 0) {
      this.blockedCount++;
      console.log(`[ratelimit] waiting ${(wait / 1000).toFixed(1)}s (blocked ${this.blockedCount} time(s))`);
      await sleep(wait);
    }
    return wait;
  }

  /**
   * Marks the request as finished. The next slot is measured from here,
   * so slow responses never shrink the gap between two requests.
   */
  recordResponse(headers?: HeaderSource): void {
    this.lastRequestAt = Date.now();
    if (headers) this.recordServerHeaders(headers);
  }

  recordServerHeaders(headers: HeaderSource): void {
    const found: Record<string, string> = {};
    const entries = headers instanceof Headers ? [...headers.entries()] : Object.entries(headers);
    for (const [name, value] of entries) {
      if (value === undefined || !RATE_LIMIT_HEADER_RE.test(name)) continue;
      found[name.toLowerCase()] = value;
    }
    if (Object.keys(found).length > 0) this.serverHeaders = found;
  }

  snapshot(): RateLimitInfo {
    const next = this.nextAllowedAt();
    return {
      lastRequestTime: this.lastRequestAt === undefined ? null : new Date(this.lastRequestAt).toISOString(),
      nextAllowedTime: next > Date.now() ? new Date(next).toISOString() : null,
      blockedRequestsCount: this.blockedCount,
      waitingRequests: this.gate.pending,
      serverHeaders: { ...this.serverHeaders },
    };
  }

  private nextAllowedAt(): number {
    return this.lastRequestAt === undefined ? 0 : this.lastRequestAt + this.minIntervalMs;
  }
}
