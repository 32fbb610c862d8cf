import type { ApiClient } from "./apiClient.js";
import { BackfillEngine, MAX_BACKFILL_DAYS } from "./backfillEngine.js";
import type { PollerConfig } from "./config.js";
import { AuthError, FatalApiError, UpdateFailedError, ValidationError, errMessage } from "./errors.js";
import type { HistoryCache, HistoryStats } from "./historyCache.js";
import type { RateLimitInfo } from "./rateLimiter.js";
import { DAY_MS, addDays, toISODate } from "./time.js";
import type { TokenManager } from "./tokenManager.js";
import type { BackfillResult, DataPoint, MeteringPoint, Readings } from "./types.js";

/**
 * Whatever turns generic readings into typed entities (sensors, chat
 * messages, ...) plugs in here. The coordinator never interprets fields.
 */
export interface ReadingSink {
  publish(point: MeteringPoint, readings: Readings): void | Promise<void>;
}

export type MeteringApi = Pick<ApiClient, "discoverMeteringPoints" | "fetchCurrent" | "fetchRange" | "limiter">;

export type CoordinatorDeps = {
  api: MeteringApi;
  tokens: Pick<TokenManager, "clear">;
  cache: HistoryCache;
  engine?: BackfillEngine;
  sink?: ReadingSink;
};

export type RefreshOutcome = {
  refreshed: string[];
  failed: Array<{ eicCode: string; error: string }>;
};

export type Diagnostics = {
  meteringPoints: MeteringPoint[];
  resolution: string;
  scanIntervalSeconds: number;
  lastRefresh: string | null;
  latest: Record<string, Readings>;
  rateLimit: RateLimitInfo;
  history: Record<string, HistoryStats>;
};

/**
 * Entry point for the host: periodic polling of current readings plus
 * on-demand backfills. Poller and backfills share one ApiClient, and so one
 * rate limiter.
 */
export class Coordinator {
  readonly engine: BackfillEngine;

  private readonly api: MeteringApi;
  private readonly tokens: Pick<TokenManager, "clear">;
  private readonly cache: HistoryCache;
  private sink?: ReadingSink;

  private points: MeteringPoint[] = [];
  private readonly latest = new Map<string, Readings>();
  private lastRefresh: string | null = null;

  private timer?: NodeJS.Timeout;
  private stopped = true;
  private readonly backfills = new Set<AbortController>();

  constructor(
    deps: CoordinatorDeps,
    private readonly config: PollerConfig,
  ) {
    this.api = deps.api;
    this.tokens = deps.tokens;
    this.cache = deps.cache;
    this.sink = deps.sink;
    this.engine = deps.engine ?? new BackfillEngine(deps.api, deps.cache);
  }

  get meteringPoints(): MeteringPoint[] {
    return [...this.points];
  }

  setSink(sink: ReadingSink): void {
    this.sink = sink;
  }

  latestReadings(eicCode: string): Readings | undefined {
    return this.latest.get(eicCode);
  }

  /** Discovers metering points, does a first refresh and kicks off the initial backfill. */
  async setup(): Promise<MeteringPoint[]> {
    const discovered = await this.api.discoverMeteringPoints();
    this.points = discovered.filter((p) =>
      p.commodityType === "electricity" ? this.config.enableElectricity : this.config.enableGas,
    );
    const skipped = discovered.length - this.points.length;
    console.log(`[coordinator] ${this.points.length} metering point(s)${skipped > 0 ? `, ${skipped} disabled by commodity` : ""}`);

    await this.refreshAll();

    if (this.config.backfillDays > 0) {
      for (const p of this.points) {
        this.runInitialBackfill(p.eicCode, this.config.backfillDays);
      }
    }
    return this.meteringPoints;
  }

  async refreshCurrent(eicCode: string): Promise<Readings> {
    const point = this.requirePoint(eicCode);
    const readings = await this.api.fetchCurrent(eicCode, this.config.resolution);
    this.latest.set(eicCode, readings);
    this.lastRefresh = new Date().toISOString();
    await this.sink?.publish(point, readings);
    return readings;
  }

  /**
   * One poll cycle. Auth and fatal API errors fail the whole cycle; anything
   * else leaves that point on its previous readings.
   */
  async refreshAll(): Promise<RefreshOutcome> {
    const outcome: RefreshOutcome = { refreshed: [], failed: [] };
    for (const p of this.points) {
      try {
        await this.refreshCurrent(p.eicCode);
        outcome.refreshed.push(p.eicCode);
      } catch (e) {
        if (e instanceof AuthError || e instanceof FatalApiError) {
          throw new UpdateFailedError(`Error fetching metering data for ${p.eicCode}: ${errMessage(e)}`, e, { eicCode: p.eicCode });
        }
        console.error(`[coordinator] refresh failed for ${p.eicCode}: ${errMessage(e)}`);
        outcome.failed.push({ eicCode: p.eicCode, error: errMessage(e) });
      }
    }
    return outcome;
  }

  /** Backfills the last `days` days, today included. */
  async triggerBackfill(eicCode: string, days: number): Promise<BackfillResult> {
    if (!Number.isInteger(days) || days < 1 || days > MAX_BACKFILL_DAYS) {
      throw new ValidationError(`days must be an integer between 1 and ${MAX_BACKFILL_DAYS}`, { days });
    }
    this.requirePoint(eicCode);

    const endDay = toISODate(new Date());
    const controller = new AbortController();
    this.backfills.add(controller);
    try {
      return await this.engine.backfill(
        { eicCode, startDay: addDays(endDay, -(days - 1)), endDay, resolution: this.config.resolution },
        { signal: controller.signal },
      );
    } finally {
      this.backfills.delete(controller);
    }
  }

  async history(eicCode: string, days: number): Promise<DataPoint[]> {
    this.requirePoint(eicCode);
    const end = new Date();
    return this.cache.query(eicCode, this.config.resolution, new Date(end.getTime() - days * DAY_MS), end);
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.schedule();
  }

  /** Stops polling, asks running backfills to stop after their current chunk and drops the token. */
  stop(): void {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    for (const c of this.backfills) c.abort();
    this.tokens.clear();
  }

  async diagnostics(): Promise<Diagnostics> {
    const history: Record<string, HistoryStats> = {};
    for (const p of this.points) {
      history[p.eicCode] = await this.cache.stats(p.eicCode, this.config.resolution);
    }
    return {
      meteringPoints: this.meteringPoints,
      resolution: this.config.resolution,
      scanIntervalSeconds: this.config.scanIntervalSeconds,
      lastRefresh: this.lastRefresh,
      latest: Object.fromEntries(this.latest),
      rateLimit: this.api.limiter.snapshot(),
      history,
    };
  }

  private schedule(): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.refreshAll()
        .then((o) => {
          if (o.failed.length > 0) console.log(`[coordinator] cycle done, ${o.failed.length} point(s) kept stale readings`);
        })
        .catch((e: unknown) => console.error(`[coordinator] refresh cycle failed: ${errMessage(e)}`))
        .finally(() => this.schedule());
    }, this.config.scanIntervalSeconds * 1000);
  }

  private runInitialBackfill(eicCode: string, days: number): void {
    this.triggerBackfill(eicCode, days).catch((e: unknown) => {
      console.error(`[coordinator] initial backfill failed for ${eicCode}, run /backfill to retry: ${errMessage(e)}`);
    });
  }

  private requirePoint(eicCode: string): MeteringPoint {
    const point = this.points.find((p) => p.eicCode === eicCode);
    if (!point) throw new ValidationError(`Unknown metering point ${eicCode}`, { eicCode });
    return point;
  }
}
