import type { ApiClient } from "./apiClient.js";
import { ValidationError, errMessage, isRetryable } from "./errors.js";
import { isCovered, type HistoryCache } from "./historyCache.js";
import { Mutex } from "./mutex.js";
import { DAY_MS, addDays, dayStartMs, daysBetween, isISODay } from "./time.js";
import type { BackfillRequest, BackfillResult, BackfillStatus, TimeRange } from "./types.js";

export const MAX_BACKFILL_DAYS = 365;
export const CHUNK_ATTEMPTS = 3;

export type RangeFetcher = Pick<ApiClient, "fetchRange">;

export type BackfillOptions = {
  signal?: AbortSignal;
};

export type BackfillRunState = {
  request: BackfillRequest;
  status: BackfillStatus;
  chunksDone: number;
  chunksTotal: number;
  startedAt: string;
  finishedAt: string | null;
  error: string | null;
};

type Chunk = {
  day: string;
  range: TimeRange;
};

export function validateBackfillRequest(req: BackfillRequest): void {
  if (req.eicCode.trim().length === 0) throw new ValidationError("eicCode is required");
  if (!isISODay(req.startDay) || !isISODay(req.endDay)) {
    throw new ValidationError("startDay and endDay must be YYYY-MM-DD days", { startDay: req.startDay, endDay: req.endDay });
  }
  const span = daysBetween(req.startDay, req.endDay) + 1;
  if (span < 1) throw new ValidationError("endDay is before startDay", { startDay: req.startDay, endDay: req.endDay });
  if (span > MAX_BACKFILL_DAYS) {
    throw new ValidationError(`Backfill span of ${span} days exceeds ${MAX_BACKFILL_DAYS}`, { span });
  }
}

/** One chunk per UTC day, ascending. */
export function dayChunks(startDay: string, endDay: string): Chunk[] {
  const chunks: Chunk[] = [];
  for (let day = startDay; day <= endDay; day = addDays(day, 1)) {
    const start = dayStartMs(day);
    chunks.push({
      day,
      range: { start: new Date(start).toISOString(), end: new Date(start + DAY_MS).toISOString() },
    });
  }
  return chunks;
}

/**
 * Fetches a day range chunk by chunk, skipping what the cache already holds
 * and persisting each chunk as soon as it arrives. A retryable failure costs
 * one chunk; anything else ends the run.
 */
export class BackfillEngine {
  private readonly mutex = new Mutex();
  private readonly runs = new Map<string, BackfillRunState>();

  constructor(
    private readonly api: RangeFetcher,
    private readonly cache: HistoryCache,
    private readonly maxAttempts: number = CHUNK_ATTEMPTS,
  ) {}

  /** Last known run for a metering point. */
  runState(eicCode: string): BackfillRunState | undefined {
    const run = this.runs.get(eicCode);
    return run ? { ...run } : undefined;
  }

  async backfill(req: BackfillRequest, opts: BackfillOptions = {}): Promise<BackfillResult> {
    validateBackfillRequest(req);
    const chunks = dayChunks(req.startDay, req.endDay);
    const run: BackfillRunState = {
      request: req,
      status: "pending",
      chunksDone: 0,
      chunksTotal: chunks.length,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      error: null,
    };
    // A queued run must not hide the state of the one in progress.
    if (this.runs.get(req.eicCode)?.status !== "running") this.runs.set(req.eicCode, run);

    // Overlapping runs would fetch the same days twice.
    return this.mutex.run(() => {
      this.runs.set(req.eicCode, run);
      return this.execute(req, chunks, run, opts.signal);
    });
  }

  private async execute(req: BackfillRequest, chunks: Chunk[], run: BackfillRunState, signal?: AbortSignal): Promise<BackfillResult> {
    const result: BackfillResult = {
      status: "running",
      pointsFetched: 0,
      chunksTotal: chunks.length,
      chunksSkipped: 0,
      chunksFailed: 0,
      failedDays: [],
      cancelled: false,
    };
    run.status = "running";
    console.log(`[backfill] ${req.eicCode}: ${req.startDay} .. ${req.endDay} (${chunks.length} day(s), ${req.resolution})`);

    try {
      for (const chunk of chunks) {
        if (signal?.aborted) {
          result.cancelled = true;
          break;
        }
        await this.processChunk(req, chunk, result);
        run.chunksDone++;
      }
    } catch (e) {
      result.status = "aborted";
      this.finish(run, result, errMessage(e));
      console.error(`[backfill] ${req.eicCode}: aborted after ${run.chunksDone} chunk(s): ${errMessage(e)}`);
      throw e;
    }

    if (result.cancelled) result.status = "aborted";
    else result.status = result.chunksFailed > 0 ? "completed_with_failures" : "completed";
    this.finish(run, result, null);

    console.log(
      `[backfill] ${req.eicCode}: ${result.status}${result.cancelled ? " (cancelled)" : ""}, ` +
        `${result.pointsFetched} point(s), ${result.chunksSkipped} skipped, ${result.chunksFailed} failed`,
    );
    return result;
  }

  private async processChunk(req: BackfillRequest, chunk: Chunk, result: BackfillResult): Promise<void> {
    const now = new Date().toISOString();
    if (chunk.range.start >= now) {
      result.chunksSkipped++;
      return;
    }

    const covered = await this.cache.coveredRanges(req.eicCode, req.resolution);
    if (isCovered(covered, chunk.range)) {
      result.chunksSkipped++;
      return;
    }

    // A day that is still running is fetched up to now and stays uncovered
    // past that point, so the next run picks up the rest.
    const end = chunk.range.end > now ? now : chunk.range.end;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const points = await this.api.fetchRange(req.eicCode, new Date(chunk.range.start), new Date(end), req.resolution);
        // An empty answer may just mean the hub has not published the day yet,
        // so the day stays uncovered and is asked for again next run.
        if (points.length > 0) {
          await this.cache.merge(req.eicCode, req.resolution, points, { start: chunk.range.start, end });
        }
        result.pointsFetched += points.length;
        return;
      } catch (e) {
        if (!isRetryable(e)) throw e;
        console.log(`[backfill] ${req.eicCode} ${chunk.day}: attempt ${attempt}/${this.maxAttempts} failed: ${errMessage(e)}`);
      }
    }

    result.chunksFailed++;
    result.failedDays.push(chunk.day);
  }

  private finish(run: BackfillRunState, result: BackfillResult, error: string | null): void {
    run.status = result.status;
    run.finishedAt = new Date().toISOString();
    run.error = error;
  }
}
