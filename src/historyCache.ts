import { Mutex } from "./mutex.js";
import { STORAGE_VERSION, type HistoryBackend, type StoredPoint, type StoredSeries } from "./storage.js";
import { nextStep } from "./time.js";
import { RESOLUTIONS, type DataPoint, type Resolution, type TimeRange } from "./types.js";

export type MergeResult = {
  added: number;
  updated: number;
};

export type HistoryStats = {
  pointCount: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  lastUpdated: string | null;
};

export function seriesKey(eicCode: string, resolution: Resolution): string {
  return `${eicCode}_${resolution}`.toLowerCase();
}

function pointKey(p: { timestamp: string; fieldName: string }): string {
  return `${p.timestamp}|${p.fieldName}`;
}

function comparePoints(a: StoredPoint, b: StoredPoint): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  return a.fieldName < b.fieldName ? -1 : a.fieldName > b.fieldName ? 1 : 0;
}

/** Sorts and coalesces ranges; touching ranges ([a,b) and [b,c)) become one. */
export function mergeRanges(ranges: TimeRange[]): TimeRange[] {
  const sorted = ranges.filter((r) => r.start < r.end).sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));
  const out: TimeRange[] = [];
  for (const r of sorted) {
    const last = out[out.length - 1];
    if (last && r.start <= last.end) {
      if (r.end > last.end) last.end = r.end;
    } else {
      out.push({ ...r });
    }
  }
  return out;
}

export function isCovered(ranges: TimeRange[], range: TimeRange): boolean {
  return ranges.some((r) => r.start <= range.start && r.end >= range.end);
}

function emptySeries(eicCode: string, resolution: Resolution): StoredSeries {
  return { version: STORAGE_VERSION, eicCode, resolution, updatedAt: null, coverage: [], points: [] };
}

/**
 * Per metering point and resolution time series with the ranges already
 * fetched. Timestamps are normalized UTC ISO strings, so string order is
 * time order.
 */
export class HistoryCache {
  private readonly series = new Map<string, StoredSeries>();
  private readonly locks = new Map<string, Mutex>();

  constructor(private readonly backend: HistoryBackend) {}

  async coveredRanges(eicCode: string, resolution: Resolution): Promise<TimeRange[]> {
    const s = await this.load(eicCode, resolution);
    return s.coverage.map((r) => ({ ...r }));
  }

  /** Points with start <= timestamp < end, ordered by timestamp then field. */
  async query(eicCode: string, resolution: Resolution, start: Date, end: Date): Promise<DataPoint[]> {
    const s = await this.load(eicCode, resolution);
    const from = start.toISOString();
    const to = end.toISOString();
    return s.points
      .filter((p) => p.timestamp >= from && p.timestamp < to)
      .map((p) => ({ timestamp: p.timestamp, resolution, fieldName: p.fieldName, value: p.value }));
  }

  /**
   * Set-union keyed on (timestamp, fieldName); a reappearing key takes the
   * new value. `covered` marks ranges as fetched even when they held no
   * points; without it coverage grows by the extent of `points`.
   * Nothing changes in memory unless the backend write succeeds.
   */
  async merge(
    eicCode: string,
    resolution: Resolution,
    points: DataPoint[],
    covered?: TimeRange | TimeRange[],
  ): Promise<MergeResult> {
    const key = seriesKey(eicCode, resolution);
    return this.lockFor(key).run(async () => {
      const current = await this.load(eicCode, resolution);
      const byKey = new Map(current.points.map((p): [string, StoredPoint] => [pointKey(p), p]));

      let added = 0;
      let updated = 0;
      for (const p of points) {
        const k = pointKey(p);
        const existing = byKey.get(k);
        if (!existing) added++;
        else if (existing.value !== p.value) updated++;
        else continue;
        byKey.set(k, { timestamp: p.timestamp, fieldName: p.fieldName, value: p.value });
      }

      const extents = covered === undefined ? extentOf(points, resolution) : Array.isArray(covered) ? covered : [covered];
      const coverage = mergeRanges([...current.coverage, ...extents]);
      const coverageChanged = JSON.stringify(coverage) !== JSON.stringify(current.coverage);
      if (added === 0 && updated === 0 && !coverageChanged) return { added, updated };

      const next: StoredSeries = {
        ...current,
        updatedAt: new Date().toISOString(),
        coverage,
        points: added > 0 ? [...byKey.values()].sort(comparePoints) : [...byKey.values()],
      };
      await this.backend.write(key, next);
      this.series.set(key, next);
      return { added, updated };
    });
  }

  async clear(eicCode: string, resolution?: Resolution): Promise<void> {
    const resolutions = resolution ? [resolution] : RESOLUTIONS;
    for (const r of resolutions) {
      const key = seriesKey(eicCode, r);
      await this.lockFor(key).run(async () => {
        await this.backend.remove(key);
        this.series.delete(key);
      });
    }
  }

  async stats(eicCode: string, resolution: Resolution): Promise<HistoryStats> {
    const s = await this.load(eicCode, resolution);
    return {
      pointCount: s.points.length,
      firstTimestamp: s.points[0]?.timestamp ?? null,
      lastTimestamp: s.points[s.points.length - 1]?.timestamp ?? null,
      lastUpdated: s.updatedAt,
    };
  }

  private async load(eicCode: string, resolution: Resolution): Promise<StoredSeries> {
    const key = seriesKey(eicCode, resolution);
    const cached = this.series.get(key);
    if (cached) return cached;

    const stored = (await this.backend.read(key)) ?? emptySeries(eicCode, resolution);
    this.series.set(key, stored);
    return stored;
  }

  private lockFor(key: string): Mutex {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    return lock;
  }
}

function extentOf(points: DataPoint[], resolution: Resolution): TimeRange[] {
  if (points.length === 0) return [];
  let first = points[0]?.timestamp ?? "";
  let last = first;
  for (const p of points) {
    if (p.timestamp < first) first = p.timestamp;
    if (p.timestamp > last) last = p.timestamp;
  }
  return [{ start: first, end: nextStep(last, resolution) }];
}
