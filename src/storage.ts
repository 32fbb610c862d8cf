import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { StorageError, errMessage } from "./errors.js";
import { isRecord } from "./httpFetch.js";
import { isResolution, type Resolution, type TimeRange } from "./types.js";

export const STORAGE_VERSION = 1;

export type StoredPoint = {
  timestamp: string;
  fieldName: string;
  value: number;
};

/** One (eicCode, resolution) series as it lives on disk. */
export type StoredSeries = {
  version: number;
  eicCode: string;
  resolution: Resolution;
  updatedAt: string | null;
  coverage: TimeRange[];
  points: StoredPoint[];
};

/** Durable key-value store behind the history cache. */
export interface HistoryBackend {
  read(key: string): Promise<StoredSeries | undefined>;
  write(key: string, series: StoredSeries): Promise<void>;
  remove(key: string): Promise<void>;
}

function isStoredPoint(v: unknown): v is StoredPoint {
  return isRecord(v) && typeof v.timestamp === "string" && typeof v.fieldName === "string" && typeof v.value === "number";
}

function isTimeRange(v: unknown): v is TimeRange {
  return isRecord(v) && typeof v.start === "string" && typeof v.end === "string";
}

export function parseStoredSeries(v: unknown): StoredSeries | undefined {
  if (!isRecord(v)) return undefined;
  const { version, eicCode, resolution, updatedAt, coverage, points } = v;
  if (typeof version !== "number" || version > STORAGE_VERSION) return undefined;
  if (typeof eicCode !== "string" || typeof resolution !== "string" || !isResolution(resolution)) return undefined;
  if (!Array.isArray(coverage) || !coverage.every(isTimeRange)) return undefined;
  if (!Array.isArray(points) || !points.every(isStoredPoint)) return undefined;
  return {
    version,
    eicCode,
    resolution,
    updatedAt: typeof updatedAt === "string" ? updatedAt : null,
    coverage,
    points,
  };
}

/**
 * One JSON file per series under `dataDir`. Writes go to a temp file that is
 * renamed over the target, so a crash never leaves a half-written series.
 */
export class FileHistoryBackend implements HistoryBackend {
  constructor(private readonly dataDir: string = process.cwd()) {}

  private fileFor(key: string): string {
    return join(this.dataDir, `history-${key.replace(/[^A-Za-z0-9_-]/g, "_")}.json`);
  }

  async read(key: string): Promise<StoredSeries | undefined> {
    const file = this.fileFor(key);
    if (!existsSync(file)) return undefined;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, "utf8"));
    } catch (e) {
      throw new StorageError(`Failed to read ${file}: ${errMessage(e)}`, "read", e, { key });
    }

    const series = parseStoredSeries(raw);
    if (!series) throw new StorageError(`Unrecognized history file ${file}`, "read", undefined, { key });
    return series;
  }

  async write(key: string, series: StoredSeries): Promise<void> {
    const file = this.fileFor(key);
    const tmp = `${file}.tmp`;
    try {
      mkdirSync(this.dataDir, { recursive: true });
      writeFileSync(tmp, JSON.stringify(series), "utf8");
      renameSync(tmp, file);
    } catch (e) {
      throw new StorageError(`Failed to write ${file}: ${errMessage(e)}`, "write", e, { key });
    }
  }

  async remove(key: string): Promise<void> {
    const file = this.fileFor(key);
    try {
      rmSync(file, { force: true });
    } catch (e) {
      throw new StorageError(`Failed to remove ${file}: ${errMessage(e)}`, "remove", e, { key });
    }
  }
}
