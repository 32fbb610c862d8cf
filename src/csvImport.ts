import { parse } from "csv-parse/sync";
import { ValidationError } from "./errors.js";
import { mergeRanges, type HistoryCache, type MergeResult } from "./historyCache.js";
import { DAY_MS, dayStartMs, normalizeTimestamp } from "./time.js";
import type { DataPoint, Resolution, TimeRange } from "./types.js";

const TIMESTAMP_COLUMNS = ["timestamp", "time", "period start", "periodstart", "date"];

function parseCsvNumber(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (trimmed.length === 0) return undefined;
  // Exports from the hub's portal use a decimal comma.
  const n = Number(trimmed.replace(",", "."));
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Reads a metering-data CSV export: one timestamp column plus one column per
 * measured field. Rows without a parseable timestamp and empty or
 * non-numeric cells are skipped.
 */
export function parseHistoryCsv(text: string, resolution: Resolution): DataPoint[] {
  const firstLine = text.split(/\r?\n/, 1)[0] ?? "";
  const delimiter = firstLine.includes(";") ? ";" : ",";

  const records: Record<string, string>[] = parse(text, {
    columns: true,
    delimiter,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  const header = records[0] ? Object.keys(records[0]) : [];
  const tsColumn = header.find((h) => TIMESTAMP_COLUMNS.includes(h.toLowerCase()));
  if (!tsColumn) {
    throw new ValidationError(`CSV has no timestamp column (expected one of: ${TIMESTAMP_COLUMNS.join(", ")})`, { header });
  }

  const points: DataPoint[] = [];
  for (const row of records) {
    const timestamp = normalizeTimestamp(row[tsColumn] ?? "");
    if (!timestamp) continue;
    for (const [column, raw] of Object.entries(row)) {
      if (column === tsColumn) continue;
      const value = parseCsvNumber(raw);
      if (value !== undefined) points.push({ timestamp, resolution, fieldName: column, value });
    }
  }
  return points;
}

/** The UTC days that have at least one point, as coalesced ranges. */
export function coveredDays(points: DataPoint[]): TimeRange[] {
  const days = new Set(points.map((p) => p.timestamp.slice(0, 10)));
  return mergeRanges(
    [...days].map((day) => {
      const start = dayStartMs(day);
      return { start: new Date(start).toISOString(), end: new Date(start + DAY_MS).toISOString() };
    }),
  );
}

/**
 * Merges a CSV export into the cache. Only days with rows count as covered,
 * so a later backfill still fetches the days the export left out.
 */
export async function importHistoryCsv(
  cache: HistoryCache,
  eicCode: string,
  text: string,
  resolution: Resolution,
): Promise<MergeResult & { points: number }> {
  const points = parseHistoryCsv(text, resolution);
  const result = await cache.merge(eicCode, resolution, points, coveredDays(points));
  return { ...result, points: points.length };
}
