import type { Resolution } from "./types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

const DAY_RE = /^\d{4}-\d{2}-\d{2}$/;

export function toISODate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function isISODay(s: string): boolean {
  if (!DAY_RE.test(s)) return false;
  const ms = Date.parse(`${s}T00:00:00Z`);
  return Number.isFinite(ms) && toISODate(new Date(ms)) === s;
}

/** Midnight UTC of a YYYY-MM-DD day, in epoch ms. */
export function dayStartMs(day: string): number {
  return Date.parse(`${day}T00:00:00Z`);
}

export function addDays(day: string, n: number): string {
  return toISODate(new Date(dayStartMs(day) + n * DAY_MS));
}

/** Whole days between two YYYY-MM-DD days (b - a). */
export function daysBetween(a: string, b: string): number {
  return Math.round((dayStartMs(b) - dayStartMs(a)) / DAY_MS);
}

// The API sends and expects "2025-01-01T00:00:00+0000".
export function toApiDateTime(d: Date): string {
  return `${d.toISOString().slice(0, 19)}+0000`;
}

/**
 * Parses an API timestamp into a normalized UTC ISO string.
 * Accepts offsets written without a colon ("+0200").
 */
export function normalizeTimestamp(raw: string): string | undefined {
  const fixed = raw.trim().replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const ms = Date.parse(fixed);
  if (!Number.isFinite(ms)) return undefined;
  return new Date(ms).toISOString();
}

/** Start of the period after the one beginning at `ts`. */
export function nextStep(ts: string, resolution: Resolution): string {
  const d = new Date(ts);
  switch (resolution) {
    case "15min":
      return new Date(d.getTime() + 15 * 60 * 1000).toISOString();
    case "hour":
      return new Date(d.getTime() + 60 * 60 * 1000).toISOString();
    case "week":
      return new Date(d.getTime() + 7 * DAY_MS).toISOString();
    case "month":
      d.setUTCMonth(d.getUTCMonth() + 1);
      return d.toISOString();
  }
}
