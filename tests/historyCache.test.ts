import { describe, expect, it } from "vitest";
import { StorageError } from "../src/errors.js";
import { HistoryCache, isCovered, mergeRanges, seriesKey } from "../src/historyCache.js";
import type { DataPoint } from "../src/types.js";
import { EIC, MemoryHistoryBackend, daysPoints } from "./helpers.js";

const day = (d: string) => `${d}T00:00:00.000Z`;

function point(timestamp: string, fieldName: string, value: number): DataPoint {
  return { timestamp, resolution: "hour", fieldName, value };
}

describe("mergeRanges", () => {
  it("coalesces overlapping and touching ranges", () => {
    expect(
      mergeRanges([
        { start: day("2025-01-05"), end: day("2025-01-07") },
        { start: day("2025-01-01"), end: day("2025-01-03") },
        { start: day("2025-01-03"), end: day("2025-01-04") },
        { start: day("2025-01-06"), end: day("2025-01-06") },
      ]),
    ).toEqual([
      { start: day("2025-01-01"), end: day("2025-01-04") },
      { start: day("2025-01-05"), end: day("2025-01-07") },
    ]);
  });

  it("answers coverage for a range inside a single merged range only", () => {
    const ranges = [{ start: day("2025-01-01"), end: day("2025-01-04") }];
    expect(isCovered(ranges, { start: day("2025-01-02"), end: day("2025-01-03") })).toBe(true);
    expect(isCovered(ranges, { start: day("2025-01-03"), end: day("2025-01-05") })).toBe(false);
  });
});

describe("HistoryCache", () => {
  it("keys series by lowercased EIC and resolution", () => {
    expect(seriesKey("38ZEE-1000000A-B", "15min")).toBe("38zee-1000000a-b_15min");
  });

  it("makes a repeated merge a no-op", async () => {
    const backend = new MemoryHistoryBackend();
    const cache = new HistoryCache(backend);
    const points = daysPoints("2025-01-01", 1);

    expect(await cache.merge(EIC, "hour", points)).toEqual({ added: 24, updated: 0 });
    const before = await cache.query(EIC, "hour", new Date(day("2025-01-01")), new Date(day("2025-01-02")));

    expect(await cache.merge(EIC, "hour", points)).toEqual({ added: 0, updated: 0 });
    expect(await cache.query(EIC, "hour", new Date(day("2025-01-01")), new Date(day("2025-01-02")))).toEqual(before);
    expect(backend.writes).toBe(1);
  });

  it("lets a re-fetched point replace its old value", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());
    await cache.merge(EIC, "hour", [point("2025-01-01T00:00:00.000Z", "energyIn", 1)]);

    const result = await cache.merge(EIC, "hour", [
      point("2025-01-01T00:00:00.000Z", "energyIn", 2),
      point("2025-01-01T01:00:00.000Z", "energyIn", 3),
    ]);

    expect(result).toEqual({ added: 1, updated: 1 });
    const values = (await cache.query(EIC, "hour", new Date(0), new Date(day("2025-02-01")))).map((p) => p.value);
    expect(values).toEqual([2, 3]);
  });

  it("coalesces the coverage of two overlapping backfills", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());
    await cache.merge(EIC, "hour", daysPoints("2025-01-01", 5));
    await cache.merge(EIC, "hour", daysPoints("2025-01-03", 6));

    expect(await cache.coveredRanges(EIC, "hour")).toEqual([{ start: day("2025-01-01"), end: day("2025-01-09") }]);
    expect((await cache.stats(EIC, "hour")).pointCount).toBe(8 * 24);
  });

  it("records an explicitly covered range even without points", async () => {
    const backend = new MemoryHistoryBackend();
    const cache = new HistoryCache(backend);

    await cache.merge(EIC, "hour", [], { start: day("2025-01-01"), end: day("2025-01-02") });
    await cache.merge(EIC, "hour", [], { start: day("2025-01-02"), end: day("2025-01-03") });

    expect(await cache.coveredRanges(EIC, "hour")).toEqual([{ start: day("2025-01-01"), end: day("2025-01-03") }]);
    expect(backend.writes).toBe(2);
  });

  it("takes several covered ranges at once", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());

    await cache.merge(EIC, "hour", [point("2025-01-01T00:00:00.000Z", "energyIn", 1)], [
      { start: day("2025-01-01"), end: day("2025-01-02") },
      { start: day("2025-01-03"), end: day("2025-01-04") },
    ]);

    expect(await cache.coveredRanges(EIC, "hour")).toEqual([
      { start: day("2025-01-01"), end: day("2025-01-02") },
      { start: day("2025-01-03"), end: day("2025-01-04") },
    ]);
  });

  it("queries a half-open range ordered by timestamp then field", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());
    await cache.merge(EIC, "hour", [
      point("2025-01-01T02:00:00.000Z", "b", 5),
      point("2025-01-01T01:00:00.000Z", "b", 3),
      point("2025-01-01T01:00:00.000Z", "a", 2),
      point("2025-01-01T00:00:00.000Z", "a", 1),
    ]);

    const got = await cache.query(EIC, "hour", new Date("2025-01-01T01:00:00.000Z"), new Date("2025-01-01T02:00:00.000Z"));
    expect(got).toEqual([point("2025-01-01T01:00:00.000Z", "a", 2), point("2025-01-01T01:00:00.000Z", "b", 3)]);
  });

  it("leaves memory untouched when the backend write fails", async () => {
    const backend = new MemoryHistoryBackend();
    const cache = new HistoryCache(backend);
    backend.failWrites = true;

    await expect(cache.merge(EIC, "hour", daysPoints("2025-01-01", 1))).rejects.toBeInstanceOf(StorageError);

    backend.failWrites = false;
    expect(await cache.query(EIC, "hour", new Date(0), new Date(day("2026-01-01")))).toEqual([]);
    expect(await cache.coveredRanges(EIC, "hour")).toEqual([]);
  });

  it("loads what an earlier instance persisted", async () => {
    const backend = new MemoryHistoryBackend();
    await new HistoryCache(backend).merge(EIC, "hour", daysPoints("2025-01-01", 2));

    const reopened = new HistoryCache(backend);
    expect(await reopened.stats(EIC, "hour")).toMatchObject({
      pointCount: 48,
      firstTimestamp: "2025-01-01T00:00:00.000Z",
      lastTimestamp: "2025-01-02T23:00:00.000Z",
    });
    expect(await reopened.coveredRanges(EIC, "hour")).toEqual([{ start: day("2025-01-01"), end: day("2025-01-03") }]);
  });

  it("keeps resolutions apart and clears them all", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());
    await cache.merge(EIC, "hour", [point("2025-01-01T00:00:00.000Z", "energyIn", 1)]);
    await cache.merge(EIC, "15min", [{ timestamp: "2025-01-01T00:00:00.000Z", resolution: "15min", fieldName: "energyIn", value: 0.25 }]);

    expect((await cache.stats(EIC, "15min")).pointCount).toBe(1);
    expect(await cache.coveredRanges(EIC, "15min")).toEqual([
      { start: "2025-01-01T00:00:00.000Z", end: "2025-01-01T00:15:00.000Z" },
    ]);

    await cache.clear(EIC);
    expect(await cache.stats(EIC, "hour")).toEqual({ pointCount: 0, firstTimestamp: null, lastTimestamp: null, lastUpdated: null });
    expect((await cache.stats(EIC, "15min")).pointCount).toBe(0);
  });

  it("serializes concurrent merges into the same series", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());
    await Promise.all([
      cache.merge(EIC, "hour", daysPoints("2025-01-01", 1)),
      cache.merge(EIC, "hour", daysPoints("2025-01-02", 1)),
    ]);
    expect((await cache.stats(EIC, "hour")).pointCount).toBe(48);
  });
});
