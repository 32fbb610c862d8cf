import { describe, expect, it, vi } from "vitest";
import { BackfillEngine, type RangeFetcher } from "../src/backfillEngine.js";
import { coveredDays, importHistoryCsv, parseHistoryCsv } from "../src/csvImport.js";
import { ValidationError } from "../src/errors.js";
import { HistoryCache } from "../src/historyCache.js";
import { EIC, MemoryHistoryBackend, dayPoints } from "./helpers.js";

const GAPPY_EXPORT = [
  "timestamp;energyIn",
  "2025-01-01T00:00:00Z;1",
  "2025-01-01T23:00:00Z;2",
  "2025-01-03T00:00:00Z;3",
].join("\n");

describe("parseHistoryCsv", () => {
  it("reads a semicolon export with decimal commas and local offsets", () => {
    const csv = [
      "timestamp;energyIn;energyOut",
      "2025-01-01T00:00:00+0200;1,5;0,25",
      "2025-01-01T01:00:00+0200;2;",
      "not a time;3;4",
      "",
    ].join("\n");

    expect(parseHistoryCsv(csv, "hour")).toEqual([
      { timestamp: "2024-12-31T22:00:00.000Z", resolution: "hour", fieldName: "energyIn", value: 1.5 },
      { timestamp: "2024-12-31T22:00:00.000Z", resolution: "hour", fieldName: "energyOut", value: 0.25 },
      { timestamp: "2024-12-31T23:00:00.000Z", resolution: "hour", fieldName: "energyIn", value: 2 },
    ]);
  });

  it("accepts a comma export with a 'Period start' column", () => {
    const csv = "Period start,Consumption (kWh)\n2025-01-01T00:00:00Z,0.5\n";
    expect(parseHistoryCsv(csv, "15min")).toEqual([
      { timestamp: "2025-01-01T00:00:00.000Z", resolution: "15min", fieldName: "Consumption (kWh)", value: 0.5 },
    ]);
  });

  it("rejects a file without a timestamp column", () => {
    expect(() => parseHistoryCsv("when;value\n2025-01-01;1\n", "hour")).toThrow(ValidationError);
  });
});

describe("coveredDays", () => {
  it("covers only the days that have rows", () => {
    expect(coveredDays(parseHistoryCsv(GAPPY_EXPORT, "hour"))).toEqual([
      { start: "2025-01-01T00:00:00.000Z", end: "2025-01-02T00:00:00.000Z" },
      { start: "2025-01-03T00:00:00.000Z", end: "2025-01-04T00:00:00.000Z" },
    ]);
  });
});

describe("importHistoryCsv", () => {
  it("leaves days missing from the export to a later backfill", async () => {
    const cache = new HistoryCache(new MemoryHistoryBackend());
    expect(await importHistoryCsv(cache, EIC, GAPPY_EXPORT, "hour")).toEqual({ added: 3, updated: 0, points: 3 });

    const fetchRange = vi.fn<RangeFetcher["fetchRange"]>(async (_eic, start, _end, resolution) => dayPoints(start, resolution));
    const result = await new BackfillEngine({ fetchRange }, cache).backfill({
      eicCode: EIC,
      startDay: "2025-01-01",
      endDay: "2025-01-03",
      resolution: "hour",
    });

    expect(result).toMatchObject({ chunksSkipped: 2, pointsFetched: 24 });
    expect(fetchRange.mock.calls.map(([, start]) => start.toISOString())).toEqual(["2025-01-02T00:00:00.000Z"]);
    expect(await cache.coveredRanges(EIC, "hour")).toEqual([
      { start: "2025-01-01T00:00:00.000Z", end: "2025-01-04T00:00:00.000Z" },
    ]);
  });
});
