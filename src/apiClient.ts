import { AuthError, FatalApiError, RetryableApiError, TransportError, errMessage } from "./errors.js";
import { DEFAULT_TIMEOUT_MS, RequestTimeoutError, isRecord, parseJson, timedFetch } from "./httpFetch.js";
import type { RateLimiter } from "./rateLimiter.js";
import { normalizeTimestamp, toApiDateTime } from "./time.js";
import type { TokenManager } from "./tokenManager.js";
import { API_RESOLUTION, type CommodityType, type DataPoint, type MeteringPoint, type Readings, type Resolution } from "./types.js";

export const METERING_POINTS_PATH = "/api/public/v1/metering-point-eics";
export const METERING_DATA_PATH = "/api/public/v1/metering-data";

// Window used to find the latest reading.
export const CURRENT_WINDOW_HOURS = 2;

// Measurement keys that describe a reading rather than measure something.
const METADATA_KEYS = new Set([
  "timestamp",
  "resolution",
  "unit",
  "eic",
  "meteringPointEic",
  "commodityType",
]);

type Measurement = Record<string, unknown>;

function parseNumber(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

/** Numeric, non-metadata fields of one measurement. Everything else is dropped. */
export function numericFields(m: Measurement): Readings {
  const out: Readings = {};
  for (const [key, raw] of Object.entries(m)) {
    if (METADATA_KEYS.has(key)) continue;
    const n = parseNumber(raw);
    if (n !== undefined) out[key] = n;
  }
  return out;
}

function unwrapList(data: unknown, keys: string[]): unknown[] {
  if (Array.isArray(data)) return data;
  if (!isRecord(data)) return [];
  for (const key of keys) {
    const v = data[key];
    if (Array.isArray(v)) return v;
  }
  return [];
}

/**
 * Pulls the measurement list for `eic` out of a metering-data response.
 * The server answers with either a flat list of measurements or a list of
 * per-EIC objects carrying a `measurements` array, optionally wrapped.
 */
export function extractMeasurements(data: unknown, eic: string): Measurement[] {
  const list = unwrapList(data, ["meteringData", "data", "content", "measurements"]);
  const perEic = list.filter((item): item is Measurement => isRecord(item) && Array.isArray(item.measurements));

  if (perEic.length === 0) return list.filter(isRecord);

  const match =
    perEic.find((item) => item.meteringPointEic === eic || item.eic === eic) ?? (perEic.length === 1 ? perEic[0] : undefined);
  const measurements = match?.measurements;
  return Array.isArray(measurements) ? measurements.filter(isRecord) : [];
}

function parseCommodity(v: unknown): CommodityType | undefined {
  if (typeof v !== "string") return undefined;
  const lower = v.toLowerCase();
  return lower === "electricity" || lower === "gas" ? lower : undefined;
}

export function parseMeteringPoints(data: unknown): MeteringPoint[] {
  const byEic = new Map<string, MeteringPoint>();
  for (const raw of unwrapList(data, ["meteringPoints", "data", "content"])) {
    let eicCode: unknown;
    let commodity: CommodityType | undefined = "electricity";
    if (typeof raw === "string") {
      eicCode = raw;
    } else if (isRecord(raw)) {
      eicCode = raw.eic ?? raw.eicCode ?? raw.meteringPointEic;
      commodity = raw.commodityType === undefined ? "electricity" : parseCommodity(raw.commodityType);
    }
    if (typeof eicCode !== "string" || eicCode.length === 0) continue;
    if (!commodity) {
      console.log(`[api] skipping metering point ${eicCode} with unknown commodity`);
      continue;
    }
    byEic.set(eicCode, { eicCode, commodityType: commodity });
  }
  return [...byEic.values()];
}

export type ApiClientOptions = {
  timeoutMs?: number;
};

/**
 * Authenticated, rate-limited access to the metering-data API.
 * The token manager and rate limiter are shared with every other user of
 * the same credentials and are passed in rather than created here.
 */
export class ApiClient {
  private readonly apiHost: string;
  private readonly timeoutMs: number;

  constructor(
    apiHost: string,
    private readonly tokens: TokenManager,
    readonly limiter: RateLimiter,
    opts: ApiClientOptions = {},
  ) {
    this.apiHost = apiHost.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async discoverMeteringPoints(): Promise<MeteringPoint[]> {
    const now = new Date();
    const data = await this.request(
      METERING_POINTS_PATH,
      { startDateTime: toApiDateTime(now), endDateTime: toApiDateTime(now) },
      "metering-point-eics",
    );
    const points = parseMeteringPoints(data);
    if (points.length === 0) {
      console.log(`[api] no metering points returned by ${this.apiHost}, check the credentials' access`);
    }
    return points;
  }

  /** Numeric fields of the newest measurement in the last few hours; `{}` if none. */
  async fetchCurrent(eicCode: string, resolution: Resolution = "hour"): Promise<Readings> {
    const end = new Date();
    const start = new Date(end.getTime() - CURRENT_WINDOW_HOURS * 60 * 60 * 1000);
    const measurements = await this.fetchMeasurements(eicCode, start, end, resolution);

    let latest: Measurement | undefined;
    let latestTs = "";
    for (const m of measurements) {
      const ts = typeof m.timestamp === "string" ? normalizeTimestamp(m.timestamp) : undefined;
      if (ts !== undefined && ts >= latestTs) {
        latest = m;
        latestTs = ts;
      }
    }
    return latest ? numericFields(latest) : {};
  }

  async fetchRange(eicCode: string, start: Date, end: Date, resolution: Resolution): Promise<DataPoint[]> {
    const measurements = await this.fetchMeasurements(eicCode, start, end, resolution);

    const points: DataPoint[] = [];
    for (const m of measurements) {
      const timestamp = typeof m.timestamp === "string" ? normalizeTimestamp(m.timestamp) : undefined;
      if (!timestamp) continue;
      for (const [fieldName, value] of Object.entries(numericFields(m))) {
        points.push({ timestamp, resolution, fieldName, value });
      }
    }
    points.sort((a, b) => (a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0));
    return points;
  }

  private async fetchMeasurements(eicCode: string, start: Date, end: Date, resolution: Resolution): Promise<Measurement[]> {
    const data = await this.request(
      METERING_DATA_PATH,
      {
        startDateTime: toApiDateTime(start),
        endDateTime: toApiDateTime(end),
        resolution: API_RESOLUTION[resolution],
        meteringPointEics: eicCode,
      },
      "metering-data",
    );
    return extractMeasurements(data, eicCode);
  }

  private async request(path: string, params: Record<string, string>, op: string): Promise<unknown> {
    const url = `${this.apiHost}${path}?${new URLSearchParams(params).toString()}`;

    const first = await this.send(url, op);
    if (first !== "unauthorized") return first.data;

    // One retry with a fresh token; a second 401 means the credentials are bad.
    const second = await this.send(url, op);
    if (second === "unauthorized") throw new AuthError(`API refused a fresh token for ${op} (HTTP 401)`, 401);
    return second.data;
  }

  private async send(url: string, op: string): Promise<{ data: unknown } | "unauthorized"> {
    const token = await this.tokens.getValidToken();
    await this.limiter.acquire();

    let resp: Response;
    let text: string;
    try {
      ({ resp, text } = await timedFetch(
        url,
        { method: "GET", headers: { Accept: "application/json", Authorization: `Bearer ${token.accessToken}` } },
        op,
        this.timeoutMs,
      ));
    } catch (e) {
      this.limiter.recordResponse();
      if (e instanceof RequestTimeoutError) throw new RetryableApiError(`${op} timed out after ${e.timeoutMs}ms`, undefined, { op });
      throw new TransportError(`${op} failed: ${errMessage(e)}`, e, { op });
    }

    this.limiter.recordResponse(resp.headers);
    const data = parseJson(text);

    if (resp.status === 401) {
      this.tokens.invalidate(token);
      return "unauthorized";
    }
    if (resp.status === 429 || resp.status >= 500) {
      throw new RetryableApiError(`${op} failed (HTTP ${resp.status})`, resp.status, { op });
    }
    if (!resp.ok) {
      const detail = isRecord(data) && typeof data.message === "string" ? `: ${data.message}` : "";
      throw new FatalApiError(`${op} failed (HTTP ${resp.status})${detail}`, resp.status, { op });
    }
    return { data };
  }
}
