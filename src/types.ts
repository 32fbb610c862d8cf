export type Resolution = "15min" | "hour" | "week" | "month";

export const RESOLUTIONS: readonly Resolution[] = ["15min", "hour", "week", "month"];

// Resolution names as the metering-data endpoint expects them.
export const API_RESOLUTION: Record<Resolution, string> = {
  "15min": "FIFTEEN_MIN",
  hour: "HOUR",
  week: "WEEK",
  month: "MONTH",
};

export type CommodityType = "electricity" | "gas";

export type Credentials = {
  apiHost: string;
  clientId: string;
  clientSecret: string;
  tokenUrl?: string;
};

export type Token = {
  accessToken: string;
  expiresAt: number; // epoch ms
};

export type MeteringPoint = {
  eicCode: string;
  commodityType: CommodityType;
};

export type DataPoint = {
  timestamp: string; // UTC ISO-8601
  resolution: Resolution;
  fieldName: string;
  value: number;
};

export type Readings = Record<string, number>;

/** Half-open interval [start, end) of UTC ISO-8601 timestamps. */
export type TimeRange = {
  start: string;
  end: string;
};

export type BackfillRequest = {
  eicCode: string;
  startDay: string; // YYYY-MM-DD
  endDay: string;
  resolution: Resolution;
};

export type BackfillStatus = "pending" | "running" | "completed" | "completed_with_failures" | "aborted";

export type BackfillResult = {
  status: BackfillStatus;
  pointsFetched: number;
  chunksTotal: number;
  chunksSkipped: number;
  chunksFailed: number;
  failedDays: string[];
  cancelled: boolean;
};

export function isResolution(v: string): v is Resolution {
  return RESOLUTIONS.some((r) => r === v);
}
