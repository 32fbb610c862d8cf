import { ValidationError } from "./errors.js";
import { DEFAULT_TOKEN_URL } from "./tokenManager.js";
import { isResolution, type Credentials, type Resolution } from "./types.js";

export type Env = Record<string, string | undefined>;

export const DEFAULT_API_HOST = "https://estfeed.elering.ee";
export const DEFAULT_SCAN_INTERVAL_S = 300;
export const DEFAULT_BACKFILL_DAYS = 7;

export type PollerConfig = {
  scanIntervalSeconds: number;
  resolution: Resolution;
  backfillDays: number; // 0 = no backfill on setup
  enableElectricity: boolean;
  enableGas: boolean;
};

export type AppConfig = {
  credentials: Credentials;
  poller: PollerConfig;
  dataDir: string;
  telegram?: {
    token: string;
    allowedUserIds: number[];
  };
};

function required(env: Env, name: string): string {
  const v = env[name];
  if (!v) throw new ValidationError(`Missing env var: ${name}`);
  return v;
}

function optional(env: Env, name: string): string | undefined {
  const v = env[name];
  return v && v.length > 0 ? v : undefined;
}

function intInRange(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max}`, { value: raw });
  }
  return n;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ValidationError(`${name} must be a boolean`, { value: raw });
}

export function loadConfig(env: Env, opts: { requireTelegram?: boolean } = {}): AppConfig {
  const resolution = optional(env, "METERFEED_RESOLUTION") ?? "hour";
  if (!isResolution(resolution)) {
    throw new ValidationError("METERFEED_RESOLUTION must be one of 15min, hour, week, month", { value: resolution });
  }

  const config: AppConfig = {
    credentials: {
      apiHost: optional(env, "METERFEED_API_HOST") ?? DEFAULT_API_HOST,
      tokenUrl: optional(env, "METERFEED_TOKEN_URL") ?? DEFAULT_TOKEN_URL,
      clientId: required(env, "METERFEED_CLIENT_ID"),
      clientSecret: required(env, "METERFEED_CLIENT_SECRET"),
    },
    poller: {
      scanIntervalSeconds: intInRange(env, "METERFEED_SCAN_INTERVAL", DEFAULT_SCAN_INTERVAL_S, 60, 3600),
      resolution,
      backfillDays: intInRange(env, "METERFEED_BACKFILL_DAYS", DEFAULT_BACKFILL_DAYS, 0, 365),
      enableElectricity: flag(env, "METERFEED_ENABLE_ELECTRICITY", true),
      enableGas: flag(env, "METERFEED_ENABLE_GAS", true),
    },
    dataDir: optional(env, "METERFEED_DATA_DIR") ?? process.cwd(),
  };

  if (opts.requireTelegram) {
    const botToken = required(env, "TELEGRAM_BOT_TOKEN");
    if (botToken.length < 40) {
      throw new ValidationError("TELEGRAM_BOT_TOKEN appears invalid (too short)");
    }
    const allowedUserIds =
      optional(env, "TELEGRAM_ALLOWED_USER_IDS")
        ?.split(",")
        .map((s) => s.trim())
        .filter(Boolean)
        .map((s) => Number(s))
        .filter((n) => Number.isFinite(n) && n > 0) ?? [];
    config.telegram = { token: botToken, allowedUserIds };
  }

  return config;
}
