import { Telegraf, type Context } from "telegraf";
import { MAX_BACKFILL_DAYS } from "./backfillEngine.js";
import type { AppConfig } from "./config.js";
import type { Coordinator, ReadingSink } from "./coordinator.js";
import { AuthError, ValidationError, errMessage } from "./errors.js";
import type { BackfillResult, DataPoint, MeteringPoint, Readings } from "./types.js";

export function isAllowedUser(userId: number | undefined, allowed: number[]): boolean {
  if (!userId) return false;
  if (allowed.length === 0) return true;
  return allowed.includes(userId);
}

export function parseIntArg(s: string | undefined): number | undefined {
  if (!s) return undefined;
  const n = Number(s);
  if (!Number.isFinite(n)) return undefined;
  return Math.floor(n);
}

export const BACKFILL_COMMAND_DEFAULT_DAYS = 90;

/**
 * "/backfill", "/backfill 30", "/backfill <eic>" and "/backfill 30 <eic>".
 * Undefined when the day count is out of range.
 */
export function parseBackfillArgs(args: string[]): { days: number; eic: string | undefined } | undefined {
  const [first, second] = args;
  const n = parseIntArg(first);
  const days = n ?? BACKFILL_COMMAND_DEFAULT_DAYS;
  if (days < 1 || days > MAX_BACKFILL_DAYS) return undefined;
  return { days, eic: n === undefined ? first : second };
}

function formatValue(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(3);
}

export function formatReadings(eicCode: string, readings: Readings): string {
  const keys = Object.keys(readings).sort();
  if (keys.length === 0) return `${eicCode}: no recent data`;
  return [eicCode, ...keys.map((k) => `${k}: ${formatValue(readings[k] ?? 0)}`)].join("\n");
}

export function formatBackfill(eicCode: string, r: BackfillResult): string {
  const lines = [
    `${eicCode}: ${r.status.replace(/_/g, " ")}${r.cancelled ? " (cancelled)" : ""}`,
    `points fetched: ${r.pointsFetched}`,
    `days: ${r.chunksTotal} (${r.chunksSkipped} already cached, ${r.chunksFailed} failed)`,
  ];
  if (r.failedDays.length > 0) lines.push(`failed: ${r.failedDays.join(", ")}`);
  return lines.join("\n");
}

/** Per-field totals of cached points, one line per field. */
export function summarizeHistory(eicCode: string, days: number, points: DataPoint[]): string {
  if (points.length === 0) return `${eicCode}: nothing cached for the last ${days}d`;
  const totals = new Map<string, number>();
  for (const p of points) totals.set(p.fieldName, (totals.get(p.fieldName) ?? 0) + p.value);
  const first = points[0]?.timestamp.slice(0, 16) ?? "";
  const last = points[points.length - 1]?.timestamp.slice(0, 16) ?? "";
  return [
    `${eicCode}, last ${days}d (${first} .. ${last}):`,
    ...[...totals.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}: ${formatValue(v)}`),
  ].join("\n");
}

function commandArgs(ctx: Context): string[] {
  const text = ctx.message && "text" in ctx.message ? ctx.message.text : "";
  return text.split(/\s+/).filter(Boolean).slice(1);
}

/** Pushes every fresh reading into the chats that subscribed with /watch. */
class ChatReadingSink implements ReadingSink {
  readonly chats = new Set<number>();

  constructor(private readonly bot: Telegraf) {}

  async publish(point: MeteringPoint, readings: Readings): Promise<void> {
    for (const chatId of this.chats) {
      try {
        await this.bot.telegram.sendMessage(chatId, formatReadings(point.eicCode, readings));
      } catch (e) {
        console.error("[bot] push failed:", { chatId, error: errMessage(e) });
      }
    }
  }
}

export function startBot(config: AppConfig, coordinator: Coordinator): Telegraf {
  if (!config.telegram) throw new ValidationError("Telegram is not configured");
  const { token, allowedUserIds } = config.telegram;
  const bot = new Telegraf(token);
  const sink = new ChatReadingSink(bot);
  coordinator.setSink(sink);

  console.log("[bot] starting up...");
  console.log("[bot] allowed user ids:", allowedUserIds.length > 0 ? allowedUserIds : "any");

  bot.use(async (ctx, next) => {
    if (!isAllowedUser(ctx.from?.id, allowedUserIds)) {
      await ctx.reply("not authorized");
      return;
    }
    const msg = ctx.message && "text" in ctx.message ? ctx.message.text : undefined;
    if (msg?.startsWith("/")) {
      console.log("[cmd]", { cmd: msg.slice(0, 50), user: ctx.from?.id, chat: ctx.chat?.id, ts: new Date().toISOString() });
    }
    return next();
  });

  bot.catch((err, ctx) => {
    console.error("[bot error]", {
      err: errMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
      updateId: ctx.update.update_id,
      from: ctx.from?.id,
    });
    ctx.reply("oops, something went wrong. try again?").catch((e: unknown) => {
      console.error("[bot] could not send error reply:", errMessage(e));
    });
  });

  // Most commands take an optional EIC; with a single metering point it can be left out.
  const pickPoint = async (ctx: Context, arg: string | undefined): Promise<string | undefined> => {
    const points = coordinator.meteringPoints;
    if (arg) return arg;
    if (points.length === 1) return points[0]?.eicCode;
    await ctx.reply(points.length === 0 ? "no metering points available" : "which one? add the EIC code (see /points)");
    return undefined;
  };

  bot.start(async (ctx) => {
    await ctx.reply(
      [
        "i poll your metering data.",
        "",
        "/points - metering points",
        "/current [eic] - latest readings",
        `/backfill [days] [eic] - fetch history (1-${MAX_BACKFILL_DAYS} days, default ${BACKFILL_COMMAND_DEFAULT_DAYS})`,
        "/history [eic] [days] - cached totals (default: 7d)",
        "/watch - push readings here after every poll",
        "/status - rate limit and cache status",
      ].join("\n"),
    );
  });

  bot.command(["points", "p"], async (ctx) => {
    const points = coordinator.meteringPoints;
    if (points.length === 0) {
      await ctx.reply("no metering points available");
      return;
    }
    await ctx.reply(points.map((p) => `${p.eicCode} (${p.commodityType})`).join("\n"));
  });

  bot.command(["current", "c"], async (ctx) => {
    const eic = await pickPoint(ctx, commandArgs(ctx)[0]);
    if (!eic) return;
    try {
      const readings = await coordinator.refreshCurrent(eic);
      await ctx.reply(formatReadings(eic, readings));
    } catch (e) {
      await ctx.reply(e instanceof ValidationError ? e.message : "couldn't fetch current readings");
      console.error("[current] failed:", { eic, error: errMessage(e) });
    }
  });

  bot.command(["backfill", "bf"], async (ctx) => {
    const parsed = parseBackfillArgs(commandArgs(ctx));
    if (!parsed) {
      await ctx.reply(`usage: /backfill [1-${MAX_BACKFILL_DAYS}] [eic]`);
      return;
    }
    const { days } = parsed;
    const eic = await pickPoint(ctx, parsed.eic);
    if (!eic) return;

    await ctx.reply(`fetching ${days}d of history for ${eic}, this can take a while (one request every few seconds)`);
    try {
      const result = await coordinator.triggerBackfill(eic, days);
      await ctx.reply(formatBackfill(eic, result));
    } catch (e) {
      const reason = e instanceof AuthError ? "credentials were rejected" : e instanceof ValidationError ? e.message : "backfill failed";
      await ctx.reply(reason);
      console.error("[backfill] failed:", { eic, days, error: errMessage(e) });
    }
  });

  bot.command(["history", "h"], async (ctx) => {
    const args = commandArgs(ctx);
    // "/history 30" and "/history <eic> 30" both work.
    const numericFirst = parseIntArg(args[0]) !== undefined && coordinator.meteringPoints.length === 1;
    const eic = await pickPoint(ctx, numericFirst ? undefined : args[0]);
    if (!eic) return;
    const days = Math.min(MAX_BACKFILL_DAYS, Math.max(1, parseIntArg(numericFirst ? args[0] : args[1]) ?? 7));

    try {
      await ctx.reply(summarizeHistory(eic, days, await coordinator.history(eic, days)));
    } catch (e) {
      await ctx.reply(e instanceof ValidationError ? e.message : "couldn't read history");
      console.error("[history] failed:", { eic, error: errMessage(e) });
    }
  });

  bot.command(["watch", "w"], async (ctx) => {
    if (typeof ctx.chat?.id !== "number") return;
    const on = !sink.chats.has(ctx.chat.id);
    if (on) sink.chats.add(ctx.chat.id);
    else sink.chats.delete(ctx.chat.id);
    await ctx.reply(on ? "watching: readings will be pushed here" : "stopped watching");
  });

  bot.command(["status", "s"], async (ctx) => {
    const d = await coordinator.diagnostics();
    const rl = d.rateLimit;
    const lines = [
      `points: ${d.meteringPoints.length}, resolution: ${d.resolution}, poll every ${d.scanIntervalSeconds}s`,
      `last refresh: ${d.lastRefresh ?? "never"}`,
      `last request: ${rl.lastRequestTime ?? "never"}, blocked: ${rl.blockedRequestsCount}, waiting: ${rl.waitingRequests}`,
      ...Object.entries(rl.serverHeaders).map(([k, v]) => `${k}: ${v}`),
      ...Object.entries(d.history).map(([eic, h]) => `${eic}: ${h.pointCount} cached point(s), last ${h.lastTimestamp ?? "-"}`),
    ];
    for (const p of d.meteringPoints) {
      const run = coordinator.engine.runState(p.eicCode);
      if (run) lines.push(`${p.eicCode} backfill: ${run.status} (${run.chunksDone}/${run.chunksTotal})`);
    }
    await ctx.reply(lines.join("\n"));
  });

  return bot;
}
