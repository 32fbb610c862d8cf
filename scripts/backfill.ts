/**
 * One-off history backfill without the bot.
 *
 * Usage:
 *   node dist/scripts/backfill.js <eic> <days>
 *
 * Reads the same METERFEED_* environment variables as the bot.
 */

import { env } from "node:process";
import { loadConfig } from "../src/config.js";
import { errMessage } from "../src/errors.js";
import { createRuntime } from "../src/runtime.js";

async function main(): Promise<void> {
  const [eic, daysArg] = process.argv.slice(2);
  const days = Number(daysArg);
  if (!eic || !Number.isInteger(days)) {
    console.error("usage: backfill <eic> <days>");
    process.exitCode = 2;
    return;
  }

  const config = loadConfig(env);
  // No automatic backfill on setup: this script runs exactly the one requested.
  const { coordinator, limiter } = createRuntime({ ...config, poller: { ...config.poller, backfillDays: 0 } });

  process.once("SIGINT", () => {
    console.log("\nstopping after the current day...");
    coordinator.stop();
  });

  const points = await coordinator.setup();
  if (!points.some((p) => p.eicCode === eic)) {
    console.error(`${eic} is not among the metering points these credentials can read`);
    process.exitCode = 1;
    coordinator.stop();
    return;
  }

  const result = await coordinator.triggerBackfill(eic, days);
  console.log(JSON.stringify(result, null, 2));
  console.log(`requests delayed by the rate limiter: ${limiter.snapshot().blockedRequestsCount}`);
  coordinator.stop();
}

main().catch((e: unknown) => {
  console.error("backfill failed:", errMessage(e));
  process.exit(1);
});
