/**
 * Seeds the history cache from a metering-data CSV export.
 *
 * Usage:
 *   node dist/scripts/import-csv.js <eic> <file.csv> [--resolution hour]
 *
 * Only needs METERFEED_DATA_DIR (default: current directory).
 */

import { readFileSync } from "node:fs";
import { env } from "node:process";
import { importHistoryCsv } from "../src/csvImport.js";
import { errMessage } from "../src/errors.js";
import { HistoryCache } from "../src/historyCache.js";
import { FileHistoryBackend } from "../src/storage.js";
import { isResolution } from "../src/types.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const [eic, file] = args;
  const resolution = args.includes("--resolution") ? args[args.indexOf("--resolution") + 1] ?? "" : "hour";

  if (!eic || !file || !isResolution(resolution)) {
    console.error("usage: import-csv <eic> <file.csv> [--resolution 15min|hour|week|month]");
    process.exitCode = 2;
    return;
  }

  const cache = new HistoryCache(new FileHistoryBackend(env.METERFEED_DATA_DIR || process.cwd()));
  const { points, added, updated } = await importHistoryCsv(cache, eic, readFileSync(file, "utf8"), resolution);
  console.log(`parsed ${points} point(s) from ${file}`);
  const stats = await cache.stats(eic, resolution);
  console.log(`added ${added}, updated ${updated}; ${stats.pointCount} point(s) cached for ${eic} (${resolution})`);
}

main().catch((e: unknown) => {
  console.error("import failed:", errMessage(e));
  process.exit(1);
});
