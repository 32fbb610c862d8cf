import { env } from "node:process";
import { startBot } from "./bot.js";
import { loadConfig } from "./config.js";
import { errMessage } from "./errors.js";
import { createRuntime } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadConfig(env, { requireTelegram: true });
  const { coordinator } = createRuntime(config);
  const bot = startBot(config, coordinator);

  await coordinator.setup();
  coordinator.start();

  const shutdown = (signal: "SIGINT" | "SIGTERM") => {
    console.log(`[main] received ${signal}, stopping gracefully...`);
    coordinator.stop();
    try {
      bot.stop(signal);
    } catch (e) {
      // Telegraf throws if the signal arrives before launch() resolved.
      console.error("[main] bot stop:", errMessage(e));
    }
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  // launch() only resolves when polling stops.
  bot.launch().catch((err: unknown) => {
    console.error("[bot] failed to launch:", errMessage(err));
    coordinator.stop();
    process.exitCode = 1;
  });
  console.log("[main] running");
}

main().catch((e: unknown) => {
  console.error("[main] startup failed:", errMessage(e));
  process.exit(1);
});
