#!/usr/bin/env node
import { parseCli } from "./cli.js";
import { ConfigError, loadConfig } from "./config.js";
import { createDiscordClient } from "./discord/client.js";
import { createLogger, parseLogLevel, setLogLevel } from "./logger.js";

const logger = createLogger("Main");

async function main(): Promise<void> {
  const options = parseCli(process.argv.slice(2));
  const level = parseLogLevel(options.loglevel);
  setLogLevel(level ?? "INFO");
  if (!level) logger.warn(`Unknown log level ${options.loglevel}, using INFO`);

  const config = loadConfig(options.config);

  logger.info("Starting channel clock bot");
  const bot = createDiscordClient(config);

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.debug(`Caught signal ${signal}`);
    logger.info("Shutdown signal detected.");
    bot.shutdown().then(
      () => {
        logger.info("=== Shutdown complete ===");
        process.exit(0);
      },
      (err) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await bot.client.login(config.discord.token);
}

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection:", reason);
});

main().catch((err) => {
  if (err instanceof ConfigError) {
    logger.error(err.message);
    logger.info("Could not load config file. Exiting.");
  } else {
    logger.critical("Fatal error:", err);
  }
  process.exit(1);
});
