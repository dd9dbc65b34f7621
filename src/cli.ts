import { Command } from "commander";
import { DEFAULT_CONFIG_PATH } from "./config.js";

export type CliOptions = {
  config: string;
  loglevel: string;
};

export function createProgram(): Command {
  return new Command()
    .name("channel-clock-bot")
    .description("Discord bot that renames a voice channel to show the current time")
    .version("1.0.0")
    .option("-c, --config <path>", "path to a config file", DEFAULT_CONFIG_PATH)
    .option(
      "-L, --loglevel <level>",
      "log level [DEBUG, INFO, WARNING, ERROR, CRITICAL]",
      "INFO",
    );
}

/** Parses user arguments, i.e. process.argv without the node and script entries. */
export function parseCli(argv: string[], program = createProgram()): CliOptions {
  program.parse(argv, { from: "user" });
  return program.opts<CliOptions>();
}
