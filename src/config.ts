import { existsSync, readFileSync } from "fs";
import { parse } from "yaml";

export interface Config {
  discord: { token: string; adminUserId?: string };
  clock: { channelId: string };
  live?: { channelId: string; statusUrl: string };
}

export const DEFAULT_CONFIG_PATH = "config.json";

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Discord ids do not fit in a double, so integers come in as bigint
 * and every id is carried as its decimal string.
 */
function readSnowflake(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "bigint" && value >= 0n) return value.toString();
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return value.toString();
  }
  if (typeof value === "string" && /^\d+$/.test(value)) return value;
  throw new ConfigError(`${key} must be a non-negative integer`);
}

function readStatusUrl(data: Record<string, unknown>): string | undefined {
  const value = data.live_status_url;
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || !URL.canParse(value)) {
    throw new ConfigError("live_status_url must be a URL");
  }
  const { protocol } = new URL(value);
  if (protocol !== "http:" && protocol !== "https:") {
    throw new ConfigError("live_status_url must use http or https");
  }
  return value;
}

export function loadConfig(path = DEFAULT_CONFIG_PATH): Config {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file ${path} doesn't exist`);
  }

  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Config file ${path} could not be read: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let data: unknown;
  try {
    // a repeated key keeps its last value, as JSON.parse would
    data = parse(raw, { intAsBigInt: true, uniqueKeys: false });
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!isRecord(data)) throw new ConfigError(`Config file ${path} must contain an object`);

  const token = data.discord_token;
  if (typeof token !== "string" || token.trim() === "") {
    throw new ConfigError("discord_token is required");
  }

  const clockChannelId = readSnowflake(data, "clock_channel_id");
  if (!clockChannelId) throw new ConfigError("clock_channel_id is required");

  const config: Config = {
    discord: { token },
    clock: { channelId: clockChannelId },
  };

  const adminUserId = readSnowflake(data, "admin_user_id");
  if (adminUserId) config.discord.adminUserId = adminUserId;

  const liveChannelId = readSnowflake(data, "live_channel_id");
  const statusUrl = readStatusUrl(data);
  if (liveChannelId) {
    if (!statusUrl) throw new ConfigError("live_status_url is required with live_channel_id");
    config.live = { channelId: liveChannelId, statusUrl };
  }

  return config;
}
