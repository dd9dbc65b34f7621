import { hideLiveChannel, showLiveChannel, type LiveChannel } from "../live/live-status.js";
import { createLogger } from "../logger.js";

export type AdminCommand = "hide" | "show" | "unknown";

/** The fields of a received message the admin handler reads. */
export interface AdminMessage {
  authorId: string;
  authorName: string;
  isBot: boolean;
  isDirect: boolean;
  content: string;
  reply(text: string): Promise<unknown>;
}

const COMMANDS = new Map<string, AdminCommand>([
  ["!hide_live_channel", "hide"],
  ["!show_live_channel", "show"],
]);

const logger = createLogger("AdminCommands");

export function parseAdminCommand(content: string): AdminCommand {
  return COMMANDS.get(content.trim()) ?? "unknown";
}

/**
 * Handles a direct message from the admin user. Returns the command that
 * was recognised, or null when the message is not for us.
 */
export async function handleAdminMessage(
  message: AdminMessage,
  adminUserId: string,
  liveChannel: LiveChannel | null,
): Promise<AdminCommand | null> {
  if (message.isBot || !message.isDirect) return null;
  if (message.authorId !== adminUserId) return null;

  logger.info(`Recv DM from [${message.authorName}]: ${message.content}`);
  const command = parseAdminCommand(message.content);

  if (command === "unknown") {
    await message.reply("I'm not sure what you want.");
    return command;
  }
  if (!liveChannel) {
    await message.reply("There is no live channel configured.");
    return command;
  }

  if (command === "hide") {
    await message.reply("Hiding the live channel.");
    await hideLiveChannel(liveChannel);
  } else {
    await message.reply("Making the live channel visible.");
    await showLiveChannel(liveChannel);
  }
  return command;
}
