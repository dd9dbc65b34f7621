import {
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  Partials,
  type Message,
  type VoiceBasedChannel,
} from "discord.js";
import { ClockUpdater } from "../clock/clock-updater.js";
import type { Config } from "../config.js";
import { LiveStatusWatcher, type LiveChannel } from "../live/live-status.js";
import { createLogger } from "../logger.js";
import { handleAdminMessage, type AdminMessage } from "./admin-commands.js";
import { fetchVoiceChannel, toLiveChannel } from "./channels.js";

export interface Bot {
  client: Client;
  /** Stops the periodic tasks and disconnects. */
  shutdown(): Promise<void>;
}

const logger = createLogger("Discord");

function toAdminMessage(message: Message): AdminMessage {
  return {
    authorId: message.author.id,
    authorName: message.author.username,
    isBot: message.author.bot,
    isDirect: message.channel.type === ChannelType.DM,
    content: message.content,
    reply: (text) => message.reply(text),
  };
}

export function createDiscordClient(config: Config): Bot {
  const adminUserId = config.discord.adminUserId;
  const intents = [GatewayIntentBits.Guilds];
  const partials: Partials[] = [];
  // DM channels are not cached, so they arrive as partials
  if (adminUserId) {
    intents.push(GatewayIntentBits.DirectMessages);
    partials.push(Partials.Channel);
  }
  const client = new Client({ intents, partials });

  let clock: ClockUpdater | undefined;
  let liveWatcher: LiveStatusWatcher | undefined;
  let liveChannel: LiveChannel | null = null;

  async function onReady(ready: Client<true>): Promise<void> {
    logger.info(`Logged in as ${ready.user.tag} (ID: ${ready.user.id})`);

    clock = new ClockUpdater(config.clock.channelId, (id) =>
      fetchVoiceChannel<VoiceBasedChannel>(ready, id),
    );
    clock.start();

    if (config.live) {
      const channel = await fetchVoiceChannel<VoiceBasedChannel>(ready, config.live.channelId);
      if (channel) {
        liveChannel = toLiveChannel(channel);
        liveWatcher = new LiveStatusWatcher(liveChannel, config.live.statusUrl);
        liveWatcher.start();
      } else {
        logger.error(`Live channel ${config.live.channelId} unavailable, live status disabled`);
      }
    }

    logger.info("=== Bot ready ===");
  }

  client.once(Events.ClientReady, (ready) => {
    onReady(ready).catch((err) => logger.error("Ready handler failed:", err));
  });

  if (adminUserId) {
    client.on(Events.MessageCreate, (message) => {
      handleAdminMessage(toAdminMessage(message), adminUserId, liveChannel).catch((err) =>
        logger.error("Failed to handle admin message:", err),
      );
    });
  }

  client.on(Events.Error, (err) => logger.error("Client error:", err));
  client.on(Events.Warn, (message) => logger.warn(message));
  client.on(Events.Debug, (message) => logger.debug(message));

  return {
    client,
    async shutdown() {
      clock?.stop();
      liveWatcher?.stop();
      logger.info("Shutting down bot.");
      await client.destroy();
      logger.info("Disconnected successfully.");
    },
  };
}
