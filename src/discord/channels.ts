import type { VoiceBasedChannel } from "discord.js";
import type { LiveChannel } from "../live/live-status.js";
import { createLogger } from "../logger.js";

/** What the lookup needs from a fetched channel; discord.js channels satisfy it. */
export interface FetchedChannel<V> {
  isVoiceBased(): this is V;
}

export interface ChannelFetcher<V> {
  channels: { fetch(channelId: string): Promise<FetchedChannel<V> | null> };
}

/** The parts of a guild voice channel the live toggle touches. */
export interface OverwritableChannel<R> {
  readonly name: string;
  readonly guild: { roles: { everyone: R } };
  setName(name: string, reason?: string): Promise<unknown>;
  permissionOverwrites: {
    edit(
      target: R,
      options: { ViewChannel: boolean | null },
      overwriteOptions: { reason: string },
    ): Promise<unknown>;
  };
}

const logger = createLogger("Discord");

/** Null when the channel is missing, not visible to the bot, or not a voice channel. */
export async function fetchVoiceChannel<V = VoiceBasedChannel>(
  client: ChannelFetcher<V>,
  channelId: string,
): Promise<V | null> {
  try {
    const channel = await client.channels.fetch(channelId);
    if (!channel) {
      logger.warn(`Channel ${channelId} not found`);
      return null;
    }
    if (!channel.isVoiceBased()) {
      logger.warn(`Channel ${channelId} is not a voice channel`);
      return null;
    }
    return channel;
  } catch (err) {
    logger.error(`Failed to fetch channel ${channelId}:`, err);
    return null;
  }
}

/** Visibility is the @everyone ViewChannel overwrite: denied when hidden, unset when shown. */
export function toLiveChannel<R>(channel: OverwritableChannel<R>): LiveChannel {
  return {
    get name() {
      return channel.name;
    },
    setName: (name, reason) => channel.setName(name, reason),
    async setVisible(visible, reason) {
      await channel.permissionOverwrites.edit(
        channel.guild.roles.everyone,
        { ViewChannel: visible ? null : false },
        { reason },
      );
    },
  };
}
