import { createLogger } from "../logger.js";
import { Loop } from "../loop.js";
import { formatClockName } from "./format.js";

export const CLOCK_INTERVAL_MS = 10 * 60 * 1000;

/** The part of a voice channel the clock touches. */
export interface NamedChannel {
  readonly name: string;
  setName(name: string, reason?: string): Promise<unknown>;
}

export type ChannelResolver<T> = (channelId: string) => Promise<T | null>;

export interface ClockUpdaterOptions {
  now?: () => Date;
  intervalMs?: number;
}

const logger = createLogger("ClockUpdater");

/**
 * Renames the clock channel on every interval boundary. The channel is
 * looked up again on each tick so a deleted or re-permissioned channel
 * only costs that tick.
 */
export class ClockUpdater {
  private loop: Loop;
  private now: () => Date;

  constructor(
    private channelId: string,
    private resolveChannel: ChannelResolver<NamedChannel>,
    options: ClockUpdaterOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.loop = new Loop(
      "ClockUpdater",
      (scheduledAt) => this.update(new Date(scheduledAt)).then(() => undefined),
      {
        intervalMs: options.intervalMs ?? CLOCK_INTERVAL_MS,
        alignToInterval: true,
        runOnStart: true,
        now: () => this.now().getTime(),
      },
    );
  }

  get isRunning(): boolean {
    return this.loop.isRunning;
  }

  start(): void {
    logger.info(`Starting clock for channel ${this.channelId}`);
    this.loop.start();
  }

  stop(): void {
    this.loop.stop();
  }

  /**
   * Names the channel after `at`, the boundary a tick was armed for.
   * Returns true when a rename was sent.
   */
  async update(at: Date = this.now()): Promise<boolean> {
    const channel = await this.resolveChannel(this.channelId);
    if (!channel) {
      logger.warn(`Clock channel ${this.channelId} not found, skipping update`);
      return false;
    }

    const name = formatClockName(at);
    if (channel.name === name) {
      logger.debug(`Channel ${this.channelId} already named ${name}`);
      return false;
    }

    logger.info(`Edit channel: Id[${this.channelId}] Name[${name}]`);
    await channel.setName(name, "Clock update");
    logger.info("Channel edit successful");
    return true;
  }
}
