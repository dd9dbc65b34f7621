import type { NamedChannel } from "../clock/clock-updater.js";
import { createLogger } from "../logger.js";
import { Loop } from "../loop.js";

export const LIVE_POLL_INTERVAL_MS = 60 * 1000;
export const LIVE_FETCH_TIMEOUT_MS = 10 * 1000;
export const LIVE_CHANNEL_NAME = "🟢 Live now!";
export const OFFLINE_CHANNEL_NAME = "🔴 Not live";

/** A voice channel whose name and @everyone visibility follow the stream. */
export interface LiveChannel extends NamedChannel {
  setVisible(visible: boolean, reason: string): Promise<void>;
}

export type FetchFn = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

const logger = createLogger("LiveStatus");

/**
 * Polls the status endpoint, which answers `{"live": 1}` while streaming.
 * Returns null when the endpoint does not answer 200; rejects when the
 * request times out or a 200 body is not JSON.
 */
export async function fetchLiveStatus(
  url: string,
  fetchFn: FetchFn = fetch,
): Promise<boolean | null> {
  logger.debug(`Checking live status from ${url}`);
  const res = await fetchFn(url, { signal: AbortSignal.timeout(LIVE_FETCH_TIMEOUT_MS) });
  logger.debug(`Live status HTTP code: ${res.status}`);
  if (res.status !== 200) {
    // unread bodies pin the connection
    await res.body?.cancel();
    return null;
  }

  const body: unknown = await res.json();
  logger.debug("Live status body:", body);
  if (typeof body !== "object" || body === null || !("live" in body)) return false;
  return body.live === 1 || body.live === true;
}

export async function showLiveChannel(channel: LiveChannel): Promise<void> {
  await channel.setName(LIVE_CHANNEL_NAME, "Live!");
  await channel.setVisible(true, "Live!");
}

export async function hideLiveChannel(channel: LiveChannel): Promise<void> {
  await channel.setName(OFFLINE_CHANNEL_NAME, "Not Live");
  await channel.setVisible(false, "Not Live");
}

export interface LiveStatusWatcherOptions {
  fetchFn?: FetchFn;
  intervalMs?: number;
}

export class LiveStatusWatcher {
  private live: boolean;
  private loop: Loop;
  private fetchFn: FetchFn | undefined;

  constructor(
    private channel: LiveChannel,
    private statusUrl: string,
    options: LiveStatusWatcherOptions = {},
  ) {
    this.live = channel.name === LIVE_CHANNEL_NAME;
    this.fetchFn = options.fetchFn;
    this.loop = new Loop("LiveStatusWatcher", () => this.check().then(() => undefined), {
      intervalMs: options.intervalMs ?? LIVE_POLL_INTERVAL_MS,
      runOnStart: true,
    });
    logger.info(`Initial live status: ${this.live}`);
  }

  get isLive(): boolean {
    return this.live;
  }

  get isRunning(): boolean {
    return this.loop.isRunning;
  }

  start(): void {
    this.loop.start();
  }

  stop(): void {
    this.loop.stop();
  }

  /** Returns true when the channel was toggled. */
  async check(): Promise<boolean> {
    const live = await fetchLiveStatus(this.statusUrl, this.fetchFn);
    if (live === null || live === this.live) return false;

    if (live) {
      logger.info("Channel ONLINE event");
      await showLiveChannel(this.channel);
    } else {
      logger.info("Channel OFFLINE event");
      await hideLiveChannel(this.channel);
    }
    this.live = live;
    return true;
  }
}
