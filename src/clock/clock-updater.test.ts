import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { CLOCK_INTERVAL_MS, ClockUpdater, type NamedChannel } from "./clock-updater.js";

class FakeChannel implements NamedChannel {
  name = "General";
  setName = vi.fn(async (name: string, _reason?: string) => {
    this.name = name;
    return this;
  });
}

describe("ClockUpdater", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-04T15:07:00.000Z"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("uses a ten minute interval", () => {
    expect(CLOCK_INTERVAL_MS).toBe(600_000);
  });

  it("renames the channel to the current time", async () => {
    const channel = new FakeChannel();
    const resolve = vi.fn(async (_channelId: string) => channel);
    const updater = new ClockUpdater("42", resolve);

    await expect(updater.update()).resolves.toBe(true);
    expect(resolve).toHaveBeenCalledWith("42");
    expect(channel.setName).toHaveBeenCalledWith("(Now: Mon 3:07pm UTC)", "Clock update");
  });

  it("skips the request when the name is already current", async () => {
    const channel = new FakeChannel();
    channel.name = "(Now: Mon 3:07pm UTC)";
    const updater = new ClockUpdater("42", async () => channel);

    await expect(updater.update()).resolves.toBe(false);
    expect(channel.setName).not.toHaveBeenCalled();
  });

  it("skips the tick when the channel cannot be found", async () => {
    const updater = new ClockUpdater("42", async () => null);
    await expect(updater.update()).resolves.toBe(false);
    expect(console.warn).toHaveBeenCalledWith(
      "2024-03-04T15:07:00.000Z WARNING [ClockUpdater] Clock channel 42 not found, skipping update",
    );
  });

  it("updates on start and then once per ten minute boundary", async () => {
    const channel = new FakeChannel();
    const updater = new ClockUpdater("42", async () => channel);
    updater.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(channel.setName).toHaveBeenCalledTimes(1);
    expect(channel.name).toBe("(Now: Mon 3:07pm UTC)");

    await vi.advanceTimersByTimeAsync(3 * 60 * 1000);
    expect(channel.setName).toHaveBeenCalledTimes(2);
    expect(channel.name).toBe("(Now: Mon 3:10pm UTC)");

    await vi.advanceTimersByTimeAsync(CLOCK_INTERVAL_MS - 1);
    expect(channel.setName).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1);
    expect(channel.setName).toHaveBeenCalledTimes(3);
    expect(channel.name).toBe("(Now: Mon 3:20pm UTC)");

    await vi.advanceTimersByTimeAsync(6 * CLOCK_INTERVAL_MS);
    expect(channel.setName).toHaveBeenCalledTimes(9);
    expect(channel.name).toBe("(Now: Mon 4:20pm UTC)");

    updater.stop();
    expect(updater.isRunning).toBe(false);
  });

  it("retries on the next tick after a rejected rename", async () => {
    const channel = new FakeChannel();
    channel.setName.mockRejectedValueOnce(new Error("Missing Permissions"));
    const updater = new ClockUpdater("42", async () => channel);
    updater.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(channel.setName).toHaveBeenCalledTimes(1);
    expect(channel.name).toBe("General");
    expect(console.error).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3 * 60 * 1000);
    expect(channel.setName).toHaveBeenCalledTimes(2);
    expect(channel.name).toBe("(Now: Mon 3:10pm UTC)");
    updater.stop();
  });

  it("reads the time from an injected clock", async () => {
    const channel = new FakeChannel();
    const updater = new ClockUpdater("42", async () => channel, {
      now: () => new Date("2024-03-08T23:50:00Z"),
    });
    await updater.update();
    expect(channel.name).toBe("(Now: Fri 11:50pm UTC)");
  });
  it("renames once per boundary when timers fire a millisecond early", async () => {
    const fakeSetTimeout = setTimeout;
    vi.stubGlobal("setTimeout", (callback: () => void, ms?: number) =>
      fakeSetTimeout(callback, ms !== undefined && ms > 1000 ? ms - 1 : ms),
    );
    const renames: string[] = [];
    const channel = new FakeChannel();
    channel.setName.mockImplementation(async (name: string) => {
      renames.push(`${new Date().toISOString()} ${name}`);
      channel.name = name;
      return channel;
    });
    const updater = new ClockUpdater("42", async () => channel);
    updater.start();

    await vi.advanceTimersByTimeAsync(3 * 60 * 1000);
    expect(renames).toEqual([
      "2024-03-04T15:07:00.000Z (Now: Mon 3:07pm UTC)",
      "2024-03-04T15:09:59.999Z (Now: Mon 3:10pm UTC)",
    ]);

    await vi.advanceTimersByTimeAsync(CLOCK_INTERVAL_MS);
    expect(renames).toHaveLength(3);
    expect(renames[2]).toBe("2024-03-04T15:19:59.999Z (Now: Mon 3:20pm UTC)");

    updater.stop();
  });
});
