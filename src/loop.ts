import { createLogger, type Logger } from "./logger.js";

export interface LoopOptions {
  intervalMs: number;
  /** Fire on wall-clock multiples of intervalMs instead of intervalMs after the last run. */
  alignToInterval?: boolean;
  runOnStart?: boolean;
  now?: () => number;
}

/** Receives the time the run was armed for, which a timer firing early does not change. */
export type LoopTask = (scheduledAt: number) => Promise<void>;

/**
 * Runs a task periodically. The next run is armed only once the current
 * one has settled, so runs never overlap. A failing run is logged and the
 * next tick tries again.
 */
export class Loop {
  private timer: NodeJS.Timeout | null = null;
  private active = false;
  private inFlight = false;
  private logger: Logger;

  constructor(
    name: string,
    private task: LoopTask,
    private options: LoopOptions,
  ) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`[${name}] intervalMs must be positive`);
    }
    this.logger = createLogger(name);
  }

  get isRunning(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) return;
    this.active = true;
    this.logger.debug(`Loop started (every ${this.options.intervalMs}ms)`);
    // a run still settling from before stop() re-arms the timer itself
    if (this.inFlight) return;
    const now = this.currentTime();
    this.schedule(this.options.runOnStart ? now : this.nextRunAt(now));
  }

  stop(): void {
    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.debug("Loop stopped");
  }

  /** The first run time strictly after `from`. */
  nextRunAt(from: number): number {
    const { intervalMs, alignToInterval } = this.options;
    if (!alignToInterval) return from + intervalMs;
    return from - (from % intervalMs) + intervalMs;
  }

  /** Milliseconds until the next run, measured from now. */
  nextDelay(): number {
    const now = this.currentTime();
    return this.nextRunAt(now) - now;
  }

  private currentTime(): number {
    return this.options.now?.() ?? Date.now();
  }

  private schedule(runAt: number): void {
    const delay = Math.max(0, runAt - this.currentTime());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = true;
      this.runOnce(runAt).finally(() => {
        this.inFlight = false;
        // a timer that fired before runAt still counts as the run for runAt
        if (this.active) this.schedule(this.nextRunAt(Math.max(this.currentTime(), runAt)));
      });
    }, delay);
  }

  private async runOnce(scheduledAt: number): Promise<void> {
    try {
      await this.task(scheduledAt);
    } catch (err) {
      this.logger.error("Task failed, retrying on the next tick:", err);
    }
  }
}
