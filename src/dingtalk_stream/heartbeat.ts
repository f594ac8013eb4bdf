import { errorMessage } from "../errors.js";
import type { Log } from "./logger.js";

export type HeartbeatOptions = {
  intervalMs: number;
  ping: () => Promise<void>;
  /** Called once when the peer missed `maxMissedPongs` pings in a row. */
  onTimeout: () => void;
  maxMissedPongs?: number;
  log: Log;
};

export const MAX_MISSED_PONGS = 2;

/**
 * Ping/pong liveness tracking for one connection epoch.
 *
 * Each tick checks whether a pong arrived since the previous ping, clears the flag, pings and sleeps
 * one interval. Two consecutive ticks without a pong fire `onTimeout`.
 */
export class HeartbeatWatchdog {
  private alive = true;
  private missed = 0;
  private stopped = false;
  private wake: (() => void) | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: HeartbeatOptions) {}

  get enabled(): boolean {
    return this.opts.intervalMs > 0;
  }

  get isAlive(): boolean {
    return this.alive;
  }

  get missedPongs(): number {
    return this.missed;
  }

  markAlive(): void {
    this.alive = true;
  }

  /**
   * Resolves when the peer timed out or {@link stop} was called. Returns immediately when disabled.
   */
  async run(): Promise<void> {
    if (!this.enabled) return;
    while (!this.stopped) {
      this.missed = this.alive ? 0 : this.missed + 1;
      if (this.missed >= (this.opts.maxMissedPongs ?? MAX_MISSED_PONGS)) {
        this.opts.log.warn(`heartbeat timeout, ${this.missed} pings without pong`);
        this.stopped = true;
        this.opts.onTimeout();
        return;
      }
      this.alive = false;
      try {
        await this.opts.ping();
        this.opts.log.debug("heartbeat ping sent");
      } catch (err) {
        this.opts.log.warn(`heartbeat ping failed: ${errorMessage(err)}`);
      }
      await this.sleep(this.opts.intervalMs);
    }
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private sleep(ms: number): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }
}
