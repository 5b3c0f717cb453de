import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

export interface ThrottleLimits {
  windowMs: number;
  maxRequests: number;
}

/**
 * Fixed-window throttle for outbound resolver calls. A call over the
 * window's budget waits for the next window instead of failing, so a
 * batch slows down to the limit rather than losing rows. Callers are
 * admitted in arrival order.
 */
export class CallThrottle {
  private windowStart = Number.NEGATIVE_INFINITY;
  private used = 0;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly limits: ThrottleLimits,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(limits.maxRequests) || limits.maxRequests < 1) {
      throw new Error(`Throttle maxRequests must be >= 1 (got ${limits.maxRequests})`);
    }
  }

  static fromConfig(
    cfg: { enabled: boolean } & ThrottleLimits,
    clock: Clock = systemClock
  ): CallThrottle | null {
    return cfg.enabled ? new CallThrottle(cfg, clock) : null;
  }

  /**
   * Resolves once the call may go out.
   * @returns milliseconds spent waiting for a window
   */
  admit(): Promise<number> {
    const turn = this.tail.then(() => this.take());
    this.tail = turn.catch(() => 0);
    return turn;
  }

  private async take(): Promise<number> {
    const now = this.clock.now();
    if (now >= this.windowStart + this.limits.windowMs) {
      this.openWindow(now);
    }
    if (this.used < this.limits.maxRequests) {
      this.used++;
      return 0;
    }

    const waitMs = this.windowStart + this.limits.windowMs - now;
    await this.clock.sleep(waitMs);
    this.openWindow(Math.max(this.clock.now(), this.windowStart + this.limits.windowMs));
    this.used = 1;
    return waitMs;
  }

  private openWindow(start: number): void {
    this.windowStart = start;
    this.used = 0;
  }
}
