import { systemClock, type Clock } from '@observatory/shared';

/** Boolean gate keyed by user id. */
export interface RateLimiter {
  /** Records the attempt when allowed; rejected attempts are not recorded. */
  isRateLimited(userId: number): boolean;
}

export interface SlidingWindowOptions {
  windowMs: number;
  maxRequests: number;
  clock?: Clock;
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly attempts = new Map<number, number[]>();
  private readonly clock: Clock;
  private lastSweep = 0;

  constructor(private readonly options: SlidingWindowOptions) {
    this.clock = options.clock ?? systemClock;
  }

  isRateLimited(userId: number): boolean {
    const now = this.clock().getTime();
    this.sweep(now);

    const recent = (this.attempts.get(userId) ?? []).filter((timestamp) => this.inWindow(timestamp, now));

    if (recent.length >= this.options.maxRequests) {
      this.attempts.set(userId, recent);
      return true;
    }

    recent.push(now);
    this.attempts.set(userId, recent);
    return false;
  }

  /** Users with attempts still inside the window as of the last sweep. */
  get size(): number {
    return this.attempts.size;
  }

  /** Drops users whose attempts have all left the window; runs at most once per window. */
  private sweep(now: number): void {
    if (now - this.lastSweep < this.options.windowMs) return;
    this.lastSweep = now;

    for (const [userId, timestamps] of this.attempts) {
      if (!timestamps.some((timestamp) => this.inWindow(timestamp, now))) {
        this.attempts.delete(userId);
      }
    }
  }

  private inWindow(timestamp: number, now: number): boolean {
    return now - timestamp < this.options.windowMs;
  }
}
