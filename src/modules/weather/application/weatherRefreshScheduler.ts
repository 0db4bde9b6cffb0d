import { logger } from '@observatory/shared';

import type { WeatherRefresher } from './weatherProvider';

/** Periodically recomputes the weather of upcoming slots. */
export class WeatherRefreshScheduler {
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    private readonly refresher: WeatherRefresher,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.intervalId) return;

    this.intervalId = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error({ error }, '[Weather Refresh] Run failed');
      });
    }, this.intervalMs);
    this.intervalId.unref();
    logger.info({ intervalMs: this.intervalMs }, '[Weather Refresh] Scheduler started');
  }

  stop(): void {
    if (!this.intervalId) return;

    clearInterval(this.intervalId);
    this.intervalId = null;
    logger.info('[Weather Refresh] Scheduler stopped');
  }

  isStarted(): boolean {
    return this.intervalId !== null;
  }

  /** One refresh run; skipped while the previous one is still going. */
  async tick(): Promise<boolean> {
    if (this.running) {
      logger.debug('[Weather Refresh] Previous run still in progress, skipping');
      return false;
    }

    this.running = true;
    try {
      const { updated } = await this.refresher.refreshAllUpcoming();
      logger.info({ updated }, '[Weather Refresh] Run complete');
      return true;
    } finally {
      this.running = false;
    }
  }
}
