/**
 * Health Monitor - rolling publish success rate with threshold alerting
 *
 * Reads terminal outcomes from the store's archives over a trailing
 * window. Never mutates the store.
 *
 * @module deploy/slotcast/health/health-monitor
 */

import type { ScheduleStore } from '../store/schedule-store.js';
import { systemClock, type Clock, type TimeWindow } from '../types.js';
import type { NotificationSink } from './notification-sink.js';

export interface HealthConfig {
  /** Trailing window in hours (default: 24) */
  windowHours: number;
  /** Degraded below this rate (default: 0.9) */
  threshold: number;
  /** Samples required before the rate can mark the system degraded (default: 10) */
  minSamples: number;
}

export interface HealthReport {
  window: { since: string; until: string };
  posted: number;
  failed: number;
  samples: number;
  /** null when the window holds no outcomes */
  successRate: number | null;
  degraded: boolean;
  threshold: number;
  minSamples: number;
}

export const DEFAULT_HEALTH_CONFIG: HealthConfig = {
  windowHours: 24,
  threshold: 0.9,
  minSamples: 10,
};

export class HealthMonitor {
  private readonly config: HealthConfig;

  constructor(
    private readonly store: ScheduleStore,
    private readonly sink?: NotificationSink,
    config?: Partial<HealthConfig>,
    private readonly clock: Clock = systemClock
  ) {
    this.config = { ...DEFAULT_HEALTH_CONFIG, ...config };
  }

  successRate(now?: Date): number | null {
    return this.report(now).successRate;
  }

  report(now: Date = this.clock.now()): HealthReport {
    const window = this.windowEnding(now);
    let posted = 0;
    let failed = 0;

    for (const outcome of this.store.outcomes(window)) {
      if (outcome.outcome === 'posted') posted++;
      else failed++;
    }

    const samples = posted + failed;
    const successRate = samples === 0 ? null : posted / samples;
    const degraded =
      successRate !== null && samples >= this.config.minSamples && successRate < this.config.threshold;

    return {
      window: { since: window.since.toISOString(), until: window.until.toISOString() },
      posted,
      failed,
      samples,
      successRate,
      degraded,
      threshold: this.config.threshold,
      minSamples: this.config.minSamples,
    };
  }

  /**
   * Compute the report and raise a warning when degraded.
   */
  async evaluate(now?: Date): Promise<HealthReport> {
    const report = this.report(now);

    if (report.degraded && report.successRate !== null) {
      const percent = (report.successRate * 100).toFixed(1);
      console.warn(`[health] Success rate ${percent}% below ${report.threshold * 100}% (${report.samples} samples)`);
      await this.sink?.notify('warning', `Publish success rate degraded to ${percent}%`, {
        posted: report.posted,
        failed: report.failed,
        windowHours: this.config.windowHours,
      });
    }

    return report;
  }

  private windowEnding(now: Date): TimeWindow {
    // Half-open window: include outcomes recorded at exactly `now`
    const until = new Date(now.getTime() + 1);
    const since = new Date(now.getTime() - this.config.windowHours * 60 * 60 * 1000);
    return { since, until };
  }
}
