/**
 * Pipeline scheduler: owns the periodic timer that drives `runAll()`.
 *
 * A scheduled tick is skipped while the previous scheduled tick is still
 * running. Manual triggers run immediately and may overlap a tick.
 * Nothing runs at startup; the first tick fires one interval after start().
 */

import { log } from "./logger.ts";

const logger = log.child("scheduler");

export interface SchedulerStatus {
  running: boolean;
  interval_minutes: number | null;
  tick_in_flight: boolean;
  last_run_at: string | null;
  last_run_reason: string | null;
  next_run_at: string | null;
}

export class PipelineScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private intervalMinutes: number | null = null;
  private tickInFlight = false;
  private lastRunAt: Date | null = null;
  private lastRunReason: string | null = null;
  private nextRunAt: Date | null = null;

  constructor(
    private tick: () => Promise<void>,
    private now: () => Date = () => new Date(),
  ) {}

  start(intervalMinutes: number): void {
    if (this.timer) {
      logger.warn("Scheduler already running", { interval_minutes: this.intervalMinutes });
      return;
    }
    this.install(intervalMinutes);
    logger.info("Scheduler started", { interval_minutes: intervalMinutes });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.nextRunAt = null;
    logger.info("Scheduler stopped");
  }

  /** Cancel the current timer and install one at the new interval. */
  reschedule(intervalMinutes: number): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.install(intervalMinutes);
    logger.info("Scheduler rescheduled", { interval_minutes: intervalMinutes });
  }

  /** Run one pass now, outside the timer. */
  async trigger(reason: string): Promise<void> {
    logger.info("Manual run", { reason });
    await this.run(reason);
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.timer !== null,
      interval_minutes: this.timer ? this.intervalMinutes : null,
      tick_in_flight: this.tickInFlight,
      last_run_at: this.lastRunAt?.toISOString() ?? null,
      last_run_reason: this.lastRunReason,
      next_run_at: this.nextRunAt?.toISOString() ?? null,
    };
  }

  private install(intervalMinutes: number): void {
    if (!Number.isFinite(intervalMinutes) || intervalMinutes < 1) {
      throw new RangeError(`Invalid sync interval: ${intervalMinutes}`);
    }
    const intervalMs = intervalMinutes * 60_000;
    this.intervalMinutes = intervalMinutes;
    this.nextRunAt = new Date(this.now().getTime() + intervalMs);
    this.timer = setInterval(() => {
      this.nextRunAt = new Date(this.now().getTime() + intervalMs);
      this.scheduledTick().catch(err => logger.error("Scheduled tick failed", err));
    }, intervalMs);
  }

  private async scheduledTick(): Promise<void> {
    if (this.tickInFlight) {
      logger.warn("Previous tick still running, skipping");
      return;
    }
    this.tickInFlight = true;
    try {
      await this.run("interval");
    } finally {
      this.tickInFlight = false;
    }
  }

  private async run(reason: string): Promise<void> {
    this.lastRunAt = this.now();
    this.lastRunReason = reason;
    try {
      await this.tick();
    } catch (err) {
      logger.error("Pipeline run failed", { reason }, err);
    }
  }
}
