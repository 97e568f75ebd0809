import type { Logger, SweepResult } from "../types";
import type { StalenessSweep } from "./sweep";

export interface SweepSchedulerOptions {
  /** Seconds without activity before demotion (WORKER_TIMEOUT) */
  timeoutSeconds: number;
  /** Seconds between runs (SWEEP_INTERVAL) */
  intervalSeconds: number;
  /** Clock in Unix seconds */
  now?: () => number;
}

/**
 * Runs the staleness sweep on a fixed interval for the lifetime of the
 * server process. A failing run is logged and the next run goes ahead.
 */
export class SweepScheduler {
  private readonly sweep: StalenessSweep;
  private readonly logger: Logger;
  private readonly options: SweepSchedulerOptions;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(sweep: StalenessSweep, logger: Logger, options: SweepSchedulerOptions) {
    this.sweep = sweep;
    this.logger = logger;
    this.options = options;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Math.floor(Date.now() / 1000);
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one sweep now. Returns null when the run failed.
   */
  runOnce(): SweepResult | null {
    try {
      return this.sweep.sweep(this.options.timeoutSeconds, this.now());
    } catch (e) {
      this.logger.error("Scheduled sweep failed", {
        error: e instanceof Error ? e.message : "Unknown error",
      });
      return null;
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runOnce();
    }, this.options.intervalSeconds * 1000);
    this.logger.info("Sweep scheduler started", {
      intervalSeconds: this.options.intervalSeconds,
      timeoutSeconds: this.options.timeoutSeconds,
    });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("Sweep scheduler stopped");
  }
}
