/**
 * @fileoverview Periodic knowledge refresh
 *
 * Runs a refresh cycle every `intervalMs`, measured from the end of the
 * previous cycle, so cycles never overlap. `stop()` cancels the pending timer,
 * aborts the in-flight cycle between documents and waits for it to settle.
 * Each start() opens a new generation; timers and cycles of an older one
 * never reschedule, so a restart leaves a single chain.
 */

import { getErrorMessage } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { RefreshReport } from './knowledge_index.js';

export type RefreshRunner = (signal: AbortSignal) => Promise<RefreshReport>;

export interface RefreshTaskOptions {
  intervalMs: number;
  /** Run the first cycle right after start() instead of one interval later. */
  runImmediately?: boolean;
}

export class RefreshTask {
  private running = false;
  private generation = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inflight: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private lastReportValue: RefreshReport | null = null;
  private lastErrorValue: string | null = null;

  constructor(
    private readonly runner: RefreshRunner,
    private readonly options: RefreshTaskOptions,
  ) {}

  /** Idempotent. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation += 1;
    logDebug('Knowledge refresh task started', { intervalMs: this.options.intervalMs });
    this.scheduleNext(this.generation, this.options.runImmediately ? 0 : this.options.intervalMs);
  }

  async stop(): Promise<void> {
    this.running = false;
    this.generation += 1;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    if (this.inflight) {
      await this.inflight;
    }
    logDebug('Knowledge refresh task stopped');
  }

  /**
   * Run one cycle now, or wait for the one already in flight. Null when the
   * cycle failed; `lastError` holds the reason.
   */
  async runOnce(): Promise<RefreshReport | null> {
    if (!this.inflight) {
      this.inflight = this.execute().finally(() => {
        this.inflight = null;
      });
    }
    await this.inflight;
    return this.lastErrorValue === null ? this.lastReportValue : null;
  }

  isRunning(): boolean {
    return this.running;
  }

  get lastReport(): RefreshReport | null {
    return this.lastReportValue;
  }

  get lastError(): string | null {
    return this.lastErrorValue;
  }

  private isCurrent(generation: number): boolean {
    return this.running && generation === this.generation;
  }

  private scheduleNext(generation: number, delayMs: number): void {
    if (!this.isCurrent(generation)) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      if (!this.isCurrent(generation)) return;
      if (this.inflight) {
        this.scheduleNext(generation, this.options.intervalMs);
        return;
      }
      this.inflight = this.execute().finally(() => {
        this.inflight = null;
        this.scheduleNext(generation, this.options.intervalMs);
      });
    }, delayMs);
    this.timer.unref?.();
  }

  // Never rejects: failures are recorded and logged.
  private async execute(): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;
    try {
      this.lastReportValue = await this.runner(controller.signal);
      this.lastErrorValue = null;
    } catch (error) {
      this.lastErrorValue = getErrorMessage(error);
      logWarning('Knowledge refresh cycle failed', { error: this.lastErrorValue });
    } finally {
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }
}
