/**
 * @fileoverview Cached backend reachability
 *
 * Status reads never wait on the backend: `current()` returns the last probe
 * and, when it is older than the check interval, starts a new probe in the
 * background.
 */

import type { BackendHealth, ReasoningBackend } from '../adapters/llm_service.js';
import { safeAsync } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';

export interface BackendStatus {
  configured: boolean;
  reachable: boolean;
  provider: string;
  model: string;
  /** ISO-8601; null before the first probe completes. */
  lastCheckedAt: string | null;
  error?: string;
}

export interface BackendHealthMonitorOptions {
  intervalMs: number;
  probeTimeoutMs: number;
  now?: () => number;
}

export class BackendHealthMonitor {
  private health: BackendHealth | null = null;
  private probing: Promise<BackendHealth | null> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly backend: ReasoningBackend | null,
    private readonly options: BackendHealthMonitorOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Last known status; schedules a re-probe when stale. */
  current(): BackendStatus {
    if (this.backend && this.isStale()) {
      void this.probe();
    }
    return this.toStatus();
  }

  /** Probe now, or join the probe in flight. */
  async probe(): Promise<BackendStatus> {
    const backend = this.backend;
    if (!backend) return this.toStatus();
    if (!this.probing) {
      this.probing = this.runProbe(backend).finally(() => {
        this.probing = null;
      });
    }
    await this.probing;
    return this.toStatus();
  }

  private isStale(): boolean {
    if (this.probing) return false;
    if (!this.health) return true;
    return this.now() - this.health.lastCheck >= this.options.intervalMs;
  }

  // Resolves with the new health; probe failures become an unreachable status.
  private async runProbe(backend: ReasoningBackend): Promise<BackendHealth | null> {
    const result = await safeAsync(() =>
      withTimeout(backend.checkHealth(true), this.options.probeTimeoutMs, { context: 'backend health probe' })
    );
    this.health = result.ok
      ? result.value
      : {
          provider: backend.provider,
          available: false,
          authenticated: false,
          lastCheck: this.now(),
          error: result.error.message,
        };
    logDebug('Backend probed', { provider: backend.provider, available: this.health.available });
    return this.health;
  }

  private toStatus(): BackendStatus {
    if (!this.backend) {
      return {
        configured: false,
        reachable: false,
        provider: 'none',
        model: '',
        lastCheckedAt: null,
      };
    }
    const health = this.health;
    const status: BackendStatus = {
      configured: true,
      reachable: health ? health.available && health.authenticated : false,
      provider: this.backend.provider,
      model: this.backend.modelId,
      lastCheckedAt: health && health.lastCheck > 0 ? new Date(health.lastCheck).toISOString() : null,
    };
    if (health?.error) status.error = health.error;
    return status;
  }
}
