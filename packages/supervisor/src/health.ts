/**
 * Health checking for the supervised worker.
 *
 * A probe is a single timed GET against the worker's liveness endpoint.
 * It passes only on a 2xx status with a JSON body; the body's fields are
 * free-form diagnostics and are never validated. The readiness wait
 * repeats probes at a fixed interval and can be cancelled by an
 * AbortSignal.
 */

import {
  HealthCheckFailedError,
  HealthCheckTimeoutError,
  ShutdownRaceError,
  interruptibleSleep,
  toError,
  type IObserver,
} from '@pulse/core';

// ── Types ────────────────────────────────────────────────────────────────

/** Parsed JSON body of a passing probe. */
export type HealthDiagnostics = unknown;

export type HealthCheckResult =
  | { ok: true; status: number; diagnostics: HealthDiagnostics }
  | { ok: false; error: HealthCheckFailedError };

export interface HealthCheckerOptions {
  url: string;
  /** Per-probe request timeout. */
  timeoutMs: number;
  observer?: IObserver;
}

export interface WaitUntilReadyOptions {
  maxRetries: number;
  retryDelayMs: number;
  /** Aborting cancels the wait with a ShutdownRaceError. */
  signal?: AbortSignal;
}

export interface ReadyResult {
  attempts: number;
  diagnostics: HealthDiagnostics;
}

// ── HealthChecker ────────────────────────────────────────────────────────

export class HealthChecker {
  readonly url: string;
  private readonly timeoutMs: number;
  private readonly observer?: IObserver;

  constructor(options: HealthCheckerOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.observer = options.observer;
  }

  /**
   * Run one probe and report it. Never throws; failures come back as
   * `{ ok: false }`.
   */
  async check(signal?: AbortSignal, attempt?: number): Promise<HealthCheckResult> {
    const started = Date.now();
    const result = await this.request(signal);
    const durationMs = Date.now() - started;

    if (result.ok) {
      this.observer?.onHealthCheck({
        url: this.url,
        ok: true,
        status: result.status,
        durationMs,
        attempt,
        diagnostics: result.diagnostics,
      });
    } else {
      this.observer?.onHealthCheck({
        url: this.url,
        ok: false,
        status: result.error.status,
        durationMs,
        attempt,
        error: result.error,
      });
    }

    return result;
  }

  /** Run one probe; resolves with the diagnostics or throws HealthCheckFailedError. */
  async probe(signal?: AbortSignal): Promise<HealthDiagnostics> {
    const result = await this.check(signal);
    if (!result.ok) throw result.error;
    return result.diagnostics;
  }

  /**
   * Probe up to `maxRetries` times with a fixed pause between attempts.
   *
   * Gives up early once more than `maxRetries × retryDelayMs` has elapsed,
   * since slow probes can eat into the budget.
   */
  async waitUntilReady(options: WaitUntilReadyOptions): Promise<ReadyResult> {
    const { maxRetries, retryDelayMs, signal } = options;
    const budgetMs = maxRetries * retryDelayMs;
    const started = Date.now();
    let attempts = 0;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (signal?.aborted) {
        throw new ShutdownRaceError('Worker startup cancelled by shutdown');
      }
      if (Date.now() - started > budgetMs) break;

      attempts = attempt;
      const result = await this.check(signal, attempt);
      if (result.ok) {
        return { attempts, diagnostics: result.diagnostics };
      }
      if (signal?.aborted) {
        throw new ShutdownRaceError('Worker startup cancelled by shutdown');
      }
      lastError = result.error;

      if (attempt < maxRetries) {
        await interruptibleSleep(retryDelayMs, signal);
      }
    }

    throw new HealthCheckTimeoutError(
      `Worker failed to become healthy after ${attempts} attempt(s)`,
      attempts,
      {
        url: this.url,
        budgetMs,
        ...(lastError ? { lastError: lastError.message } : {}),
      },
    );
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async request(signal?: AbortSignal): Promise<HealthCheckResult> {
    if (signal?.aborted) {
      return {
        ok: false,
        error: new HealthCheckFailedError('Health check aborted', this.url),
      };
    }

    // Chain the caller's signal with our own timeout.
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let status: number | undefined;
    try {
      const response = await fetch(this.url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      status = response.status;

      if (!response.ok) {
        await response.body?.cancel();
        return {
          ok: false,
          error: new HealthCheckFailedError(
            `Health check failed with status ${status}`,
            this.url,
            status,
          ),
        };
      }

      const diagnostics: HealthDiagnostics = await response.json();
      return { ok: true, status, diagnostics };
    } catch (err) {
      const cause = toError(err);
      const message = timedOut
        ? `Health check timed out after ${this.timeoutMs}ms`
        : status !== undefined
          ? `Health check returned a non-JSON body: ${cause.message}`
          : `Health check request failed: ${cause.message}`;
      return {
        ok: false,
        error: new HealthCheckFailedError(message, this.url, status),
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
